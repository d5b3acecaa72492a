// @vitest-environment jsdom

/* ------------------------------------------------------------------ */
/*  Tests for src/frontend: provider and hooks.                       */
/* ------------------------------------------------------------------ */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { act, type ReactElement } from 'react';
import { createRoot, type Root } from 'react-dom/client';

import { Analytics } from '../../src/application/index.js';
import {
  createEvent,
  createView,
  type AnalyticsBackend,
  type View,
} from '../../src/domain/index.js';
import { RecordingBackend } from '../../src/infrastructure/index.js';
import {
  AnalyticsProvider,
  TrackView,
  useAnalytics,
  useAnalyticsOnTap,
  useAnalyticsView,
} from '../../src/frontend/index.js';

Reflect.set(globalThis, 'IS_REACT_ACT_ENVIRONMENT', true);

function Screen({ view }: { view: View }) {
  useAnalyticsView(view);
  return <p>screen</p>;
}

function BuyButton({ onTap }: { onTap?: () => void }) {
  const handleClick = useAnalyticsOnTap([createEvent('buy'), createEvent('upsell_seen')], onTap);
  return <button onClick={handleClick}>buy</button>;
}

describe('React analytics bindings', () => {
  let container: HTMLDivElement;
  let root: Root;
  let backend: RecordingBackend;
  let analytics: Analytics;

  function render(ui: ReactElement): void {
    act(() => {
      root.render(ui);
    });
  }

  function click(selector: string): void {
    const el = container.querySelector(selector);
    if (!el) throw new Error(`No element for ${selector}`);
    act(() => {
      el.dispatchEvent(new MouseEvent('click', { bubbles: true }));
    });
  }

  beforeEach(() => {
    container = document.createElement('div');
    document.body.appendChild(container);
    root = createRoot(container);
    backend = new RecordingBackend();
    analytics = new Analytics();
    analytics.register([backend]);
  });

  afterEach(() => {
    act(() => {
      root.unmount();
    });
    container.remove();
  });

  it('useAnalytics returns the provided dispatcher', () => {
    let seen: Analytics | null | undefined;
    function Probe() {
      seen = useAnalytics();
      return null;
    }

    render(<AnalyticsProvider analytics={analytics}><Probe /></AnalyticsProvider>);

    expect(seen).toBe(analytics);
  });

  it('useAnalytics returns null outside a provider', () => {
    let seen: Analytics | null | undefined;
    function Probe() {
      seen = useAnalytics();
      return null;
    }

    render(<Probe />);

    expect(seen).toBeNull();
  });

  it('logs a view on mount', () => {
    render(
      <AnalyticsProvider analytics={analytics}>
        <Screen view={createView('home', { tab: 'feed' })} />
      </AnalyticsProvider>,
    );

    expect(backend.views.map((v) => v.name)).toEqual(['home']);
    expect(backend.views[0]?.parameters).toEqual({ tab: 'feed' });
    expect(container.textContent).toBe('screen');
  });

  it('does not log again when re-rendered with a new descriptor object', () => {
    render(<AnalyticsProvider analytics={analytics}><Screen view={createView('home')} /></AnalyticsProvider>);
    render(<AnalyticsProvider analytics={analytics}><Screen view={createView('home')} /></AnalyticsProvider>);

    expect(backend.views).toHaveLength(1);
  });

  it('logs again when the provided dispatcher changes', () => {
    const other = new RecordingBackend('other');
    const otherAnalytics = new Analytics();
    otherAnalytics.register([other]);

    render(<AnalyticsProvider analytics={analytics}><Screen view={createView('home')} /></AnalyticsProvider>);
    render(<AnalyticsProvider analytics={otherAnalytics}><Screen view={createView('home')} /></AnalyticsProvider>);

    expect(backend.views).toHaveLength(1);
    expect(other.views).toHaveLength(1);
  });

  it('renders without a provider and logs nothing', () => {
    render(<Screen view={createView('home')} />);

    expect(container.textContent).toBe('screen');
    expect(backend.views).toHaveLength(0);
  });

  it('logs tap events in order, then runs the original handler', () => {
    const calls: string[] = [];
    const ordered: AnalyticsBackend = {
      logView: () => {},
      logEvent: (event) => { calls.push(event.name); },
      logPurchase: () => {},
      setUserProperty: () => {},
    };
    analytics.register([ordered]);

    render(
      <AnalyticsProvider analytics={analytics}>
        <BuyButton onTap={() => calls.push('onTap')} />
      </AnalyticsProvider>,
    );
    click('button');

    expect(calls).toEqual(['buy', 'upsell_seen', 'onTap']);
    expect(backend.events.map((e) => e.name)).toEqual(['buy', 'upsell_seen']);
  });

  it('logs on every tap', () => {
    render(<AnalyticsProvider analytics={analytics}><BuyButton /></AnalyticsProvider>);

    click('button');
    click('button');

    expect(backend.events).toHaveLength(4);
  });

  it('still runs the original handler without a provider', () => {
    const onTap = vi.fn();

    render(<BuyButton onTap={onTap} />);
    click('button');

    expect(onTap).toHaveBeenCalledTimes(1);
    expect(backend.events).toHaveLength(0);
  });

  it('TrackView logs its view and renders its children', () => {
    render(
      <AnalyticsProvider analytics={analytics}>
        <TrackView view={createView('settings')}>
          <span>settings body</span>
        </TrackView>
      </AnalyticsProvider>,
    );

    expect(backend.views.map((v) => v.name)).toEqual(['settings']);
    expect(container.textContent).toBe('settings body');
  });

  it('logs a nested view and its parent once each', () => {
    render(
      <AnalyticsProvider analytics={analytics}>
        <TrackView view={createView('list')}>
          <Screen view={createView('row')} />
        </TrackView>
      </AnalyticsProvider>,
    );

    expect(backend.views.map((v) => v.name).sort()).toEqual(['list', 'row']);
  });
});

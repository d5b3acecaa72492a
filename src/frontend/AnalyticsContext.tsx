/* ------------------------------------------------------------------ */
/*  Analytics bindings for React                                       */
/*                                                                     */
/*  A provider makes one dispatcher reachable from a subtree; hooks    */
/*  log a view when a component mounts and events when it is tapped.   */
/*  Without a provider every hook is a no-op.                          */
/* ------------------------------------------------------------------ */

import {
  createContext,
  useContext,
  useCallback,
  useEffect,
  useRef,
  type ReactNode,
} from 'react';

import type { Analytics } from '../application/index.js';
import type { View, Event as AnalyticsEvent } from '../domain/index.js';

const AnalyticsContext = createContext<Analytics | null>(null);

export function AnalyticsProvider({
  analytics,
  children,
}: {
  analytics: Analytics | null;
  children: ReactNode;
}) {
  return (
    <AnalyticsContext.Provider value={analytics}>
      {children}
    </AnalyticsContext.Provider>
  );
}

/** The nearest provided dispatcher, or `null` outside any provider. */
export function useAnalytics(): Analytics | null {
  return useContext(AnalyticsContext);
}

/**
 * Logs `view` once when the calling component mounts, and again if the
 * provided dispatcher changes. A new descriptor object on re-render does
 * not log again.
 */
export function useAnalyticsView(view: View): void {
  const analytics = useAnalytics();
  const viewRef = useRef(view);
  viewRef.current = view;

  useEffect(() => {
    analytics?.log(viewRef.current);
  }, [analytics]);
}

/**
 * Returns a handler that logs `events` in order, then runs `onTap`.
 * Pass it as `onClick` in place of the original handler.
 */
export function useAnalyticsOnTap<Args extends unknown[]>(
  events: readonly AnalyticsEvent[],
  onTap?: (...args: Args) => void,
): (...args: Args) => void {
  const analytics = useAnalytics();

  return useCallback(
    (...args: Args) => {
      for (const event of events) {
        analytics?.log(event);
      }
      onTap?.(...args);
    },
    [analytics, events, onTap],
  );
}

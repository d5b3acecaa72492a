import type { ReactNode } from 'react';
import type { View } from '../domain/index.js';
import { useAnalyticsView } from './AnalyticsContext.js';

/** Logs `view` when it mounts; renders its children unchanged. */
export function TrackView({ view, children }: { view: View; children?: ReactNode }) {
  useAnalyticsView(view);
  return <>{children}</>;
}

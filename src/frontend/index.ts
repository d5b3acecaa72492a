export {
  AnalyticsProvider,
  useAnalytics,
  useAnalyticsView,
  useAnalyticsOnTap,
} from './AnalyticsContext.js';
export { TrackView } from './TrackView.js';

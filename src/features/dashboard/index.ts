/**
 * Dashboard module — view model, text report and session wiring.
 */

export type {
  DashboardView,
  MetricTile,
  ActiveCriteria,
  EffectivenessBar,
  InputUsageRow,
} from './types.js';

export {
  buildDashboardView,
  formatMetricTiles,
  roundTo1,
  DASHBOARD_TITLE,
  DASHBOARD_CAPTION,
  RECOMMENDATIONS,
} from './view.js';

export { formatDashboardReport } from './report-formatter.js';

export {
  openDashboardSession,
  type DashboardSession,
  type DashboardSessionOptions,
} from './session.js';

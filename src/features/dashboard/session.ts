/**
 * Dashboard session — wires project config, the decision store and the
 * view builder together for one presentation surface.
 */

import type { DecisionFilterCriteria, DecisionRecord } from '../../core/models/decision.js';
import { InvalidRecordError, LoadError } from '../../core/decisions/errors.js';
import { DecisionStore } from '../../infra/store/DecisionStore.js';
import { loadProjectConfig, type ProjectConfig } from '../../infra/config/project/projectConfig.js';
import type { ConfigEnv } from '../../infra/config/env/config-env-overrides.js';
import { LogManager } from '../../shared/ui/LogManager.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { buildDashboardView } from './view.js';
import { formatDashboardReport } from './report-formatter.js';
import type { DashboardView } from './types.js';

const log = createLogger('dashboard');

export interface DashboardSessionOptions {
  projectDir: string;
  env?: ConfigEnv;
}

export interface DashboardSession {
  readonly config: ProjectConfig;
  readonly store: DecisionStore;
  records(): readonly DecisionRecord[];
  view(criteria?: DecisionFilterCriteria): DashboardView;
  report(criteria?: DecisionFilterCriteria): string;
}

/**
 * Open a session: resolve config, apply its log level and load the
 * decisions once.
 *
 * @throws LoadError | InvalidRecordError when the decisions cannot be
 *   loaded; logged as a fatal startup failure first
 */
export function openDashboardSession(options: DashboardSessionOptions): DashboardSession {
  const config = loadProjectConfig(options.projectDir, options.env);
  LogManager.getInstance().setLogLevel(config.logLevel);

  const store = new DecisionStore({ type: 'file', path: config.source });
  try {
    store.load();
  } catch (err) {
    if (err instanceof LoadError || err instanceof InvalidRecordError) {
      log.error('Dashboard startup failed', { source: config.source, error: err.message });
    }
    throw err;
  }

  const view = (criteria: DecisionFilterCriteria = {}): DashboardView => {
    try {
      return buildDashboardView(store.all(), criteria);
    } catch (err) {
      if (err instanceof InvalidRecordError) {
        log.warn('Data quality issue', { recordId: err.recordId, issues: err.issues });
      } else {
        log.error('Dashboard view failed', { error: getErrorMessage(err) });
      }
      throw err;
    }
  };

  return {
    config,
    store,
    records: () => store.all(),
    view,
    report: (criteria = {}) => formatDashboardReport(view(criteria)),
  };
}

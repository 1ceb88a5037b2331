/**
 * decision-log-analytics — public API
 */

export * from './core/models/index.js';
export * from './core/decisions/index.js';
export { DecisionStore, type DecisionSource } from './infra/store/index.js';
export {
  loadProjectConfig,
  getProjectConfigPath,
  getSampleDecisionsPath,
  type ProjectConfig,
} from './infra/config/project/projectConfig.js';
export * from './features/dashboard/index.js';
export { LogManager, type LogLevel } from './shared/ui/LogManager.js';
export { createLogger, type Logger } from './shared/utils/index.js';

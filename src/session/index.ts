export { Experiment, type ExperimentParent } from './experiment.js';
export {
  PerfSession,
  type PerfSessionOptions,
  type CollectError,
  type CollectResult,
  type ExperimentOutcome,
} from './perf-session.js';
export {
  COLLECT_TOKEN,
  TYPESCRIPT_EXTENSIONS,
  isPerfModule,
  isTypeScriptFile,
  hasTypeScriptLoader,
  findPerfModules,
} from './collector.js';
export { SUMMARY_TITLE, renderSummary } from './summary.js';

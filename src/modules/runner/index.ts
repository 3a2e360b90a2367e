export { Runner } from './runner.service.js';
export type { BackfillSummary, RunStats, RunnerOptions, RunnerStatus } from './runner.service.js';

/**
 * Newsdesk Pipeline Package
 */

export {
    PipelineOrchestrator,
    type PipelineOrchestratorOptions, type PipelineRun, type RunOptions,
    type Analyzer, type Validator,
} from './orchestrator.js';
export { IntervalThrottle, DEFAULT_THROTTLE_MS, sleep, type Throttle, type Sleep } from './throttle.js';
export {
    ConsoleProgressReporter, silentProgress, renderProgressBar,
    type ProgressReporter, type ProgressEvent,
} from './progress.js';
export { summarizeResults } from './summary.js';

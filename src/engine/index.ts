export {
  ExecutionSupervisor,
  type AttemptSummary,
  type ExecutionSupervisorOptions,
  type RunTaskInput,
  type SupervisorResult,
  type SupervisorResultKind,
} from "./execution-supervisor";
export {
  assertValidProjectGraph,
  validateProjectGraph,
  type GraphValidationReport,
  type GraphWarning,
} from "./graph-validation";
export {
  OrchestrationLoop,
  type LoopOutcome,
  type LoopRunInput,
  type OrchestrationLoopOptions,
  type SupervisorPaths,
  type TaskRunner,
} from "./orchestration-loop";
export { classifyTranscript, scanMarkers, type Classification } from "./output-classifier";
export { buildIterationPrompt } from "./prompt-builder";
export { RetryPolicy, sleepWithSignal } from "./retry";
export {
  diagnoseBlocked,
  formatDiagnosis,
  selectNext,
  type ScheduleDiagnosis,
} from "./scheduler";
export { applyCompletion, type SyncResult } from "./source-sync";

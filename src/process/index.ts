export type {
  OutputStream,
  ProcessRunOptions,
  ProcessRunResult,
  ProcessRunner,
  SpawnFn,
} from "./types";
export { findExecutable, resolveCommandForSpawn } from "./command-resolver";
export {
  isProcessFailure,
  ProcessCancelledError,
  ProcessExecutionError,
  ProcessIdleTimeoutError,
  ProcessManager,
  type ProcessFailure,
} from "./manager";

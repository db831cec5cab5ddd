import {
  ProcessCancelledError,
  ProcessExecutionError,
  ProcessIdleTimeoutError,
} from "../process";

export const AGENT_FAILURE_KINDS = [
  "auth",
  "network",
  "missing-binary",
  "idle-timeout",
  "cancelled",
  "exit-code",
  "unknown",
] as const;

export type AgentFailureKind = (typeof AGENT_FAILURE_KINDS)[number];

const NETWORK_ERROR_CODES = new Set([
  "ENOTFOUND",
  "ECONNRESET",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "ENETUNREACH",
  "ETIMEDOUT",
]);

const AUTH_PATTERNS = [
  "unauthorized",
  "invalid api key",
  "api key not found",
  "token expired",
  "please login",
  "please log in",
  "not logged in",
  "authentication failed",
];

const NETWORK_PATTERNS = [
  "network error",
  "connection reset",
  "connection refused",
  "name resolution",
  "temporarily unavailable",
];

function readErrorCode(error: unknown): string {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code.toUpperCase() : "";
  }
  return "";
}

function readErrorText(error: unknown): string {
  if (error instanceof ProcessExecutionError) {
    // Diagnostics usually land at the end of stderr.
    return `${error.message}\n${error.result.stderr.slice(-2_000)}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error ?? "");
}

/**
 * Labels an agent failure for `lastError` and decides whether retrying can
 * help.  Only the stderr tail of a failed run is inspected; the transcript
 * itself is left to the output classifier.
 */
export function classifyAgentFailure(error: unknown): AgentFailureKind {
  if (error instanceof ProcessIdleTimeoutError) {
    return "idle-timeout";
  }
  if (error instanceof ProcessCancelledError) {
    return "cancelled";
  }

  const code = readErrorCode(error);
  const lower = readErrorText(error).toLowerCase();

  if (
    code === "ENOENT" ||
    lower.includes("command not found") ||
    lower.includes("not recognized as an internal or external command")
  ) {
    return "missing-binary";
  }
  if (AUTH_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return "auth";
  }
  if (
    NETWORK_ERROR_CODES.has(code) ||
    NETWORK_PATTERNS.some((pattern) => lower.includes(pattern))
  ) {
    return "network";
  }
  if (error instanceof ProcessExecutionError) {
    return "exit-code";
  }

  return "unknown";
}

/** A missing binary fails every attempt the same way. */
export function isRetryableFailure(kind: AgentFailureKind): boolean {
  return kind !== "missing-binary" && kind !== "cancelled";
}

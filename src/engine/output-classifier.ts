import type { AgentStatusFile } from "../types";

export type ReportedVerdict = "blocked" | "failed";

export type Classification =
  | { kind: "completed"; taskId: string; status?: string }
  | { kind: "all-complete"; status?: string }
  | {
      kind: "reported";
      verdict: ReportedVerdict;
      taskId: string;
      reason: string;
      status?: string;
    }
  | { kind: "no-marker"; tail: string; status?: string };

export type TranscriptMarker =
  | { kind: "task-complete"; taskId: string }
  | { kind: "task-blocked"; taskId: string; reason: string }
  | { kind: "task-failed"; taskId: string; reason: string }
  | { kind: "project-complete" }
  | { kind: "status"; text: string };

export const DEFAULT_TAIL_CHARS = 2_000;
const NO_REASON = "no reason given";

// CSI sequences (colours, cursor moves) and OSC sequences (titles, links).
const ANSI_PATTERN =
  /\u001b\[[0-?]*[ -\/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g;

const TASK_MARKER_PATTERN =
  /^(TASK_COMPLETE|TASK_BLOCKED|TASK_FAILED):\s*(\S+)(?:\s+(.*))?$/;
const STATUS_PATTERN = /^STATUS:\s*(.*)$/;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

// Agents like to wrap markers in markdown emphasis, code spans or quotes.
function unwrapLine(line: string): string {
  return line
    .trim()
    .replace(/^(?:[>*_`]+\s*)+/, "")
    .replace(/(?:\s*[*_`]+)+$/, "")
    .trim();
}

function cleanTaskId(raw: string): string {
  return raw.replace(/[.,;:!*_`]+$/, "");
}

/**
 * Normalized lines of the prompt sent to the agent.  Agent CLIs that print
 * the prompt back would otherwise hand the scanner every marker the prompt
 * quotes, so a line found here is never taken as a marker.
 */
export function collectPromptLines(prompt: string): ReadonlySet<string> {
  const lines = new Set<string>();
  for (const line of prompt.split(/\r?\n/)) {
    const text = unwrapLine(stripAnsi(line));
    if (text) {
      lines.add(text);
    }
  }
  return lines;
}

export function parseMarkerLine(
  line: string,
  promptLines?: ReadonlySet<string>,
): TranscriptMarker | undefined {
  const text = unwrapLine(stripAnsi(line));
  if (!text || promptLines?.has(text)) {
    return undefined;
  }

  if (/^PROJECT_COMPLETE[.!]?$/.test(text)) {
    return { kind: "project-complete" };
  }

  const taskMatch = TASK_MARKER_PATTERN.exec(text);
  if (taskMatch) {
    const [, sentinel, rawId, rawReason] = taskMatch;
    const taskId = cleanTaskId(rawId ?? "");
    if (!taskId) {
      return undefined;
    }
    const reason = rawReason?.trim() || NO_REASON;
    switch (sentinel) {
      case "TASK_COMPLETE":
        return { kind: "task-complete", taskId };
      case "TASK_BLOCKED":
        return { kind: "task-blocked", taskId, reason };
      default:
        return { kind: "task-failed", taskId, reason };
    }
  }

  const statusMatch = STATUS_PATTERN.exec(text);
  const statusText = statusMatch?.[1]?.trim();
  if (statusText) {
    return { kind: "status", text: statusText };
  }

  return undefined;
}

export function scanMarkers(
  transcript: string,
  promptLines?: ReadonlySet<string>,
): TranscriptMarker[] {
  const markers: TranscriptMarker[] = [];
  for (const line of transcript.split(/\r?\n/)) {
    const marker = parseMarkerLine(line, promptLines);
    if (marker) {
      markers.push(marker);
    }
  }
  return markers;
}

export function tailOf(text: string, chars = DEFAULT_TAIL_CHARS): string {
  const clean = stripAnsi(text).trimEnd();
  return clean.length > chars ? clean.slice(clean.length - chars) : clean;
}

/**
 * True once a streamed line finishes the dispatched task or the whole
 * project; the supervisor then only waits a short grace period for exit.
 */
export function isTerminalMarker(
  marker: TranscriptMarker | undefined,
  expectedTaskId: string,
): boolean {
  if (!marker) {
    return false;
  }
  return (
    marker.kind === "project-complete" ||
    (marker.kind === "task-complete" && marker.taskId === expectedTaskId)
  );
}

/** True when a status file read mid-run reports the dispatched task (or the project) done. */
export function isCompletionStatus(statusFile: AgentStatusFile, expectedTaskId: string): boolean {
  switch (statusFile.status) {
    case "COMPLETED":
      return statusFile.task_id === expectedTaskId;
    case "PROJECT_COMPLETE":
      return statusFile.task_id === undefined || statusFile.task_id === expectedTaskId;
    default:
      return false;
  }
}

function classifyStatusFile(
  statusFile: AgentStatusFile,
  expectedTaskId: string,
  status: string | undefined,
): Classification | undefined {
  if (statusFile.status === "PROJECT_COMPLETE" && statusFile.task_id === undefined) {
    return { kind: "all-complete", status };
  }
  if (statusFile.task_id !== expectedTaskId) {
    console.warn(
      `Output classifier: ignoring status file for task ${statusFile.task_id ?? "<none>"} (dispatched ${expectedTaskId}).`,
    );
    return undefined;
  }

  const reason = statusFile.reason?.trim() || NO_REASON;
  switch (statusFile.status) {
    case "COMPLETED":
      return { kind: "completed", taskId: expectedTaskId, status };
    case "PROJECT_COMPLETE":
      return { kind: "all-complete", status };
    case "BLOCKED":
      return { kind: "reported", verdict: "blocked", taskId: expectedTaskId, reason, status };
    case "FAILED":
      return { kind: "reported", verdict: "failed", taskId: expectedTaskId, reason, status };
  }
}

/**
 * Classifies one attempt's transcript.  Total: malformed, foreign or missing
 * markers downgrade to `no-marker` instead of throwing.
 *
 * Precedence: a status file naming the dispatched task, then
 * `PROJECT_COMPLETE`, then a completion marker for the dispatched task, then
 * the last blocked/failed report for it.
 */
export function classifyTranscript(
  transcript: string,
  options: {
    expectedTaskId: string;
    statusFile?: AgentStatusFile;
    tailChars?: number;
    /** The prompt of this attempt; marker lines echoed from it are ignored. */
    prompt?: string;
  },
): Classification {
  const markers = scanMarkers(
    transcript,
    options.prompt === undefined ? undefined : collectPromptLines(options.prompt),
  );
  let status: string | undefined;
  for (const marker of markers) {
    if (marker.kind === "status") {
      status = marker.text;
    }
  }

  if (options.statusFile) {
    const fromFile = classifyStatusFile(options.statusFile, options.expectedTaskId, status);
    if (fromFile) {
      return fromFile;
    }
  }

  if (markers.some((marker) => marker.kind === "project-complete")) {
    return { kind: "all-complete", status };
  }

  const foreign = new Set<string>();
  let reported: Extract<Classification, { kind: "reported" }> | undefined;
  for (const marker of markers) {
    if (marker.kind === "project-complete" || marker.kind === "status") {
      continue;
    }
    if (marker.taskId !== options.expectedTaskId) {
      foreign.add(marker.taskId);
      continue;
    }
    if (marker.kind === "task-complete") {
      return { kind: "completed", taskId: marker.taskId, status };
    }
    reported = {
      kind: "reported",
      verdict: marker.kind === "task-blocked" ? "blocked" : "failed",
      taskId: marker.taskId,
      reason: marker.reason,
      status,
    };
  }

  if (foreign.size > 0) {
    console.warn(
      `Output classifier: ignoring markers for ${[...foreign].join(", ")} (dispatched ${options.expectedTaskId}).`,
    );
  }
  if (reported) {
    return reported;
  }

  return {
    kind: "no-marker",
    tail: tailOf(transcript, options.tailChars ?? DEFAULT_TAIL_CHARS),
    status,
  };
}

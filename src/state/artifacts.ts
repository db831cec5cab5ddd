import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";

export type AttemptKey = {
  iteration: number;
  attempt: number;
};

export type TranscriptArtifactInput = AttemptKey & {
  command: string;
  args: string[];
  durationMs?: number;
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  errorMessage?: string;
};

/** Where the supervisor keeps each attempt's prompt and transcript. */
export interface ArtifactWriter {
  writePrompt(input: AttemptKey & { prompt: string }): Promise<string>;
  writeTranscript(input: TranscriptArtifactInput): Promise<string>;
}

function attemptStem(key: AttemptKey): string {
  return `iteration-${key.iteration}-attempt-${key.attempt}`;
}

export function formatTranscriptArtifact(input: TranscriptArtifactInput): string {
  const lines: string[] = [
    `Command: ${input.command}`,
    // The prompt is usually the last argument; it has its own file.
    `Args: ${input.args.map((arg) => (arg.includes("\n") ? "<prompt>" : arg)).join(" ")}`.trimEnd(),
  ];
  if (typeof input.durationMs === "number") {
    lines.push(`DurationMs: ${input.durationMs}`);
  }
  if (input.exitCode !== undefined) {
    lines.push(`ExitCode: ${input.exitCode ?? "none"}`);
  }
  if (input.errorMessage) {
    lines.push(`Error: ${input.errorMessage}`);
  }
  lines.push("--- STDOUT ---");
  lines.push(input.stdout ?? "");
  lines.push("--- STDERR ---");
  lines.push(input.stderr ?? "");
  lines.push("");
  return lines.join("\n");
}

export class FileArtifactWriter implements ArtifactWriter {
  private readonly transcriptsDir: string;

  constructor(transcriptsDir: string) {
    if (!transcriptsDir.trim()) {
      throw new Error("transcriptsDir must not be empty.");
    }

    this.transcriptsDir = resolve(transcriptsDir);
  }

  promptFilePath(key: AttemptKey): string {
    return resolve(this.transcriptsDir, `${attemptStem(key)}-prompt.txt`);
  }

  transcriptFilePath(key: AttemptKey): string {
    return resolve(this.transcriptsDir, `${attemptStem(key)}.log`);
  }

  async writePrompt(input: AttemptKey & { prompt: string }): Promise<string> {
    const filePath = this.promptFilePath(input);
    await mkdir(this.transcriptsDir, { recursive: true });
    await writeFile(filePath, `${input.prompt}\n`, "utf8");
    return filePath;
  }

  async writeTranscript(input: TranscriptArtifactInput): Promise<string> {
    const filePath = this.transcriptFilePath(input);
    await mkdir(this.transcriptsDir, { recursive: true });
    await writeFile(filePath, formatTranscriptArtifact(input), "utf8");
    return filePath;
  }
}

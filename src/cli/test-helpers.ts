import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import type { CliEnvironment } from "./app";

/**
 * Temporary working directory with its own state root, so CLI tests never
 * touch the developer's `.taskloop` folder.
 */
export class TestSandbox {
  constructor(public readonly projectDir: string) {}

  static async create(prefix: string): Promise<TestSandbox> {
    const projectDir = await mkdtemp(join(tmpdir(), prefix));
    return new TestSandbox(projectDir);
  }

  get stateRoot(): string {
    return join(this.projectDir, ".taskloop");
  }

  get settingsFilePath(): string {
    return join(this.stateRoot, "settings.json");
  }

  environment(overrides: Partial<CliEnvironment> = {}): CliEnvironment {
    return {
      cwd: this.projectDir,
      stateRoot: this.stateRoot,
      settingsFilePath: this.settingsFilePath,
      ...overrides,
    };
  }

  async writeFile(relativePath: string, content: string): Promise<string> {
    const filePath = join(this.projectDir, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf8");
    return filePath;
  }

  async writeSettings(settings: unknown): Promise<void> {
    await mkdir(this.stateRoot, { recursive: true });
    await writeFile(this.settingsFilePath, `${JSON.stringify(settings, null, 2)}\n`, "utf8");
  }

  async cleanup(): Promise<void> {
    await rm(this.projectDir, { recursive: true, force: true });
  }
}

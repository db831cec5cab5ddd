import type { ProcessRunner } from "../process";

import { BaseCliAdapter, type AgentAdapterOptions } from "./types";

/**
 * Runs an arbitrary command with the prompt as its last argument.  Used for
 * dry runs against a scripted agent; model and permission options are ignored.
 */
export class MockCLIAdapter extends BaseCliAdapter {
  constructor(runner: ProcessRunner, options: AgentAdapterOptions = {}) {
    super({
      id: "MOCK_CLI",
      command: options.command ?? "mock-cli",
      baseArgs: options.extraArgs ?? ["run"],
      runner,
    });
  }
}

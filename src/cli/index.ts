import { toErrorMessage } from "../errors";
import { runCli } from "./app";
import { exitCodeForError, EXIT_CODES } from "./exit-codes";
import { initializeCliLogging } from "./logging";
import { resolveSettingsFilePath, resolveStateRoot } from "./settings";
import { ValidationError } from "./validation";

async function main(): Promise<number> {
  const cwd = process.cwd();
  const stateRoot = resolveStateRoot(cwd);
  initializeCliLogging(stateRoot);

  const controller = new AbortController();
  let interrupts = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    interrupts += 1;
    if (interrupts > 1) {
      console.error(`Received ${signal} again; exiting immediately.`);
      process.exit(EXIT_CODES.INTERRUPTED);
    }
    console.warn(`Received ${signal}; stopping after the current agent run is cancelled.`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    return await runCli(process.argv.slice(2), {
      cwd,
      stateRoot,
      settingsFilePath: resolveSettingsFilePath(stateRoot),
      signal: controller.signal,
    });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof ValidationError) {
      console.error(error.format());
    } else {
      console.error(`Error: ${toErrorMessage(error)}`);
    }
    process.exitCode = exitCodeForError(error);
  });

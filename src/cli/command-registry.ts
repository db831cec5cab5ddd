import { ValidationError } from "./validation";

export const CLI_NAME = "taskloop";

export interface CommandActionContext {
  args: string[]; // Arguments after the command name
  fullArgs: string[]; // All arguments including the command name
}

/** Resolves to the process exit code; `undefined` means success. */
export type CommandAction = (ctx: CommandActionContext) => Promise<number | void>;

export interface CommandDefinition {
  name: string;
  description: string;
  action: CommandAction;
  usage?: string;
}

function isHelpFlag(value: string | undefined): boolean {
  return value === "help" || value === "--help" || value === "-h";
}

export class CommandRegistry {
  private readonly commands: CommandDefinition[];

  constructor(commands: CommandDefinition[] = []) {
    this.commands = [...commands];
  }

  register(command: CommandDefinition): void {
    this.commands.push(command);
  }

  async run(args: string[]): Promise<number> {
    const commandName = args[0];
    if (commandName === undefined || isHelpFlag(commandName)) {
      this.printGlobalHelp();
      return 0;
    }

    const command = this.commands.find((candidate) => candidate.name === commandName);
    if (!command) {
      throw new ValidationError(`Unknown command: '${commandName}'`, {
        hint: `Run '${CLI_NAME} help' to list the available commands.`,
      });
    }

    if (isHelpFlag(args[1])) {
      this.printCommandHelp(command);
      return 0;
    }

    const exitCode = await command.action({ args: args.slice(1), fullArgs: args });
    return exitCode ?? 0;
  }

  private printGlobalHelp(): void {
    const rows = this.commands.map((command) => ({
      usage: command.usage ?? command.name,
      description: command.description,
    }));
    rows.push({ usage: "help", description: "Show this help" });

    const colWidth = Math.max(...rows.map((row) => row.usage.length)) + 2;

    console.info(`${CLI_NAME}: drive a coding agent through a task plan`);
    console.info("");
    console.info("Usage:");
    for (const row of rows) {
      console.info(`  ${CLI_NAME} ${row.usage.padEnd(colWidth)} ${row.description}`);
    }
    console.info("");
    console.info(`Run '${CLI_NAME} <command> help' for command details.`);
  }

  private printCommandHelp(command: CommandDefinition): void {
    console.info(`${CLI_NAME} ${command.usage ?? command.name}`);
    console.info("");
    console.info(`  ${command.description}`);
  }
}

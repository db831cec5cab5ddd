import { ConfigurationError } from "../errors";

/**
 * Argument validation failure raised by the CLI.  Exits like any other
 * configuration problem; `format()` gives the text printed to stderr:
 *
 *   Error: <message>
 *     Usage: <usage>        (when usage is provided)
 *     Hint:  <hint>         (when hint is provided)
 */
export class ValidationError extends ConfigurationError {
  readonly usage?: string;
  readonly hint?: string;

  constructor(message: string, opts?: { usage?: string; hint?: string }) {
    super(message);
    this.usage = opts?.usage;
    this.hint = opts?.hint;
  }

  format(): string {
    const lines: string[] = [`Error: ${this.message}`];
    if (this.usage) lines.push(`  Usage: ${this.usage}`);
    if (this.hint) lines.push(`  Hint:  ${this.hint}`);
    return lines.join("\n");
  }
}

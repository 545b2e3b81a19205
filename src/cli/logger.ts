import chalk from "chalk";
import type { OccurrenceStatus } from "../core/orchestrator.js";

/**
 * Timestamped, colour-labelled console output for the CLI.
 */
export class Logger {
  banner(name: string, version: string): void {
    console.log(chalk.bold.blue(`${name} v${version}`));
  }

  info(message: string): void {
    this.print(chalk.bgBlue.black(" INFO "), chalk.cyan(message));
  }

  success(message: string): void {
    this.print(chalk.bgGreen.black(" DONE "), chalk.greenBright(message));
  }

  warn(message: string): void {
    this.print(chalk.bgYellow.black(" WARN "), chalk.yellowBright(message));
  }

  error(message: string): void {
    this.print(chalk.bgRed.white(" ERROR "), chalk.redBright(message), true);
  }

  /**
   * One airing's summary line, labelled by status, with its notes indented
   * underneath.
   */
  airing(status: OccurrenceStatus, line: string, notes: readonly string[] = []): void {
    const [label, colour, toError] = AIRING_STYLES[status];
    this.print(label, colour(line), toError);
    for (const note of notes) {
      this.detail(note);
    }
  }

  /** Indented follow-up line under the previous entry. */
  detail(message: string): void {
    console.log(chalk.gray(`    ${message}`));
  }

  private print(label: string, content: string, toError = false): void {
    const ts = chalk.gray(`[${new Date().toISOString()}]`);
    const line = `${ts} ${label} ${content}`;
    if (toError) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

const AIRING_STYLES: Record<
  OccurrenceStatus,
  [label: string, colour: (text: string) => string, toError: boolean]
> = {
  complete: [chalk.bgGreen.black(" MERGED "), chalk.greenBright, false],
  partial: [chalk.bgYellow.black(" PARTIAL "), chalk.yellowBright, false],
  failed: [chalk.bgMagenta.white(" FAILED "), chalk.magentaBright, true],
};

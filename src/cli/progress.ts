import chalk from "chalk";
import cliProgress from "cli-progress";

/**
 * One bar per airing, advanced once per hourly segment.
 */
export class DownloadProgress {
  private readonly bar: cliProgress.SingleBar;
  private started = false;

  constructor(private readonly airDate: string) {
    this.bar = new cliProgress.SingleBar(
      {
        format:
          `${chalk.blueBright("{airDate}")} ` +
          `${chalk.cyan("{bar}")} ` +
          `${chalk.green("{value}/{total} segments")} ` +
          `${chalk.gray("{status}")}`,
        barCompleteChar: "█",
        barIncompleteChar: "░",
        hideCursor: true,
      },
      cliProgress.Presets.shades_classic,
    );
  }

  update(done: number, total: number, status = ""): void {
    const payload = { airDate: this.airDate, status };
    if (!this.started) {
      this.bar.start(total, done, payload);
      this.started = true;
      return;
    }
    this.bar.setTotal(total);
    this.bar.update(done, payload);
  }

  stop(): void {
    if (this.started) {
      this.bar.stop();
      this.started = false;
    }
  }
}

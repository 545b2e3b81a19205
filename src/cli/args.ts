import { ConfigError } from "../core/errors.js";
import { type IsoDate, parseIsoDate } from "../core/time.js";

export interface CliArgs {
  configPath: string;
  startDate?: IsoDate;
  baseUrl?: string;
  outputDir?: string;
  username?: string;
  password?: string;
  callsign?: string;
  callsignCode?: string;
  help: boolean;
}

const VALUE_FLAGS: Record<string, Exclude<keyof CliArgs, "help">> = {
  "-c": "configPath",
  "--config": "configPath",
  "-s": "startDate",
  "--start-date": "startDate",
  "--base-url": "baseUrl",
  "--output-dir": "outputDir",
  "--username": "username",
  "--password": "password",
  "--callsign": "callsign",
  "--callsign-code": "callsignCode",
};

export const USAGE = `Usage: archive-shows [options]

  -c, --config <file>       schedule/config file (default: shows.yaml)
  -s, --start-date <date>   resume from this air date (YYYY-MM-DD, inclusive)
      --base-url <url>      archive base URL
      --output-dir <dir>    where merged shows are written
      --username <name>     archive username
      --password <secret>   archive password
      --callsign <code>     station callsign, skips auto-detection
      --callsign-code <n>   numeric station code used in index URLs
  -h, --help                show this help`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { configPath: "shows.yaml", help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      args.help = true;
      continue;
    }
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;
    const key = VALUE_FLAGS[flag];
    if (!key) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    const value = inline ?? argv[i + 1];
    if (value === undefined || (inline === undefined && value.startsWith("-"))) {
      throw new ConfigError(`Option ${flag} needs a value.`);
    }
    if (inline === undefined) {
      i += 1;
    }
    if (key === "startDate") {
      try {
        args.startDate = parseIsoDate(value);
      } catch (error) {
        throw new ConfigError(
          `--start-date: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    } else {
      args[key] = value;
    }
  }
  return args;
}

import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";
import { ConfigError } from "../src/core/errors.js";

describe("parseArgs", () => {
  it("defaults the config path", () => {
    expect(parseArgs([])).toEqual({ configPath: "shows.yaml", help: false });
  });

  it("reads spaced and inline values", () => {
    expect(
      parseArgs([
        "-s",
        "2024-01-15",
        "--base-url",
        "archive.example.org",
        "--callsign=bsr",
        "-c",
        "my-shows.yaml",
      ]),
    ).toEqual({
      configPath: "my-shows.yaml",
      startDate: "2024-01-15",
      baseUrl: "archive.example.org",
      callsign: "bsr",
      help: false,
    });
  });

  it("rejects unknown flags, missing values and bad dates", () => {
    expect(() => parseArgs(["--verbose"])).toThrow(ConfigError);
    expect(() => parseArgs(["--username"])).toThrow(
      "Option --username needs a value.",
    );
    expect(() => parseArgs(["--start-date", "2024-13-01"])).toThrow(
      /^--start-date: Invalid date/,
    );
  });
});

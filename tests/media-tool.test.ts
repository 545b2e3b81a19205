import { describe, expect, it } from "vitest";
import { buildConcatList, parseProbeOutput } from "../src/core/media-tool.js";

describe("parseProbeOutput", () => {
  it("reads duration and counts audio streams", () => {
    const stdout = JSON.stringify({
      streams: [{ codec_type: "audio" }, { codec_type: "video" }],
      format: { duration: "3600.052" },
    });
    expect(parseProbeOutput(stdout)).toEqual({
      durationSeconds: 3600.052,
      audioStreams: 1,
    });
  });

  it("reports zero for files without a duration", () => {
    expect(parseProbeOutput("{}")).toEqual({
      durationSeconds: 0,
      audioStreams: 0,
    });
  });
});

describe("buildConcatList", () => {
  it("quotes paths for the concat demuxer", () => {
    expect(buildConcatList(["/tmp/a.mp3", "/tmp/it's.mp3"])).toBe(
      "file '/tmp/a.mp3'\nfile '/tmp/it'\\''s.mp3'",
    );
  });
});

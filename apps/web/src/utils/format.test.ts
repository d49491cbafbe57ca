import { describe, expect, it } from "vitest";
import { formatBytes, formatDurationMs, formatMetricsLine, formatNumber, truncateEnd } from "./format";

describe("format", () => {
  it("formats counts with grouping and a dash when missing", () => {
    expect(formatNumber(1024)).toBe("1,024");
    expect(formatNumber(null)).toBe("-");
    expect(formatNumber(Number.NaN)).toBe("-");
  });

  it("formats sizes in binary steps", () => {
    expect(formatBytes(512)).toBe("512.0 B");
    expect(formatBytes(2048)).toBe("2.0 KB");
    expect(formatBytes(10485760)).toBe("10.0 MB");
    expect(formatBytes(undefined)).toBe("-");
  });

  it("formats durations from milliseconds to hours", () => {
    expect(formatDurationMs(250)).toBe("250 ms");
    expect(formatDurationMs(1200)).toBe("1.20 s");
    expect(formatDurationMs(90000)).toBe("1.50 min");
    expect(formatDurationMs(7200000)).toBe("2.00 h");
  });

  it("joins the metrics of a card into one line", () => {
    expect(formatMetricsLine({ rowsOutput: 3, spillSizeBytes: null, durationMs: 1200, raw: {} })).toBe(
      "rows 3 · spill - · time 1.20 s"
    );
  });

  it("truncates long text at the end", () => {
    expect(truncateEnd("abcdefgh", 6)).toBe("abc...");
    expect(truncateEnd("abc", 6)).toBe("abc");
  });
});

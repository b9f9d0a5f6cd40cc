import { describe, expect, it } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format.js";

describe("format", () => {
  describe("formatBytes", () => {
    it("uses decimal units", () => {
      expect(formatBytes(500)).toBe("500 B");
      expect(formatBytes(1500)).toBe("1.5 kB");
      expect(formatBytes(2_345_678)).toBe("2.35 MB");
      expect(formatBytes(1_000_000_000)).toBe("1 GB");
    });

    it("honors the decimals argument", () => {
      expect(formatBytes(1_234_567, 0)).toBe("1 MB");
      expect(formatBytes(1_234_567, 3)).toBe("1.235 MB");
    });

    it("shows nothing as 0 B", () => {
      expect(formatBytes(0)).toBe("0 B");
      expect(formatBytes(-5)).toBe("0 B");
      expect(formatBytes(Number.NaN)).toBe("0 B");
    });
  });

  describe("formatDuration", () => {
    it("formats seconds, minutes and hours", () => {
      expect(formatDuration(5000)).toBe("5s");
      expect(formatDuration(65_000)).toBe("1m 5s");
      expect(formatDuration(3_723_000)).toBe("1h 2m 3s");
    });
  });
});

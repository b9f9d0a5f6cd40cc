import { describe, expect, it, vi } from "vitest";
import { AggregateTracker } from "../../src/downloader/aggregate-tracker.js";

const URL_A = "https://files.test/a.bin";
const URL_B = "https://files.test/b.bin";

describe("AggregateTracker", () => {
  describe("countOnce", () => {
    it("adds a URL's size the first time only", () => {
      const tracker = new AggregateTracker(2);

      expect(tracker.countOnce(URL_A, 500)).toBe(true);
      expect(tracker.countOnce(URL_A, 500)).toBe(false);
      expect(tracker.countOnce(URL_B, 250)).toBe(true);

      expect(tracker.snapshot().totalBytes).toBe(750);
      expect(tracker.snapshot().countedUrls).toBe(2);
    });

    it("leaves a URL uncounted when the size is unknown", () => {
      const tracker = new AggregateTracker(1);

      expect(tracker.countOnce(URL_A, 0)).toBe(false);
      expect(tracker.isCounted(URL_A)).toBe(false);

      // a later response that declares the length still folds it in
      expect(tracker.countOnce(URL_A, 300)).toBe(true);
      expect(tracker.isCounted(URL_A)).toBe(true);
      expect(tracker.snapshot().totalBytes).toBe(300);
    });

    it("counts a URL once when many jobs race on it", async () => {
      const tracker = new AggregateTracker(50);

      await Promise.all(
        Array.from({ length: 50 }, async () => {
          await Promise.resolve();
          tracker.countOnce(URL_A, 10);
        }),
      );

      expect(tracker.snapshot().totalBytes).toBe(10);
    });
  });

  it("tracks finished and failed files", () => {
    const tracker = new AggregateTracker(3);

    tracker.recordFinished();
    tracker.recordFinished();
    tracker.recordFailed();

    expect(tracker.snapshot()).toEqual({
      totalBytes: 0,
      countedUrls: 0,
      totalFiles: 3,
      finishedFiles: 2,
      failedFiles: 1,
    });
  });

  it("notifies the observer on every change", () => {
    const onAggregateChange = vi.fn();
    const tracker = new AggregateTracker(3, { onAggregateChange });

    tracker.countOnce(URL_A, 100);
    tracker.countOnce(URL_A, 100);
    tracker.recordFinished();

    expect(onAggregateChange).toHaveBeenCalledTimes(2);
    expect(onAggregateChange).toHaveBeenLastCalledWith({
      totalBytes: 100,
      countedUrls: 1,
      totalFiles: 3,
      finishedFiles: 1,
      failedFiles: 0,
    });
  });
});

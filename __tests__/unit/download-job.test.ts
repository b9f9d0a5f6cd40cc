import path from "path";
import { describe, expect, it } from "vitest";
import {
  FALLBACK_FILE_NAME,
  createDownloadJob,
  fileNameFromUrl,
} from "../../src/downloader/download-job.js";

describe("download-job", () => {
  describe("fileNameFromUrl", () => {
    it("uses the last path segment", () => {
      expect(fileNameFromUrl("https://files.test/isos/disk.iso")).toBe("disk.iso");
    });

    it("decodes the segment and ignores the query", () => {
      expect(fileNameFromUrl("https://files.test/dir/My%20File.zip?x=1")).toBe(
        "My File.zip",
      );
    });

    it("keeps a segment that is not valid percent-encoding", () => {
      expect(fileNameFromUrl("https://files.test/bad%E0%A4%A")).toBe("bad%E0%A4%A");
    });

    it("strips directories smuggled in through encoded slashes", () => {
      expect(fileNameFromUrl("https://files.test/a/..%2F..%2Fetc%2Fpasswd")).toBe(
        "passwd",
      );
    });

    it("falls back when there is no usable segment", () => {
      expect(fileNameFromUrl("https://files.test/")).toBe(FALLBACK_FILE_NAME);
      expect(fileNameFromUrl("https://files.test")).toBe(FALLBACK_FILE_NAME);
      expect(fileNameFromUrl("not a url")).toBe(FALLBACK_FILE_NAME);
    });
  });

  it("derives destination and partial paths", () => {
    const dest = path.join("tmp", "downloads");
    const job = createDownloadJob(3, "https://files.test/x/file.iso", dest);

    expect(job).toEqual({
      id: 3,
      url: "https://files.test/x/file.iso",
      fileName: "file.iso",
      destPath: path.join(dest, "file.iso"),
      tempPath: path.join(dest, "file.iso.part"),
      resumeOffset: 0,
      expectedSize: 0,
    });
  });
});

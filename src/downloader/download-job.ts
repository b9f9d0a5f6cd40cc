import path from "path";
import type { DownloadJob } from "./types.js";

export const FALLBACK_FILE_NAME = "downloaded_file";
export const PART_SUFFIX = ".part";

/**
 * File name for a URL: its last path segment, decoded, or a fallback
 * when the URL has no usable segment.
 */
export function fileNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return FALLBACK_FILE_NAME;
  }

  const segment = pathname.split("/").pop() ?? "";
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // keep the raw segment when it is not valid percent-encoding
  }

  const name = path.basename(decoded.replace(/\\/g, "/"));
  if (name === "" || name === "." || name === "..") {
    return FALLBACK_FILE_NAME;
  }
  return name;
}

export function createDownloadJob(
  id: number,
  url: string,
  destDir: string,
): DownloadJob {
  const fileName = fileNameFromUrl(url);
  const destPath = path.join(destDir, fileName);
  return {
    id,
    url,
    fileName,
    destPath,
    tempPath: `${destPath}${PART_SUFFIX}`,
    resumeOffset: 0,
    expectedSize: 0,
  };
}

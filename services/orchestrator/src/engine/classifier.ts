import path from "node:path";

import type { Classification, FileBuckets, MediaCategory, SourceFile } from "../types.js";

const EXTENSION_CATEGORIES: ReadonlyMap<string, MediaCategory> = new Map([
  [".png", "image"],
  [".jpg", "image"],
  [".jpeg", "image"],
  [".gif", "image"],
  [".mp4", "video"],
  [".mov", "video"],
  [".avi", "video"],
  [".mkv", "video"],
  [".mp3", "audio"],
  [".wav", "audio"],
  [".m4a", "audio"],
  [".txt", "document"],
  [".pdf", "document"],
  [".docx", "document"],
]);

export const MEDIA_CATEGORIES: readonly MediaCategory[] = ["image", "audio", "video", "document"];

export function classify(filePath: string): Classification {
  return EXTENSION_CATEGORIES.get(path.extname(filePath).toLowerCase()) ?? "unsupported";
}

export interface UploadedFile {
  path: string;
  displayName?: string;
}

/**
 * Classifies uploads by their display name (falling back to the path).
 * Unsupported files are dropped and never reach the scheduler.
 */
export function toSourceFiles(uploads: readonly UploadedFile[]): SourceFile[] {
  const files: SourceFile[] = [];
  for (const upload of uploads) {
    const displayName = upload.displayName ?? path.basename(upload.path);
    const category = classify(displayName);
    if (category === "unsupported") {
      continue;
    }
    files.push({ path: upload.path, displayName, category });
  }
  return files;
}

export function bucketFiles(files: readonly SourceFile[]): FileBuckets {
  const buckets: FileBuckets = { image: [], audio: [], video: [], document: [] };
  for (const file of files) {
    buckets[file.category].push(file);
  }
  return buckets;
}

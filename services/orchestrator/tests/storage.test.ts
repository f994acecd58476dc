import { rm } from "node:fs/promises";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { InMemoryCaseRepository } from "../src/repository/memory.repository.js";
import { InMemoryStorageService } from "../src/storage/memory.storage.js";
import { contentTypeFor, S3StorageService } from "../src/storage/s3.storage.js";
import { sanitizeFileName } from "../src/http/upload-options.js";
import { makeWorkDir, writeFixture } from "./helpers.js";

let workDir: string;

beforeAll(async () => {
  workDir = await makeWorkDir();
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("InMemoryStorageService", () => {
  it("stores file bytes under the folder", async () => {
    const storage = new InMemoryStorageService();
    const filePath = await writeFixture(workDir, "note.txt", "hello");

    const stored = await storage.store(filePath, "note.txt", "case-1");

    expect(stored).toEqual({ name: "note.txt", folder: "case-1", size: 5, location: "memory://case-1/note.txt" });
    expect(storage.get("case-1", "note.txt")?.data.toString()).toBe("hello");
  });
});

describe("S3StorageService", () => {
  it("builds keys from prefix, folder and name", () => {
    const storage = new S3StorageService({ bucket: "evidence", region: "us-east-1", prefix: "cases/" });
    expect(storage.buildKey("case-1", "clip.mp4")).toBe("cases/case-1/clip.mp4");
  });

  it("requires a bucket", () => {
    expect(() => new S3StorageService({})).toThrow("OBJECT_BUCKET must be configured");
  });

  it("guesses content types from the extension", () => {
    expect(contentTypeFor("clip.MP4")).toBe("video/mp4");
    expect(contentTypeFor("notes")).toBe("application/octet-stream");
  });
});

describe("InMemoryCaseRepository", () => {
  it("saves and finds records", async () => {
    const repository = new InMemoryCaseRepository();
    const createdAt = new Date("2024-05-01T10:00:00.000Z");
    await repository.save({
      caseId: "case-1",
      status: "completed",
      files: [{ fileName: "note.txt", storageLocation: "memory://case-1/note.txt" }],
      output: {
        sessionId: "case-1",
        results: [],
        aggregateText: "",
        fileSummaries: [],
        finalSummary: "AI key missing.",
        entities: [],
        relations: [],
        proofHash: "abc",
      },
      createdAt,
    });

    const found = await repository.find("case-1");

    expect(found?.files).toEqual([{ fileName: "note.txt", storageLocation: "memory://case-1/note.txt" }]);
    expect(found?.createdAt.toISOString()).toBe("2024-05-01T10:00:00.000Z");
    await expect(repository.find("missing")).resolves.toBeUndefined();
  });

  it("keeps stored cases apart from the caller's objects", async () => {
    const repository = new InMemoryCaseRepository();
    const output = {
      sessionId: "case-2",
      results: [{ fileName: "memo.txt", category: "document" as const, error: "timed out" }],
      aggregateText: "",
      fileSummaries: ["memo.txt: DANGER SCORE 0/100."],
      finalSummary: "original",
      entities: [],
      relations: [],
      proofHash: "def",
    };
    await repository.save({ caseId: "case-2", status: "completed", files: [], output, createdAt: new Date() });

    output.finalSummary = "changed";
    output.fileSummaries.push("extra");
    const first = await repository.find("case-2");
    if (first && "fileSummaries" in first.output) {
      first.output.fileSummaries.length = 0;
    }
    const second = await repository.find("case-2");

    expect(second?.output).toMatchObject({
      finalSummary: "original",
      fileSummaries: ["memo.txt: DANGER SCORE 0/100."],
    });
  });
});

describe("sanitizeFileName", () => {
  it("keeps a safe base name", () => {
    expect(sanitizeFileName("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFileName("C:\\Users\\me\\My Report (v2).pdf")).toBe("My_Report_v2.pdf");
    expect(sanitizeFileName(".hidden.txt")).toBe("hidden.txt");
    expect(sanitizeFileName("???")).toBe("upload");
  });
});

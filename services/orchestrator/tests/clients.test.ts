import { rm } from "node:fs/promises";

import nock from "nock";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";

import { defaultWait } from "../src/clients/http.js";
import { extractJson } from "../src/clients/json-extraction.js";
import { GeminiLlmClient } from "../src/clients/llm.client.js";
import { TamperDetectionClient } from "../src/clients/tamper.client.js";
import { TranscriptionClient } from "../src/clients/transcription.client.js";
import { ConfigurationError, ProviderError } from "../src/errors.js";
import { makeWorkDir, testConfig, writeFixture } from "./helpers.js";

let workDir: string;
let photoPath: string;
let audioPath: string;

beforeAll(async () => {
  nock.disableNetConnect();
  workDir = await makeWorkDir();
  photoPath = await writeFixture(workDir, "photo.png", "image-bytes");
  audioPath = await writeFixture(workDir, "call.mp3", "audio-bytes");
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(async () => {
  nock.enableNetConnect();
  await rm(workDir, { recursive: true, force: true });
});

describe("TamperDetectionClient", () => {
  it("uploads through a presigned URL and polls until the result is ready", async () => {
    const api = nock("https://tamper.test")
      .post("/api/files/aws-presigned", { fileName: "photo.png" })
      .matchHeader("x-api-key", "test-key")
      .reply(200, {
        response: { signedUrl: "https://uploads.test/bucket/photo.png?x-amz-meta-requestid=req-42" },
      })
      .get("/api/media/users/req-42")
      .reply(404)
      .get("/api/media/users/req-42")
      .reply(200, { resultsSummary: { status: "ANALYZING" } })
      .get("/api/media/users/req-42")
      .reply(200, { resultsSummary: { status: "MANIPULATED", metadata: { finalScore: 81 } } });
    const upload = nock("https://uploads.test")
      .put("/bucket/photo.png")
      .query(true)
      .reply(200);

    const result = await new TamperDetectionClient(testConfig()).analyze(photoPath);

    expect(result).toEqual({ requestId: "req-42", status: "MANIPULATED", tamperingPercentage: 81 });
    expect(api.isDone()).toBe(true);
    expect(upload.isDone()).toBe(true);
  });

  it("gives up after the configured number of checks", async () => {
    nock("https://tamper.test")
      .post("/api/files/aws-presigned")
      .reply(200, { signedUrl: "https://uploads.test/p", requestId: "req-7" })
      .get("/api/media/users/req-7")
      .times(2)
      .reply(200, { overallStatus: "PROCESSING" });
    nock("https://uploads.test").put("/p").reply(200);

    const client = new TamperDetectionClient(testConfig({ TAMPER_MAX_POLLS: "2" }));

    await expect(client.analyze(photoPath)).rejects.toThrow("Analysis req-7 did not complete in time");
  });

  it("reports failed uploads", async () => {
    nock("https://tamper.test")
      .post("/api/files/aws-presigned")
      .reply(200, { signedUrl: "https://uploads.test/p", requestId: "req-8" });
    nock("https://uploads.test").put("/p").reply(403, "expired");

    await expect(new TamperDetectionClient(testConfig()).analyze(photoPath)).rejects.toThrow(
      "Upload failed 403: expired",
    );
  });

  it("requires an API key", async () => {
    const client = new TamperDetectionClient(testConfig({ TAMPER_API_KEY: undefined }));
    await expect(client.analyze(photoPath)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe("TranscriptionClient", () => {
  it("uploads, requests a transcript and waits for completion", async () => {
    const scope = nock("https://transcribe.test")
      .post("/v2/upload")
      .matchHeader("authorization", "test-key")
      .reply(200, { upload_url: "https://cdn.test/a1" })
      .post("/v2/transcript", (body: Record<string, unknown>) =>
        body.audio_url === "https://cdn.test/a1" && body.speaker_labels === true && body.sentiment_analysis === true)
      .reply(200, { id: "tr-1", status: "queued" })
      .get("/v2/transcript/tr-1")
      .reply(200, { id: "tr-1", status: "processing" })
      .get("/v2/transcript/tr-1")
      .reply(200, {
        id: "tr-1",
        status: "completed",
        text: "Hello there",
        utterances: [{ speaker: "A", text: "Hello there", start: 0, end: 900 }],
        sentiment_analysis_results: [{ text: "Hello there", sentiment: "POSITIVE", confidence: 0.9 }],
      });

    const report = await new TranscriptionClient(testConfig()).transcribe(audioPath, "test-key");

    expect(report).toEqual({
      transcriptId: "tr-1",
      text: "Hello there",
      utterances: [{ speaker: "A", text: "Hello there", start: 0, end: 900 }],
      sentiment: [{ text: "Hello there", sentiment: "POSITIVE", confidence: 0.9 }],
    });
    expect(scope.isDone()).toBe(true);
  });

  it("surfaces transcription errors", async () => {
    nock("https://transcribe.test")
      .post("/v2/upload")
      .reply(200, { upload_url: "https://cdn.test/a2" })
      .post("/v2/transcript")
      .reply(200, { id: "tr-2", status: "processing" })
      .get("/v2/transcript/tr-2")
      .reply(200, { id: "tr-2", status: "error", error: "unsupported codec" });

    await expect(new TranscriptionClient(testConfig()).transcribe(audioPath, "test-key")).rejects.toThrow(
      "Transcription failed: unsupported codec",
    );
  });

  it("wraps HTTP failures in provider errors", async () => {
    nock("https://transcribe.test").post("/v2/upload").reply(401, "invalid key");

    const attempt = new TranscriptionClient(testConfig()).transcribe(audioPath, "test-key");

    await expect(attempt).rejects.toBeInstanceOf(ProviderError);
    await expect(attempt).rejects.toThrow("transcription API error: 401 invalid key");
  });
});

describe("GeminiLlmClient", () => {
  const endpoint = "/v1beta/models/gemini-2.5-flash:generateContent";

  it("joins candidate parts and requests JSON when a schema is given", async () => {
    const scope = nock("https://llm.test")
      .post(endpoint, (body: { generationConfig?: Record<string, unknown> }) =>
        body.generationConfig?.responseMimeType === "application/json"
        && body.generationConfig.temperature === 0)
      .matchHeader("x-goog-api-key", "test-key")
      .reply(200, { candidates: [{ content: { parts: [{ text: '{"a":' }, { text: "1}" }] } }] });

    const response = await new GeminiLlmClient(testConfig()).invoke({
      systemPrompt: "system",
      userMessage: "user",
      jsonSchema: { type: "OBJECT" },
      temperature: 0,
    });

    expect(response).toEqual({ content: '{"a":1}' });
    expect(scope.isDone()).toBe(true);
  });

  it("rejects empty candidates", async () => {
    nock("https://llm.test").post(endpoint).reply(200, { candidates: [] });

    await expect(
      new GeminiLlmClient(testConfig()).invoke({ systemPrompt: "s", userMessage: "u" }),
    ).rejects.toThrow("Language model returned no content (no candidates)");
  });

  it("reports API errors", async () => {
    nock("https://llm.test").post(endpoint).reply(500, "quota");

    await expect(
      new GeminiLlmClient(testConfig()).invoke({ systemPrompt: "s", userMessage: "u" }),
    ).rejects.toThrow("llm API error: 500 quota");
  });

  it("is unconfigured without a key", async () => {
    const client = new GeminiLlmClient(testConfig({ LLM_API_KEY: undefined }));

    expect(client.isConfigured()).toBe(false);
    await expect(client.invoke({ systemPrompt: "s", userMessage: "u" })).rejects.toThrow("LLM_API_KEY is not set");
  });
});

describe("extractJson", () => {
  it("parses plain JSON", () => {
    expect(extractJson(' {"finalSummary": "ok"} ')).toEqual({ finalSummary: "ok" });
  });

  it("parses fenced JSON", () => {
    expect(extractJson('Here you go:\n```json\n{"a": [1, 2]}\n```')).toEqual({ a: [1, 2] });
  });

  it("finds the first balanced object in prose", () => {
    expect(extractJson('Result: {"a": "brace } inside", "b": {"c": 1}} trailing')).toEqual({
      a: "brace } inside",
      b: { c: 1 },
    });
  });

  it("throws when nothing parses", () => {
    expect(() => extractJson("no json here")).toThrow(SyntaxError);
  });
});

describe("cancellation", () => {
  it("rejects a wait as soon as the signal fires", async () => {
    const controller = new AbortController();
    const wait = defaultWait(10_000, controller.signal);

    controller.abort();

    await expect(wait).rejects.toMatchObject({ name: "AbortError" });
  });

  it("does not contact the detector once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const api = nock("https://tamper.test").post("/api/files/aws-presigned").reply(200, {});

    await expect(new TamperDetectionClient(testConfig()).analyze(photoPath, controller.signal))
      .rejects.toThrow("tamper-detector request cancelled");
    expect(api.isDone()).toBe(false);
  });

  it("does not upload audio once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const api = nock("https://transcribe.test").post("/v2/upload").reply(200, { upload_url: "https://cdn.test/a" });

    await expect(new TranscriptionClient(testConfig()).transcribe(audioPath, "test-key", controller.signal))
      .rejects.toThrow("transcription request cancelled");
    expect(api.isDone()).toBe(false);
  });
});

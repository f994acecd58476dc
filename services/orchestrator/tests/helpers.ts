import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { LlmClient, LlmRequest, LlmResponse } from "../src/clients/llm.client.js";
import { loadConfig, type AppConfig } from "../src/config.js";

export function testConfig(env: Record<string, string | undefined> = {}): AppConfig {
  return loadConfig({
    TAMPER_API_URL: "https://tamper.test",
    TAMPER_API_KEY: "test-key",
    TAMPER_POLL_INTERVAL_MS: "1",
    TAMPER_MAX_POLLS: "5",
    TRANSCRIPTION_API_URL: "https://transcribe.test/v2",
    TRANSCRIPTION_API_KEY: "test-key",
    TRANSCRIPTION_POLL_INTERVAL_MS: "1",
    TRANSCRIPTION_MAX_POLLS: "5",
    LLM_API_URL: "https://llm.test/v1beta",
    LLM_API_KEY: "test-key",
    ...env,
  });
}

type Responder = (request: LlmRequest) => string | Promise<string>;

/** In-process language model that answers from a callback and records every request. */
export class StubLlmClient implements LlmClient {
  readonly requests: LlmRequest[] = [];

  constructor(private readonly responder: Responder, private readonly configured = true) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    this.requests.push(request);
    return { content: await this.responder(request) };
  }
}

export async function makeWorkDir(prefix = "orchestrator-test-"): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function writeFixture(dir: string, name: string, content: string | Buffer): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, content);
  return filePath;
}

export const RISKY_PHRASE = "Wire the money tonight or the account gets frozen.";
export const META_SUMMARY = "doc2.txt pressures the reader to wire money; doc1.txt is routine.";

/**
 * Scores documents 90 when they contain {@link RISKY_PHRASE} and 5 otherwise;
 * answers meta prompts with {@link META_SUMMARY}.
 */
export function scriptedForensicLlm(): StubLlmClient {
  return new StubLlmClient((request) => {
    if (!request.jsonSchema) {
      return JSON.stringify({
        finalSummary: META_SUMMARY,
        entities: [{ name: "account", type: "asset" }],
        relations: [],
      });
    }
    const dangerScore = request.userMessage.includes(RISKY_PHRASE) ? 90 : 5;
    return JSON.stringify({
      misinformationAnalysis: { dangerScore, flags: [], explanation: `score ${dangerScore}` },
      summary: dangerScore > 50 ? "Coercive payment request." : "Routine note.",
      finalReport: { findings: "", recommendations: "" },
    });
  });
}

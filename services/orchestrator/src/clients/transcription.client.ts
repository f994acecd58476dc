import { readFile } from "node:fs/promises";

import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import { ProviderError } from "../errors.js";
import type { AudioReport } from "../types.js";
import { APP_CONFIG } from "../tokens.js";
import { callProvider, defaultWait, joinUrl, readJson } from "./http.js";

const uploadSchema = z.object({ upload_url: z.string().min(1) });

const transcriptSchema = z.object({
  id: z.string(),
  status: z.enum(["queued", "processing", "completed", "error", "failed"]),
  text: z.string().nullish(),
  error: z.string().nullish(),
  utterances: z
    .array(
      z.object({
        speaker: z.union([z.string(), z.number()]).transform(String),
        text: z.string(),
        start: z.number().optional(),
        end: z.number().optional(),
      }),
    )
    .nullish(),
  sentiment_analysis_results: z
    .array(
      z.object({
        text: z.string(),
        sentiment: z.string(),
        confidence: z.number().optional(),
      }),
    )
    .nullish(),
});

type Transcript = z.infer<typeof transcriptSchema>;

const PROVIDER = "transcription";

const DEFAULT_FEATURES = {
  sentiment_analysis: true,
  speaker_labels: true,
  punctuate: true,
  format_text: true,
};

@Injectable()
export class TranscriptionClient {
  private readonly logger = new Logger(TranscriptionClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async transcribe(filePath: string, apiKey: string, signal?: AbortSignal): Promise<AudioReport> {
    const settings = this.config.transcription;
    const callOptions = { provider: PROVIDER, timeoutMs: settings.timeoutMs, signal };

    const audio = await readFile(filePath);
    const upload = uploadSchema.parse(
      await callProvider(
        joinUrl(settings.baseUrl, "upload"),
        {
          method: "POST",
          headers: { authorization: apiKey, "Content-Type": "application/octet-stream" },
          body: audio,
        },
        callOptions,
        (response) => readJson(PROVIDER, response),
      ),
    );

    const created = transcriptSchema.parse(
      await callProvider(
        joinUrl(settings.baseUrl, "transcript"),
        {
          method: "POST",
          headers: { authorization: apiKey, "Content-Type": "application/json" },
          body: JSON.stringify({ audio_url: upload.upload_url, ...DEFAULT_FEATURES }),
        },
        callOptions,
        (response) => readJson(PROVIDER, response),
      ),
    );

    const completed = await this.waitForCompletion(created, apiKey, signal);
    return {
      transcriptId: completed.id,
      text: completed.text ?? "",
      utterances: completed.utterances ?? [],
      sentiment: completed.sentiment_analysis_results ?? [],
    };
  }

  private async waitForCompletion(
    initial: Transcript,
    apiKey: string,
    signal?: AbortSignal,
  ): Promise<Transcript> {
    const settings = this.config.transcription;
    let status = initial;
    let attempts = 0;

    while (
      (status.status === "queued" || status.status === "processing")
      && attempts < settings.maxStatusChecks
    ) {
      await defaultWait(settings.pollingIntervalMs, signal);
      status = transcriptSchema.parse(
        await callProvider(
          joinUrl(settings.baseUrl, `transcript/${encodeURIComponent(initial.id)}`),
          { method: "GET", headers: { authorization: apiKey } },
          { provider: PROVIDER, timeoutMs: settings.timeoutMs, signal },
          (response) => readJson(PROVIDER, response),
        ),
      );
      attempts += 1;
    }

    if (status.status === "completed") {
      return status;
    }
    if (status.status === "error" || status.status === "failed") {
      throw new ProviderError(PROVIDER, `Transcription failed: ${status.error ?? "unknown error"}`);
    }
    this.logger.warn(`Transcript ${initial.id} still ${status.status} after ${attempts} checks`);
    throw new ProviderError(PROVIDER, `Transcript ${initial.id} did not complete in time`);
  }
}

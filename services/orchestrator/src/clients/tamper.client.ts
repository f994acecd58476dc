import { readFile } from "node:fs/promises";
import path from "node:path";

import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import { ConfigurationError, ProviderError } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";
import { callProvider, defaultWait, joinUrl, readJson } from "./http.js";

const presignSchema = z.object({
  response: z
    .object({
      signedUrl: z.string().optional(),
      requestId: z.string().optional(),
    })
    .nullish(),
  signedUrl: z.string().optional(),
  url: z.string().optional(),
  requestId: z.string().optional(),
  mediaId: z.string().optional(),
});

const mediaDetailSchema = z.object({
  overallStatus: z.string().nullish(),
  resultsSummary: z
    .object({
      status: z.string().nullish(),
      metadata: z
        .object({
          finalScore: z.number().nullish(),
        })
        .passthrough()
        .nullish(),
    })
    .passthrough()
    .nullish(),
});

const PENDING_STATUSES = new Set(["ANALYZING", "PROCESSING", "QUEUED"]);
const PROVIDER = "tamper-detector";

export interface TamperDetection {
  requestId: string;
  tamperingPercentage: number;
  status: string;
}

@Injectable()
export class TamperDetectionClient {
  private readonly logger = new Logger(TamperDetectionClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async analyze(filePath: string, signal?: AbortSignal): Promise<TamperDetection> {
    const settings = this.config.tamper;
    const apiKey = settings.apiKey;
    if (!apiKey) {
      throw new ConfigurationError("TAMPER_API_KEY is not set");
    }
    const fileName = path.basename(filePath);
    const headers = { "X-API-KEY": apiKey, "Content-Type": "application/json" };
    const callOptions = { provider: PROVIDER, timeoutMs: settings.timeoutMs, signal };

    const presign = presignSchema.parse(
      await callProvider(
        joinUrl(settings.baseUrl, "api/files/aws-presigned"),
        { method: "POST", headers, body: JSON.stringify({ fileName }) },
        callOptions,
        (response) => readJson(PROVIDER, response),
      ),
    );
    const signedUrl = presign.response?.signedUrl ?? presign.signedUrl ?? presign.url;
    if (!signedUrl) {
      throw new ProviderError(PROVIDER, "Failed to obtain a presigned upload URL");
    }

    const content = await readFile(filePath);
    await callProvider(
      signedUrl,
      { method: "PUT", body: content },
      callOptions,
      async (response) => {
        if (!response.ok) {
          const text = await response.text();
          throw new ProviderError(PROVIDER, `Upload failed ${response.status}: ${text.slice(0, 200)}`, response.status);
        }
      },
    );

    const requestId = presign.requestId
      ?? presign.response?.requestId
      ?? presign.mediaId
      ?? requestIdFromSignedUrl(signedUrl);
    if (!requestId) {
      throw new ProviderError(PROVIDER, "Request id missing from detector response");
    }

    return this.pollResult(requestId, apiKey, signal);
  }

  private async pollResult(requestId: string, apiKey: string, signal?: AbortSignal): Promise<TamperDetection> {
    const settings = this.config.tamper;
    const url = joinUrl(settings.baseUrl, `api/media/users/${encodeURIComponent(requestId)}`);

    for (let attempt = 0; attempt < settings.maxStatusChecks; attempt += 1) {
      const detail = await callProvider(
        url,
        { method: "GET", headers: { "X-API-KEY": apiKey } },
        { provider: PROVIDER, timeoutMs: settings.timeoutMs, signal },
        async (response) => (response.status === 404 ? undefined : readJson(PROVIDER, response)),
      );

      if (detail !== undefined) {
        const parsed = mediaDetailSchema.parse(detail);
        const status = parsed.resultsSummary?.status ?? parsed.overallStatus ?? undefined;
        if (status && !PENDING_STATUSES.has(status)) {
          return {
            requestId,
            status,
            tamperingPercentage: parsed.resultsSummary?.metadata?.finalScore ?? 0,
          };
        }
      }

      await defaultWait(settings.pollingIntervalMs, signal);
    }

    this.logger.warn(`Detector result for ${requestId} not ready after ${settings.maxStatusChecks} checks`);
    throw new ProviderError(PROVIDER, `Analysis ${requestId} did not complete in time`);
  }
}

function requestIdFromSignedUrl(signedUrl: string): string | undefined {
  try {
    return new URL(signedUrl).searchParams.get("x-amz-meta-requestid") ?? undefined;
  } catch {
    return undefined;
  }
}

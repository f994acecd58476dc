import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import { ConfigurationError, ProviderError } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";
import { callProvider, joinUrl, readJson } from "./http.js";

export interface LlmAttachment {
  mimeType: string;
  data: Buffer;
}

export interface LlmRequest {
  systemPrompt: string;
  userMessage: string;
  jsonSchema?: Record<string, unknown>;
  attachments?: LlmAttachment[];
  temperature?: number;
  signal?: AbortSignal;
}

export interface LlmResponse {
  content: string;
}

export interface LlmClient {
  isConfigured(): boolean;
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
});

const PROVIDER = "llm";

@Injectable()
export class GeminiLlmClient implements LlmClient {
  private readonly logger = new Logger(GeminiLlmClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  isConfigured(): boolean {
    return Boolean(this.config.llm.apiKey);
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    const settings = this.config.llm;
    if (!settings.apiKey) {
      throw new ConfigurationError("LLM_API_KEY is not set");
    }

    const parts: Array<Record<string, unknown>> = [{ text: request.userMessage }];
    for (const attachment of request.attachments ?? []) {
      parts.push({
        inlineData: {
          mimeType: attachment.mimeType,
          data: attachment.data.toString("base64"),
        },
      });
    }

    const generationConfig: Record<string, unknown> = {
      temperature: request.temperature ?? 0.2,
    };
    if (request.jsonSchema) {
      generationConfig.responseMimeType = "application/json";
      generationConfig.responseSchema = request.jsonSchema;
    }

    this.logger.debug(`Invoking ${settings.model} (prompt ${request.userMessage.length} chars)`);

    const json = await callProvider(
      joinUrl(settings.baseUrl, `models/${settings.model}:generateContent`),
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": settings.apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: request.systemPrompt }] },
          contents: [{ role: "user", parts }],
          generationConfig,
        }),
      },
      { provider: PROVIDER, timeoutMs: settings.timeoutMs, signal: request.signal },
      (response) => readJson(PROVIDER, response),
    );

    const parsed = generateContentSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER, "Unexpected response shape from language model");
    }

    const content = (parsed.data.candidates[0]?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("");
    if (!content) {
      const reason = parsed.data.candidates[0]?.finishReason ?? "no candidates";
      throw new ProviderError(PROVIDER, `Language model returned no content (${reason})`);
    }
    return { content };
  }
}

import { readFile } from "node:fs/promises";
import path from "node:path";

import { Inject, Injectable, Logger } from "@nestjs/common";

import type { LlmClient } from "../clients/llm.client.js";
import { TamperDetectionClient } from "../clients/tamper.client.js";
import { describeError } from "../errors.js";
import type { ImageReport } from "../types.js";
import { LLM_CLIENT } from "../tokens.js";

export const NO_EXPLANATION = "No explanation available.";

const ORIGINAL_BELOW = 25;
const MANIPULATED_FROM = 60;

export function verdictForTampering(tamperingPercentage: number): string {
  if (tamperingPercentage < ORIGINAL_BELOW) {
    return "Likely Original";
  }
  if (tamperingPercentage < MANIPULATED_FROM) {
    return "Possibly Manipulated";
  }
  return "Likely Deepfake / Manipulated";
}

export function authenticityFromTampering(tamperingPercentage: number): number {
  const score = Math.max(0, Math.min(1, (100 - tamperingPercentage) / 100));
  return Number(score.toFixed(2));
}

function imageMimeType(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".jpg" || ext === ".jpeg") {
    return "image/jpeg";
  }
  if (ext === ".gif") {
    return "image/gif";
  }
  return "image/png";
}

export interface TamperOptions {
  /** Ask the language model for a plain-language explanation. */
  explain?: boolean;
  signal?: AbortSignal;
}

@Injectable()
export class ImageTamperService {
  private readonly logger = new Logger(ImageTamperService.name);

  constructor(
    @Inject(TamperDetectionClient) private readonly detector: TamperDetectionClient,
    @Inject(LLM_CLIENT) private readonly llm: LlmClient,
  ) {}

  async detectImageTamper(filePath: string, options: TamperOptions = {}): Promise<ImageReport> {
    const detection = await this.detector.analyze(filePath, options.signal);
    const tamperingPercentage = detection.tamperingPercentage;
    const explanation = options.explain === false
      ? ""
      : await this.explain(filePath, tamperingPercentage, options.signal);

    return {
      verdict: verdictForTampering(tamperingPercentage),
      authenticityScore: authenticityFromTampering(tamperingPercentage),
      tamperingPercentage,
      explanation,
    };
  }

  private async explain(
    filePath: string,
    tamperingPercentage: number,
    signal?: AbortSignal,
  ): Promise<string> {
    if (!this.llm.isConfigured()) {
      return NO_EXPLANATION;
    }
    try {
      const image = await readFile(filePath);
      const response = await this.llm.invoke({
        systemPrompt: "You are a deepfake detection expert writing for a non-technical reader.",
        userMessage: [
          "The tamperingPercentage is the estimated probability this media is manipulated (0 = none, 100 = highly manipulated).",
          `The tamperingPercentage is: ${tamperingPercentage}%`,
          "Write a concise 5-7 sentence report that mentions the percentage.",
          "If it looks real, explain why visually (texture, lighting consistency, edges).",
          "If manipulated, explain what looks fake or mismatched.",
          "Do not name any detection vendor or model. Return plain English text, not JSON.",
        ].join("\n"),
        attachments: [{ mimeType: imageMimeType(filePath), data: image }],
        signal,
      });
      return response.content.trim() || NO_EXPLANATION;
    } catch (error) {
      this.logger.warn(`Explanation failed for ${path.basename(filePath)}: ${describeError(error)}`);
      return NO_EXPLANATION;
    }
  }
}

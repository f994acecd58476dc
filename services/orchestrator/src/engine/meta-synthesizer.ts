import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { extractJson } from "../clients/json-extraction.js";
import type { LlmClient } from "../clients/llm.client.js";
import { describeError } from "../errors.js";
import type { MetaReport } from "../types.js";
import { LLM_CLIENT } from "../tokens.js";

export const EVIDENCE_CHAR_LIMIT = 25_000;
export const RAW_SUMMARY_CHAR_LIMIT = 500;

const metaReportSchema = z.object({
  finalSummary: z.string(),
  entities: z.array(z.unknown()).default([]),
  relations: z.array(z.unknown()).default([]),
});

const META_SYSTEM_PROMPT =
  "You are the Meta-Investigator. Correlate the evidence across all files. "
  + "Return JSON: {finalSummary: string, entities: array, relations: array}.";

export function buildMetaPrompt(
  aggregateText: string,
  instructions: string,
  fileSummaries: readonly string[],
): string {
  return [
    `USER INSTRUCTIONS: ${instructions}`,
    `FILE SUMMARIES: ${JSON.stringify(fileSummaries, null, 2)}`,
    `EVIDENCE: ${aggregateText.slice(0, EVIDENCE_CHAR_LIMIT)}`,
  ].join("\n");
}

function fallbackReport(finalSummary: string): MetaReport {
  return { finalSummary, entities: [], relations: [] };
}

@Injectable()
export class MetaSynthesizer {
  private readonly logger = new Logger(MetaSynthesizer.name);

  constructor(@Inject(LLM_CLIENT) private readonly llm: LlmClient) {}

  async synthesize(
    aggregateText: string,
    instructions: string,
    fileSummaries: readonly string[],
  ): Promise<MetaReport> {
    if (!this.llm.isConfigured()) {
      return fallbackReport("AI key missing.");
    }

    this.logger.log("Generating meta intelligence");
    let raw: string;
    try {
      const response = await this.llm.invoke({
        systemPrompt: META_SYSTEM_PROMPT,
        userMessage: buildMetaPrompt(aggregateText, instructions, fileSummaries),
      });
      raw = response.content;
    } catch (error) {
      this.logger.error(`Meta synthesis call failed: ${describeError(error)}`);
      return fallbackReport(`Meta synthesis failed: ${describeError(error)}`);
    }

    let candidate: unknown;
    try {
      candidate = extractJson(raw);
    } catch {
      this.logger.warn("Meta synthesis returned non-JSON output; keeping raw text");
      return fallbackReport(raw.slice(0, RAW_SUMMARY_CHAR_LIMIT));
    }
    const parsed = metaReportSchema.safeParse(candidate);
    if (!parsed.success) {
      this.logger.warn("Meta synthesis output did not match the report shape; keeping raw text");
      return fallbackReport(raw.slice(0, RAW_SUMMARY_CHAR_LIMIT));
    }
    return parsed.data;
  }
}

import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { extractJson } from "../clients/json-extraction.js";
import type { LlmClient } from "../clients/llm.client.js";
import { ConfigurationError, describeError } from "../errors.js";
import type { DocumentRiskReport, SourceFile } from "../types.js";
import { LLM_CLIENT } from "../tokens.js";
import { failed, succeeded, type AnalysisAdapter, type AnalysisOutcome } from "./adapter.js";
import { extractDocumentText, wrapDocumentText } from "./document-text.js";

export const NEEDS_REVIEW_SCORE = 50;

const text = z.string().default("");

export const documentRiskSchema = z.object({
  misinformationAnalysis: z.object({
    dangerScore: z.number().min(0).max(100),
    flags: z.array(z.object({ claim: text, reasoning: text })).default([]),
    explanation: text,
  }),
  summary: text,
  toneAnalysis: z.object({ detectedTone: text }).optional(),
  contentAnalysis: z
    .object({
      sensitiveInfo: z.array(z.object({ type: text, text })).default([]),
      inappropriateContent: z.array(z.string()).default([]),
    })
    .optional(),
  keywordDetection: z
    .object({
      keywordsFound: z.array(z.object({ keyword: text, context: text })).default([]),
    })
    .optional(),
  factChecking: z
    .object({
      claims: z.array(z.object({ claim: text, verification: text, source: text })).default([]),
    })
    .optional(),
  finalReport: z
    .object({ findings: text, recommendations: text })
    .default({ findings: "", recommendations: "" }),
});

const stringField = { type: "STRING" } as const;

/** Response schema handed to the model's structured-output mode. */
export const DOCUMENT_RISK_RESPONSE_SCHEMA: Record<string, unknown> = {
  type: "OBJECT",
  properties: {
    misinformationAnalysis: {
      type: "OBJECT",
      properties: {
        dangerScore: { type: "NUMBER", description: "Score 0-100 indicating threat level. 80+ for crimes." },
        flags: {
          type: "ARRAY",
          items: { type: "OBJECT", properties: { claim: stringField, reasoning: stringField } },
        },
        explanation: stringField,
      },
    },
    summary: stringField,
    toneAnalysis: { type: "OBJECT", properties: { detectedTone: stringField } },
    contentAnalysis: {
      type: "OBJECT",
      properties: {
        sensitiveInfo: {
          type: "ARRAY",
          items: { type: "OBJECT", properties: { type: stringField, text: stringField } },
        },
        inappropriateContent: { type: "ARRAY", items: stringField },
      },
    },
    keywordDetection: {
      type: "OBJECT",
      properties: {
        keywordsFound: {
          type: "ARRAY",
          items: { type: "OBJECT", properties: { keyword: stringField, context: stringField } },
        },
      },
    },
    factChecking: {
      type: "OBJECT",
      properties: {
        claims: {
          type: "ARRAY",
          items: {
            type: "OBJECT",
            properties: { claim: stringField, verification: stringField, source: stringField },
          },
        },
      },
    },
    finalReport: {
      type: "OBJECT",
      properties: { findings: stringField, recommendations: stringField },
    },
  },
};

const FORENSIC_SYSTEM_PROMPT = `You are an expert digital forensic investigator analyzing chat logs and documents.

Detect criminal intent, social engineering, fraud, coercion or security threats.

Scoring rules for misinformationAnalysis.dangerScore:
- 0-20: normal conversation.
- 21-50: suspicious or high-pressure.
- 51-80: clear scam, threat or harassment.
- 81-100: immediate danger, criminal conspiracy or clandestine operation.

Always populate dangerScore with a number based on the evidence.
Output strict JSON matching the schema.`;

export function emptyDocumentReport(): DocumentRiskReport {
  return {
    misinformationAnalysis: { dangerScore: 0, flags: [], explanation: "No text content found." },
    summary: "Empty file.",
    finalReport: { findings: "No content.", recommendations: "Check file input." },
  };
}

export function degradedDocumentReport(reason: string): DocumentRiskReport {
  return {
    misinformationAnalysis: {
      dangerScore: NEEDS_REVIEW_SCORE,
      flags: [{ claim: "Analysis Error", reasoning: reason }],
      explanation: "AI analysis failed to process this file.",
    },
    summary: "Error during analysis.",
    finalReport: { findings: "System error.", recommendations: "Retry analysis." },
  };
}

@Injectable()
export class DocumentAdapter implements AnalysisAdapter<"document"> {
  readonly category = "document" as const;
  private readonly logger = new Logger(DocumentAdapter.name);

  constructor(@Inject(LLM_CLIENT) private readonly llm: LlmClient) {}

  async analyze(file: SourceFile, signal?: AbortSignal): Promise<AnalysisOutcome<"document">> {
    this.logger.log(`Running document pipeline: ${file.displayName}`);
    let content = "";
    try {
      content = await extractDocumentText(file.path);
    } catch (error) {
      this.logger.warn(`Text extraction failed for ${file.displayName}: ${describeError(error)}`);
    }
    const evidenceText = wrapDocumentText(file.displayName, content);

    if (!content.trim()) {
      return succeeded<"document">(emptyDocumentReport(), evidenceText);
    }
    if (!this.llm.isConfigured()) {
      throw new ConfigurationError("LLM_API_KEY is not set");
    }

    try {
      return succeeded<"document">(await this.scoreDocumentRisk(evidenceText, signal), evidenceText);
    } catch (error) {
      return failed<"document">(error);
    }
  }

  /** Never rejects on model or parse failure; those degrade to the needs-review default. */
  async scoreDocumentRisk(documentText: string, signal?: AbortSignal): Promise<DocumentRiskReport> {
    let raw: string;
    try {
      const response = await this.llm.invoke({
        systemPrompt: FORENSIC_SYSTEM_PROMPT,
        userMessage: documentText,
        jsonSchema: DOCUMENT_RISK_RESPONSE_SCHEMA,
        temperature: 0,
        signal,
      });
      raw = response.content;
    } catch (error) {
      this.logger.error(`Risk scoring call failed: ${describeError(error)}`);
      return degradedDocumentReport(describeError(error));
    }

    let candidate: unknown;
    try {
      candidate = extractJson(raw);
    } catch (error) {
      this.logger.warn(`Risk scoring returned unparseable output: ${describeError(error)}`);
      return degradedDocumentReport(describeError(error));
    }

    const parsed = documentRiskSchema.safeParse(candidate);
    if (!parsed.success) {
      const reason = `Risk report did not match schema: ${parsed.error.issues[0]?.message ?? "invalid"}`;
      this.logger.warn(reason);
      return degradedDocumentReport(reason);
    }
    this.logger.log(`Danger score: ${parsed.data.misinformationAnalysis.dangerScore}`);
    return parsed.data;
  }
}

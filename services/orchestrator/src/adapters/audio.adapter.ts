import { Inject, Injectable, Logger } from "@nestjs/common";

import { TranscriptionClient } from "../clients/transcription.client.js";
import type { AppConfig } from "../config.js";
import { ConfigurationError, describeError } from "../errors.js";
import type { SourceFile } from "../types.js";
import { APP_CONFIG } from "../tokens.js";
import { failed, succeeded, type AnalysisAdapter, type AnalysisOutcome } from "./adapter.js";

@Injectable()
export class AudioAdapter implements AnalysisAdapter<"audio"> {
  readonly category = "audio" as const;
  private readonly logger = new Logger(AudioAdapter.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(TranscriptionClient) private readonly transcription: TranscriptionClient,
  ) {}

  async analyze(file: SourceFile, signal?: AbortSignal): Promise<AnalysisOutcome<"audio">> {
    this.logger.log(`Running audio pipeline: ${file.displayName}`);
    const apiKey = this.config.transcription.apiKey;
    if (!apiKey) {
      throw new ConfigurationError("TRANSCRIPTION_API_KEY is not set");
    }
    try {
      const report = await this.transcription.transcribe(file.path, apiKey, signal);
      return succeeded<"audio">(report, report.text);
    } catch (error) {
      this.logger.error(`Transcription failed for ${file.displayName}: ${describeError(error)}`);
      return failed<"audio">(error);
    }
  }
}

import { Inject, Injectable, Logger } from "@nestjs/common";

import { ImageTamperService } from "../services/image-tamper.service.js";
import type { SourceFile } from "../types.js";
import { ConfigurationError, describeError } from "../errors.js";
import { failed, succeeded, type AnalysisAdapter, type AnalysisOutcome } from "./adapter.js";

@Injectable()
export class ImageAdapter implements AnalysisAdapter<"image"> {
  readonly category = "image" as const;
  private readonly logger = new Logger(ImageAdapter.name);

  constructor(@Inject(ImageTamperService) private readonly tamper: ImageTamperService) {}

  async analyze(file: SourceFile, signal?: AbortSignal): Promise<AnalysisOutcome<"image">> {
    this.logger.log(`Running image pipeline: ${file.displayName}`);
    try {
      return succeeded<"image">(await this.tamper.detectImageTamper(file.path, { signal }));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.error(`Image analysis failed for ${file.displayName}: ${describeError(error)}`);
      return failed<"image">(error);
    }
  }
}

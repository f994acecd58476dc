import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { Inject, Injectable, Logger } from "@nestjs/common";

import { ConfigurationError, describeError } from "../errors.js";
import { planTimelineSamples, SECONDS_PER_CHECK } from "../media/frame-sampler.js";
import type { VideoFrameSource, VideoProbe } from "../media/video-frames.js";
import { ImageTamperService } from "../services/image-tamper.service.js";
import type { SourceFile, VideoReport } from "../types.js";
import { FRAME_SOURCE } from "../tokens.js";
import { failed, succeeded, type AnalysisAdapter, type AnalysisOutcome } from "./adapter.js";

export const FAKE_FRAME_THRESHOLD = 60;

function round2(value: number): number {
  return Number(value.toFixed(2));
}

@Injectable()
export class VideoAdapter implements AnalysisAdapter<"video"> {
  readonly category = "video" as const;
  private readonly logger = new Logger(VideoAdapter.name);

  constructor(
    @Inject(FRAME_SOURCE) private readonly frames: VideoFrameSource,
    @Inject(ImageTamperService) private readonly tamper: ImageTamperService,
  ) {}

  async analyze(file: SourceFile, signal?: AbortSignal): Promise<AnalysisOutcome<"video">> {
    this.logger.log(`Running video pipeline: ${file.displayName}`);
    let probe: VideoProbe;
    try {
      probe = await this.frames.probe(file.path);
    } catch (error) {
      this.logger.error(`Video probe failed for ${file.displayName}: ${describeError(error)}`);
      return failed<"video">(error);
    }

    const plan = planTimelineSamples(probe);
    this.logger.log(
      `Timeline scan of ${file.displayName}: every ${SECONDS_PER_CHECK}s / ${plan.frameInterval} frames`,
    );

    let framesAnalyzed = 0;
    let fakeFramesCount = 0;
    let maxTamperScore = 0;

    const workDir = await mkdtemp(path.join(tmpdir(), "video-frames-"));
    try {
      for (const [position, frameIndex] of plan.frameIndices.entries()) {
        if (signal?.aborted) {
          this.logger.warn(`Timeline scan of ${file.displayName} stopped after ${framesAnalyzed} frame(s)`);
          return failed<"video">(`video analysis of ${file.displayName} cancelled`);
        }
        const timestampSec = plan.timestampsSec[position] ?? frameIndex / plan.fps;
        const snapshot = path.join(workDir, `frame-${frameIndex}.jpg`);
        try {
          await this.frames.extractFrame(file.path, timestampSec, snapshot);
          const result = await this.tamper.detectImageTamper(snapshot, { explain: false, signal });
          const score = result.tamperingPercentage;
          maxTamperScore = Math.max(maxTamperScore, score);
          if (score > FAKE_FRAME_THRESHOLD) {
            fakeFramesCount += 1;
            this.logger.warn(`Tampering at ${timestampSec}s in ${file.displayName} (score ${score}%)`);
          }
          framesAnalyzed += 1;
        } catch (error) {
          if (error instanceof ConfigurationError) {
            throw error;
          }
          this.logger.warn(`Frame ${frameIndex} of ${file.displayName} skipped: ${describeError(error)}`);
        } finally {
          await rm(snapshot, { force: true });
        }
      }
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }

    const maxFakeScore = round2(maxTamperScore);
    const report: VideoReport = {
      verdict: fakeFramesCount > 0 ? "Tampering Detected" : "Likely Original",
      authenticityScore: (100 - maxFakeScore) / 100,
      frameAnalysis: {
        framesAnalyzed,
        fakeFramesCount,
        fakeRatioPercent: framesAnalyzed > 0 ? round2((fakeFramesCount / framesAnalyzed) * 100) : 0,
        maxFakeScore,
        strategy: `Full timeline (1 frame / ${SECONDS_PER_CHECK}s)`,
      },
      metadata: {
        durationSec: round2(probe.durationSec),
        fps: round2(plan.fps),
        totalFrames: probe.totalFrames,
        resolution: probe.width && probe.height ? `${probe.width}x${probe.height}` : "unknown",
      },
    };
    return succeeded<"video">(report);
  }
}

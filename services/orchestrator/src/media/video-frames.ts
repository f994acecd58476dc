import { Injectable } from "@nestjs/common";
import ffmpeg, { type FfprobeData } from "fluent-ffmpeg";

import { DEFAULT_FRAME_RATE } from "./frame-sampler.js";

export interface VideoProbe {
  fps: number;
  durationSec: number;
  totalFrames: number;
  width?: number;
  height?: number;
}

export interface VideoFrameSource {
  probe(videoPath: string): Promise<VideoProbe>;
  extractFrame(videoPath: string, timestampSec: number, outputPath: string): Promise<void>;
}

function parseFrameRate(rate: string | undefined): number {
  if (!rate) {
    return 0;
  }
  const [numerator, denominator] = rate.split("/").map(Number);
  if (!Number.isFinite(numerator)) {
    return 0;
  }
  if (denominator === undefined) {
    return numerator;
  }
  return Number.isFinite(denominator) && denominator > 0 ? numerator / denominator : 0;
}

export function toVideoProbe(data: FfprobeData): VideoProbe {
  const stream = data.streams.find((item) => item.codec_type === "video");
  if (!stream) {
    throw new Error("No video stream found");
  }

  const reportedFps = parseFrameRate(stream.avg_frame_rate) || parseFrameRate(stream.r_frame_rate);
  const fps = reportedFps > 0 ? reportedFps : DEFAULT_FRAME_RATE;
  const durationSec = Number(stream.duration ?? data.format.duration ?? 0) || 0;
  const counted = Number(stream.nb_frames);
  const totalFrames = Number.isFinite(counted) && counted > 0
    ? counted
    : Math.floor(durationSec * fps);

  return {
    fps,
    durationSec,
    totalFrames,
    width: stream.width,
    height: stream.height,
  };
}

/** Reads video metadata and single frames through the system ffmpeg/ffprobe binaries. */
@Injectable()
export class FfmpegFrameSource implements VideoFrameSource {
  probe(videoPath: string): Promise<VideoProbe> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(videoPath, (error, data) => {
        if (error) {
          reject(new Error(`Could not open video file: ${String(error)}`));
          return;
        }
        try {
          resolve(toVideoProbe(data));
        } catch (probeError) {
          reject(probeError);
        }
      });
    });
  }

  extractFrame(videoPath: string, timestampSec: number, outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      ffmpeg(videoPath)
        .seekInput(timestampSec)
        .frames(1)
        .output(outputPath)
        .on("end", () => resolve())
        .on("error", (error: Error) => reject(error))
        .run();
    });
  }
}

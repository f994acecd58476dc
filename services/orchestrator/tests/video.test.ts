import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { VideoAdapter } from "../src/adapters/video.adapter.js";
import { TamperDetectionClient } from "../src/clients/tamper.client.js";
import { ConfigurationError } from "../src/errors.js";
import { planTimelineSamples } from "../src/media/frame-sampler.js";
import { toVideoProbe, type VideoFrameSource, type VideoProbe } from "../src/media/video-frames.js";
import { ImageTamperService } from "../src/services/image-tamper.service.js";
import type { ImageReport, SourceFile } from "../src/types.js";
import { StubLlmClient, testConfig } from "./helpers.js";

const clip: SourceFile = { path: "/uploads/clip.mp4", displayName: "clip.mp4", category: "video" };

class StubFrameSource implements VideoFrameSource {
  readonly snapshots: string[] = [];
  failAt?: number;

  constructor(private readonly probeResult: VideoProbe | Error) {}

  async probe(): Promise<VideoProbe> {
    if (this.probeResult instanceof Error) {
      throw this.probeResult;
    }
    return this.probeResult;
  }

  async extractFrame(_videoPath: string, timestampSec: number, outputPath: string): Promise<void> {
    this.snapshots.push(outputPath);
    if (timestampSec === this.failAt) {
      throw new Error("ffmpeg exited with code 1");
    }
    await writeFile(outputPath, "frame-bytes");
  }
}

function frameReport(tamperingPercentage: number): ImageReport {
  return { verdict: "", authenticityScore: 0, tamperingPercentage, explanation: "" };
}

function tamperService(): ImageTamperService {
  const config = testConfig();
  return new ImageTamperService(new TamperDetectionClient(config), new StubLlmClient(() => ""));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("planTimelineSamples", () => {
  it("samples one frame every two seconds", () => {
    expect(planTimelineSamples({ fps: 30, totalFrames: 300 })).toEqual({
      fps: 30,
      frameInterval: 60,
      frameIndices: [0, 60, 120, 180, 240],
      timestampsSec: [0, 2, 4, 6, 8],
    });
  });

  it("defaults to 30 fps when the rate is missing", () => {
    const plan = planTimelineSamples({ fps: 0, totalFrames: 120 });
    expect(plan.fps).toBe(30);
    expect(plan.frameIndices).toEqual([0, 60]);
  });

  it("floors fractional rates into the stride", () => {
    const plan = planTimelineSamples({ fps: 29.97, totalFrames: 120 });
    expect(plan.frameInterval).toBe(59);
    expect(plan.frameIndices).toEqual([0, 59, 118]);
    expect(plan.timestampsSec).toEqual([0, 1.969, 3.937]);
  });

  it("analyzes floor(D*F / floor(F*2)) frames", () => {
    for (const [duration, fps] of [[10, 25], [7, 24], [60, 30]] as const) {
      const plan = planTimelineSamples({ fps, totalFrames: duration * fps });
      const expected = Math.floor((duration * fps) / Math.floor(fps * 2));
      expect(Math.abs(plan.frameIndices.length - expected)).toBeLessThanOrEqual(1);
    }
  });
});

describe("toVideoProbe", () => {
  it("reads rate, frame count and resolution from the video stream", () => {
    const probe = toVideoProbe({
      streams: [
        { index: 0, codec_type: "audio" },
        {
          index: 1,
          codec_type: "video",
          avg_frame_rate: "30000/1001",
          nb_frames: "300",
          width: 1280,
          height: 720,
          duration: "10.01",
        },
      ],
      format: {},
      chapters: [],
    });

    expect(probe.fps).toBeCloseTo(29.97, 2);
    expect(probe.totalFrames).toBe(300);
    expect(probe.durationSec).toBe(10.01);
    expect(probe.width).toBe(1280);
    expect(probe.height).toBe(720);
  });

  it("falls back to the real frame rate and duration", () => {
    const probe = toVideoProbe({
      streams: [{ index: 0, codec_type: "video", avg_frame_rate: "0/0", r_frame_rate: "25/1", duration: "4" }],
      format: {},
      chapters: [],
    });

    expect(probe.fps).toBe(25);
    expect(probe.totalFrames).toBe(100);
  });

  it("rejects files without a video stream", () => {
    expect(() => toVideoProbe({ streams: [{ index: 0, codec_type: "audio" }], format: {}, chapters: [] }))
      .toThrow("No video stream found");
  });
});

describe("VideoAdapter", () => {
  it("aggregates frame scores and removes every snapshot", async () => {
    const frames = new StubFrameSource({ fps: 30, durationSec: 8, totalFrames: 240, width: 640, height: 360 });
    const tamper = tamperService();
    const scores = [10, 75, 40, 90];
    const detect = vi.spyOn(tamper, "detectImageTamper")
      .mockImplementation(async () => frameReport(scores.shift() ?? 0));

    const outcome = await new VideoAdapter(frames, tamper).analyze(clip);

    expect(outcome).toEqual({
      ok: true,
      report: {
        verdict: "Tampering Detected",
        authenticityScore: 0.1,
        frameAnalysis: {
          framesAnalyzed: 4,
          fakeFramesCount: 2,
          fakeRatioPercent: 50,
          maxFakeScore: 90,
          strategy: "Full timeline (1 frame / 2s)",
        },
        metadata: { durationSec: 8, fps: 30, totalFrames: 240, resolution: "640x360" },
      },
    });
    expect(detect).toHaveBeenCalledTimes(4);
    expect(detect.mock.calls[0]?.[1]).toEqual({ explain: false });
    expect(frames.snapshots).toHaveLength(4);
    for (const snapshot of frames.snapshots) {
      expect(existsSync(snapshot)).toBe(false);
    }
    expect(existsSync(path.dirname(frames.snapshots[0] ?? ""))).toBe(false);
  });

  it("skips frames that fail and reports a clean video", async () => {
    const frames = new StubFrameSource({ fps: 30, durationSec: 6, totalFrames: 180 });
    frames.failAt = 2;
    const tamper = tamperService();
    vi.spyOn(tamper, "detectImageTamper").mockResolvedValue(frameReport(20));

    const outcome = await new VideoAdapter(frames, tamper).analyze(clip);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.report.verdict).toBe("Likely Original");
      expect(outcome.report.authenticityScore).toBe(0.8);
      expect(outcome.report.frameAnalysis.framesAnalyzed).toBe(2);
      expect(outcome.report.frameAnalysis.fakeRatioPercent).toBe(0);
      expect(outcome.report.metadata.resolution).toBe("unknown");
    }
  });

  it("returns an error outcome when the video cannot be probed", async () => {
    const frames = new StubFrameSource(new Error("Could not open video file: moov atom not found"));

    const outcome = await new VideoAdapter(frames, tamperService()).analyze(clip);

    expect(outcome).toEqual({ ok: false, error: "Could not open video file: moov atom not found" });
  });

  it("stops the timeline scan once cancelled", async () => {
    const frames = new StubFrameSource({ fps: 30, durationSec: 8, totalFrames: 240 });
    const tamper = tamperService();
    const controller = new AbortController();
    const detect = vi.spyOn(tamper, "detectImageTamper").mockImplementation(async () => {
      controller.abort();
      return frameReport(10);
    });

    const outcome = await new VideoAdapter(frames, tamper).analyze(clip, controller.signal);

    expect(outcome).toEqual({ ok: false, error: "video analysis of clip.mp4 cancelled" });
    expect(detect).toHaveBeenCalledTimes(1);
    expect(detect.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
    expect(existsSync(path.dirname(frames.snapshots[0] ?? ""))).toBe(false);
  });

  it("propagates configuration failures after cleaning up", async () => {
    const frames = new StubFrameSource({ fps: 30, durationSec: 4, totalFrames: 120 });
    const tamper = tamperService();
    vi.spyOn(tamper, "detectImageTamper").mockRejectedValue(new ConfigurationError("TAMPER_API_KEY is not set"));

    await expect(new VideoAdapter(frames, tamper).analyze(clip)).rejects.toBeInstanceOf(ConfigurationError);
    expect(existsSync(path.dirname(frames.snapshots[0] ?? ""))).toBe(false);
  });
});

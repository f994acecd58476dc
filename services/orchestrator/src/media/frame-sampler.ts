export const SECONDS_PER_CHECK = 2.0;
export const DEFAULT_FRAME_RATE = 30;

export interface TimelineSource {
  fps: number;
  totalFrames: number;
}

export interface TimelinePlan {
  fps: number;
  frameInterval: number;
  frameIndices: number[];
  timestampsSec: number[];
}

/**
 * Samples one frame every {@link SECONDS_PER_CHECK} seconds of playback,
 * starting at frame 0.
 */
export function planTimelineSamples(source: TimelineSource): TimelinePlan {
  const fps = Number.isFinite(source.fps) && source.fps > 0 ? source.fps : DEFAULT_FRAME_RATE;
  const frameInterval = Math.max(1, Math.floor(fps * SECONDS_PER_CHECK));
  const totalFrames = Math.max(0, Math.floor(source.totalFrames));

  const frameIndices: number[] = [];
  const timestampsSec: number[] = [];
  for (let frame = 0; frame < totalFrames; frame += frameInterval) {
    frameIndices.push(frame);
    timestampsSec.push(Number((frame / fps).toFixed(3)));
  }

  return { fps, frameInterval, frameIndices, timestampsSec };
}

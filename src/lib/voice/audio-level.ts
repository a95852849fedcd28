export const LEVEL_SMOOTHING_FACTOR = 0.3;
const LEVEL_GAIN = 10;

export function computeRms(samples: Float32Array) {
  if (samples.length === 0) {
    return 0;
  }
  let sum = 0;
  for (let index = 0; index < samples.length; index += 1) {
    sum += samples[index] * samples[index];
  }
  return Math.sqrt(sum / samples.length);
}

export function normalizeLevel(rms: number) {
  if (!Number.isFinite(rms) || rms <= 0) {
    return 0;
  }
  return Math.min(rms * LEVEL_GAIN, 1);
}

export function smoothLevel(previous: number, next: number, factor = LEVEL_SMOOTHING_FACTOR) {
  return previous * (1 - factor) + next * factor;
}

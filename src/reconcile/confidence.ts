import type { Calibration } from '../config/pipelineConfig';
import { clamp } from './similarity';

export function roundConfidence(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Maps an extractor-local confidence onto the extractor's canonical band.
 * Values outside the declared scale are clamped first, so a raw 0 always
 * lands on the band minimum.
 */
export function calibrate(raw: number, calibration: Calibration): number {
  const [scaleMin, scaleMax] = calibration.scale;
  const [bandMin, bandMax] = calibration.band;
  const value = Number.isFinite(raw) ? clamp(raw, scaleMin, scaleMax) : scaleMin;
  const ratio = (value - scaleMin) / (scaleMax - scaleMin);
  return roundConfidence(bandMin + ratio * (bandMax - bandMin));
}

/** Probability that at least one of several independent sources is right. */
export function combineConfidences(values: readonly number[], cap: number): number {
  const miss = values.reduce((acc, value) => acc * (1 - clamp(value)), 1);
  return roundConfidence(Math.min(cap, 1 - miss));
}

import { ValidationError } from "./errors";
import type { MeterInput } from "./types";

/** Meter resolution, in decimals of m³. */
export const VOLUME_DECIMALS = 3;

/** Rounds to meter resolution so reading deltas do not carry float noise. */
export function roundVolume(m3: number): number {
  const factor = 10 ** VOLUME_DECIMALS;
  return Math.round(m3 * factor) / factor;
}

function isFiniteNumber(n: unknown): n is number {
  return typeof n === "number" && Number.isFinite(n);
}

/**
 * Usage in m³ for one meter. Inverted or negative input is rejected, never
 * clamped to zero. `label` ends up in the error code ("sub1_readings_inverted").
 */
export function normalizeMeter(input: MeterInput, label: string): number {
  if (input.mode === "READINGS") {
    if (!isFiniteNumber(input.previous) || !isFiniteNumber(input.current)) {
      throw new ValidationError(`${label}_reading_invalid`, `${label}: readings must be numbers.`);
    }
    if (input.previous < 0 || input.current < 0) {
      throw new ValidationError(`${label}_reading_negative`, `${label}: readings cannot be negative.`);
    }
    if (input.current < input.previous) {
      throw new ValidationError(
        `${label}_readings_inverted`,
        `${label}: end reading ${input.current} is below start reading ${input.previous}.`
      );
    }
    return roundVolume(input.current - input.previous);
  }

  if (!isFiniteNumber(input.usage)) {
    throw new ValidationError(`${label}_usage_invalid`, `${label}: usage must be a number.`);
  }
  if (input.usage < 0) {
    throw new ValidationError(`${label}_usage_negative`, `${label}: usage cannot be negative.`);
  }
  return input.usage;
}

export function normalizeOptionalMeter(input: MeterInput | null | undefined, label: string): number | null {
  return input ? normalizeMeter(input, label) : null;
}

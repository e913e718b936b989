/**
 * Weight → tone frequency.
 *
 * Each whole unit of weight moves one step up the overtone series of the
 * base frequency, giving distinct tone rungs rather than a glide. The
 * integer part is taken by truncation, so -0.5 maps like 0.
 */

export const BASE_FREQUENCY_HZ = 110;

export function weightToFrequency(weight: number, baseFrequency = BASE_FREQUENCY_HZ): number {
  if (!Number.isFinite(weight)) return baseFrequency;
  return baseFrequency * (Math.trunc(weight) + 1);
}

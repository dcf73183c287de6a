// Breath-rate / HRV coherence.
// Breath sub-score peaks at the resting baseline and falls off linearly to zero
// `BREATH_RATE_SPAN` breaths away; HRV sub-score is HRV relative to a ceiling, capped at 1.

export const BASELINE_BREATH_RATE = 16;   // breaths/min, middle of the 12-18 resting band
export const BREATH_RATE_SPAN = 10;
export const HRV_CEILING = 100;           // ms; upper end of the 60-100 expected range
export const BREATH_WEIGHT = 0.5;
export const HRV_WEIGHT = 0.5;

function round2(x: number): number {
    return Math.round(x * 100) / 100;
}

export function breathSubScore(breathRate: number): number {
    return Math.max(0, 1 - Math.abs(breathRate - BASELINE_BREATH_RATE) / BREATH_RATE_SPAN);
}

export function hrvSubScore(hrv: number): number {
    return Math.min(Math.max(hrv, 0) / HRV_CEILING, 1);
}

/**
 * Coherence in [0, 100], two decimals. Pure.
 *   (20, 50) -> 55, (22, 47) -> 43.5, (24, 38) -> 29, (28, 38) -> 19
 */
export function calculateCoherence(breathRate: number, hrv: number): number {
    const score = (BREATH_WEIGHT * breathSubScore(breathRate) + HRV_WEIGHT * hrvSubScore(hrv)) * 100;
    return round2(Math.min(100, Math.max(0, score)));
}

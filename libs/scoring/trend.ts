import type { CheckIn, Trend } from "../validation/dto";

/**
 * `rising` only when breath rate strictly increases across the whole window,
 * `none` below two entries, `stable` otherwise. Reads the snapshot, never the buffer.
 */
export function detectTrend(history: readonly Pick<CheckIn, "breath_rate">[]): Trend {
    if (history.length < 2) return "none";
    for (let i = 1; i < history.length; i++) {
        if (!(history[i - 1].breath_rate < history[i].breath_rate)) return "stable";
    }
    return "rising";
}

export function describeTrend(trend: Trend, window: number): string | undefined {
    return trend === "rising"
        ? `User's breath rate has been rising over the last ${window} check-ins.`
        : undefined;
}

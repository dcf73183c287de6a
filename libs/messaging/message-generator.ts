import type { Trend } from "../validation/dto";

export interface MessageContext {
    score: number;
    trend: Trend;
    text: string;
}

/**
 * Natural-language reply for a check-in. Called only after scoring; a failure here
 * must never touch the score or trend already computed.
 */
export interface MessageGenerator {
    generate(ctx: MessageContext): Promise<string>;
}

export const FALLBACK_MESSAGE = "Thanks for checking in. Take a slow breath in, and an even slower one out.";

const BANDS: Array<{ min: number; message: string }> = [
    { min: 70, message: "Your breathing and heart rhythm look well in sync. Keep this pace going." },
    { min: 45, message: "You're in a fairly steady place. A few slow exhales could settle things further." },
    { min: 25, message: "Things seem a little stirred up. Try breathing in for four counts and out for six." },
    { min: 0, message: "It looks like a tense moment. Pause for a minute of slow, low breathing before moving on." },
];

const RISING_NUDGE =
    "Your breath rate has climbed over your last few check-ins; a short guided reset or more frequent check-ins might help.";

/** Deterministic generator used when no language model is wired in. */
export class TemplateMessageGenerator implements MessageGenerator {
    async generate(ctx: MessageContext): Promise<string> {
        const band = BANDS.find(b => ctx.score >= b.min) ?? BANDS[BANDS.length - 1];
        return ctx.trend === "rising" ? `${band.message} ${RISING_NUDGE}` : band.message;
    }
}

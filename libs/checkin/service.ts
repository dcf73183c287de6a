import { FALLBACK_MESSAGE, type MessageGenerator } from "../messaging/message-generator";
import { calculateCoherence } from "../scoring/coherence";
import { describeTrend, detectTrend } from "../scoring/trend";
import type { SignalBuffer } from "../store/history/types";
import {
    CheckInRequestSchema,
    CheckInSchema,
    type CheckIn,
    type CheckInResponse,
    type LiveMetricSample,
    type Trend,
} from "../validation/dto";
import { ValidationError, errorMessage } from "../validation/errors";

export interface CheckInDeps {
    buffer: SignalBuffer;
    messages: MessageGenerator;
    clock?: () => Date;
}

export interface CheckInOutcome extends CheckInResponse {
    trend: Trend;
    trend_note?: string;
    history: readonly CheckIn[];
}

export function parseCheckInRequest(body: unknown) {
    const parsed = CheckInRequestSchema.safeParse(body);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
        throw new ValidationError(`Invalid check-in: ${issues}`, parsed.error.issues);
    }
    return parsed.data;
}

async function messageFor(messages: MessageGenerator, score: number, trend: Trend, text: string) {
    try {
        return await messages.generate({ score, trend, text });
    } catch (e) {
        console.error("message-generation-failed", { score, trend, error: errorMessage(e) });
        return FALLBACK_MESSAGE;
    }
}

/** Record first, then score against a snapshot that already includes this check-in. */
async function scoreCheckIn(deps: CheckInDeps, checkIn: CheckIn): Promise<CheckInOutcome> {
    await deps.buffer.record(checkIn.user_id, checkIn);
    const history = await deps.buffer.history(checkIn.user_id);

    const trend = detectTrend(history);
    const coherence_score = calculateCoherence(checkIn.breath_rate, checkIn.hrv);
    const message = await messageFor(deps.messages, coherence_score, trend, checkIn.text);

    return { coherence_score, message, trend, trend_note: describeTrend(trend, history.length), history };
}

export async function submitCheckIn(deps: CheckInDeps, body: unknown): Promise<CheckInOutcome> {
    const request = parseCheckInRequest(body);
    const now = (deps.clock ?? (() => new Date()))();
    const checkIn = Object.freeze(CheckInSchema.parse({ ...request, timestamp: now.toISOString() }));
    return scoreCheckIn(deps, checkIn);
}

/** A vendor sample enters the same buffer as a manual check-in, with empty text. */
export async function recordLiveSample(
    deps: CheckInDeps,
    userId: string,
    sample: LiveMetricSample,
): Promise<CheckInOutcome> {
    const checkIn = Object.freeze(CheckInSchema.parse({ user_id: userId, text: "", ...sample }));
    return scoreCheckIn(deps, checkIn);
}

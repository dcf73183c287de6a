import type { CheckIn } from "../../validation/dto";

export const HISTORY_CAPACITY = 3;

/**
 * Sole owner of per-user check-in history. Callers get copies, never a handle
 * into the buffer. `record` is serialized per user.
 */
export interface SignalBuffer {
    record(userId: string, checkIn: CheckIn): Promise<void>;
    history(userId: string): Promise<readonly CheckIn[]>;
}

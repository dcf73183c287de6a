import type { CanonicalEvent } from "../../validation/dto";

export const GLOBAL_SCOPE = "global";

/**
 * Time-indexed event storage. `append` is idempotent on (timestamp, signal, value)
 * within a scope; `query` is half-open, [since, until), ascending by timestamp.
 */
export interface EventStore {
    append(event: CanonicalEvent, scope?: string): Promise<boolean>;
    query(since: Date, until: Date, scope?: string): Promise<CanonicalEvent[]>;
}

export function dedupKey(event: Pick<CanonicalEvent, "timestamp" | "signal" | "value">): string {
    return `${event.timestamp}#${event.signal}#${event.value ?? "-"}`;
}

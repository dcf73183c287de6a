import type { CanonicalEvent } from "../../validation/dto";
import { GLOBAL_SCOPE, dedupKey, type EventStore } from "./types";

type Indexed = { at: number; event: CanonicalEvent };

// First index whose instant is >= `at` (or > `at` when `after` is set).
function bound(list: Indexed[], at: number, after = false): number {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        const v = list[mid].at;
        if (v < at || (after && v === at)) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

class ScopeIndex {
    readonly sorted: Indexed[] = [];
    readonly keys = new Set<string>();
}

/** Baseline store: one sorted array per scope, binary-searched on both insert and query. */
export class MemoryEventStore implements EventStore {
    private scopes = new Map<string, ScopeIndex>();

    private scope(name: string): ScopeIndex {
        let s = this.scopes.get(name);
        if (!s) {
            s = new ScopeIndex();
            this.scopes.set(name, s);
        }
        return s;
    }

    async append(event: CanonicalEvent, scope = GLOBAL_SCOPE): Promise<boolean> {
        const s = this.scope(scope);
        const key = dedupKey(event);
        if (s.keys.has(key)) return false;
        s.keys.add(key);
        const at = Date.parse(event.timestamp);
        // Equal instants keep arrival order.
        s.sorted.splice(bound(s.sorted, at, true), 0, { at, event });
        return true;
    }

    async query(since: Date, until: Date, scope = GLOBAL_SCOPE): Promise<CanonicalEvent[]> {
        const s = this.scopes.get(scope);
        if (!s) return [];
        const from = bound(s.sorted, since.getTime());
        const to = bound(s.sorted, until.getTime());
        return s.sorted.slice(from, Math.max(from, to)).map(i => i.event);
    }

    size(scope = GLOBAL_SCOPE): number {
        return this.scopes.get(scope)?.sorted.length ?? 0;
    }
}

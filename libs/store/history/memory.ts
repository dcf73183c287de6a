import type { CheckIn } from "../../validation/dto";
import { KeyedMutex } from "../keyed-mutex";
import { Ring } from "./ring";
import { HISTORY_CAPACITY, type SignalBuffer } from "./types";

export class MemorySignalBuffer implements SignalBuffer {
    private rings = new Map<string, Ring<CheckIn>>();
    private mutex = new KeyedMutex();

    constructor(private readonly capacity = HISTORY_CAPACITY) {}

    async record(userId: string, checkIn: CheckIn): Promise<void> {
        await this.mutex.runExclusive(userId, () => {
            let ring = this.rings.get(userId);
            if (!ring) {
                ring = new Ring<CheckIn>(this.capacity);
                this.rings.set(userId, ring);
            }
            ring.push(Object.freeze({ ...checkIn }));
        });
    }

    async history(userId: string): Promise<readonly CheckIn[]> {
        return Object.freeze(this.rings.get(userId)?.toArray() ?? []);
    }
}

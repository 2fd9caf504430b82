// src/api/events.ts
import type { FlagName } from "../flags.js";
import type { StatusFailure } from "../snapshot.js";
import { DEFAULT_EVENT_BUFFER_SIZE } from "../settings.js";

/* =========================
 * Public event catalog/types
 * ========================= */

export type EventType =
    | "status_updated"
    | "flags_changed"
    | "status_failed"
    | "cargo_updated"
    | "cargo_failed";

export type SourceFile = "status" | "cargo";

export type StatusUpdatedPayload = {
    sequence: number;
    flags: number;
    flags2: number;
    active: FlagName[];
};

export type FlagsChangedPayload = {
    sequence: number;
    changed: Partial<Record<FlagName, boolean>>; // new values of the flipped flags only
};

export type CargoUpdatedPayload = {
    sequence: number;
    count?: number; // "Count" from the file when it is a number
};

export type FailurePayload = {
    source: SourceFile;
    failure: StatusFailure;
};

export type EventPayloads = {
    status_updated: StatusUpdatedPayload;
    flags_changed: FlagsChangedPayload;
    status_failed: FailurePayload;
    cargo_updated: CargoUpdatedPayload;
    cargo_failed: FailurePayload;
};

export type AnyEvent<K extends EventType = EventType> = {
    id: number;
    type: K;
    ts: number;
    payload: EventPayloads[K];
};

const EVENT_TYPES: ReadonlySet<string> = new Set<EventType>([
    "status_updated",
    "flags_changed",
    "status_failed",
    "cargo_updated",
    "cargo_failed",
]);

export function isEventType(s: string): s is EventType {
    return EVENT_TYPES.has(s);
}

/** Parse a `types=a,b` query value, dropping names that aren't event types. */
export function parseEventTypes(param: unknown): EventType[] {
    if (typeof param !== "string") return [];
    return param
        .split(",")
        .map((s) => s.trim())
        .filter(isEventType);
}

/* =========================
 * Event hub (buffer + SSE)
 * ========================= */

export class EventHub {
    private buffer: AnyEvent[] = [];
    private subscribers = new Set<(e: AnyEvent) => void>();
    private lastId = 0;
    private readonly maxBuffer: number;

    constructor(maxBuffer: number = DEFAULT_EVENT_BUFFER_SIZE) {
        this.maxBuffer = Math.max(1, maxBuffer);
    }

    emit<K extends EventType>(type: K, payload: EventPayloads[K]): AnyEvent<K> {
        const evt: AnyEvent<K> = { id: ++this.lastId, type, ts: Date.now(), payload };
        this.buffer.push(evt);
        if (this.buffer.length > this.maxBuffer) this.buffer.shift();
        for (const cb of this.subscribers) cb(evt);
        return evt;
    }

    /** Subscribe; returns an unsubscribe function */
    subscribe(cb: (e: AnyEvent) => void): () => void {
        this.subscribers.add(cb);
        return () => {
            this.subscribers.delete(cb);
        };
    }

    /** Return events since id (exclusive). Optionally filter by types. */
    getSince(since?: number, types?: readonly EventType[]): AnyEvent[] {
        const sliced =
            since !== undefined && Number.isFinite(since)
                ? this.buffer.filter((e) => e.id > since)
                : this.buffer.slice();
        if (!types || types.length === 0) return sliced;
        const set = new Set(types);
        return sliced.filter((e) => set.has(e.type));
    }

    /** Latest id in the buffer (0 if empty) */
    latestId(): number {
        return this.buffer.at(-1)?.id ?? 0;
    }

    subscriberCount(): number {
        return this.subscribers.size;
    }
}

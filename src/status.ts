import { z } from "zod";

import { activeFlags, decodeFlags, diffFlags, type FlagName, type ParsedFlags } from "./flags.js";
import { JsonFileCache } from "./jsonCache.js";
import { UINT32_MAX } from "./settings.js";
import {
    NOT_YET_AVAILABLE,
    isNotYetAvailable,
    type FileSnapshot,
    type JsonObject,
    type NotYetAvailable,
    type StatusSnapshot,
} from "./snapshot.js";
import type { SourceFile } from "./api/events.js";

const uint32 = z.number().int().min(0).max(UINT32_MAX);

/** `Flags` is required; `Flags2` defaults to 0. Everything else passes through. */
export const statusFileSchema = z
    .object({
        Flags: uint32,
        Flags2: uint32.optional(),
    })
    .passthrough();

export class StatusCache extends JsonFileCache<StatusSnapshot> {
    protected readonly source: SourceFile = "status";

    protected build(raw: JsonObject, base: FileSnapshot): StatusSnapshot {
        const file = statusFileSchema.parse(raw);
        return { ...base, flags: file.Flags, flags2: file.Flags2 ?? 0 };
    }

    /** Decoded flags of the current snapshot, recomputed on every call. */
    readParsed(): ParsedFlags | NotYetAvailable {
        const snap = this.read();
        if (isNotYetAvailable(snap)) return NOT_YET_AVAILABLE;
        return decodeFlags(snap.flags, snap.flags2);
    }

    readFlag(name: FlagName): boolean | NotYetAvailable {
        const parsed = this.readParsed();
        if (isNotYetAvailable(parsed)) return NOT_YET_AVAILABLE;
        return parsed[name];
    }

    protected afterUpdate(previous: StatusSnapshot | undefined, next: StatusSnapshot): void {
        if (!this.events) return;

        const after = decodeFlags(next.flags, next.flags2);
        this.events.emit("status_updated", {
            sequence: next.sequence,
            flags: next.flags,
            flags2: next.flags2,
            active: activeFlags(after),
        });

        if (!previous) return;
        const changedNames = diffFlags(decodeFlags(previous.flags, previous.flags2), after);
        if (changedNames.length === 0) return;

        const changed: Partial<Record<FlagName, boolean>> = {};
        for (const name of changedNames) changed[name] = after[name];
        this.events.emit("flags_changed", { sequence: next.sequence, changed });
    }
}

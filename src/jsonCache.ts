import { ZodError } from "zod";

import type { EventHub, SourceFile } from "./api/events.js";
import {
    NOT_YET_AVAILABLE,
    deepFreeze,
    describeFailure,
    errorMessage,
    malformedContent,
    type CacheState,
    type FileSnapshot,
    type JsonObject,
    type NotYetAvailable,
    type StatusFailure,
} from "./snapshot.js";
import { consoleLogger, type Logger } from "./util/logger.js";

export type CacheOptions = {
    logger?: Logger;
    events?: EventHub;
    now?: () => number;
};

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeParseError(err: unknown): string {
    if (err instanceof ZodError) {
        return err.issues
            .map((issue) => `${issue.path.length ? issue.path.join(".") : "(root)"}: ${issue.message}`)
            .join("; ");
    }
    return errorMessage(err);
}

/**
 * Holds the last good snapshot of one JSON file.
 *
 * The snapshot is replaced as a whole (frozen) object, so a reader holding
 * the previous one never sees a mix of old and new fields. A failed update
 * keeps the previous snapshot and records the failure in `lastError()`.
 * Nothing here touches the filesystem; the watch adapter pushes content in.
 */
export abstract class JsonFileCache<S extends FileSnapshot> {
    protected abstract readonly source: SourceFile;

    protected readonly logger: Logger;
    protected readonly events?: EventHub;
    private readonly now: () => number;

    private current: S | undefined;
    private failure: StatusFailure | undefined;
    private sequence = 0;

    constructor(opts: CacheOptions = {}) {
        this.logger = opts.logger ?? consoleLogger;
        this.events = opts.events;
        this.now = opts.now ?? Date.now;
    }

    /** Validate decoded content and build the snapshot; throw to reject it. */
    protected abstract build(raw: JsonObject, base: FileSnapshot): S;

    /** Called after a snapshot was swapped in. */
    protected afterUpdate(_previous: S | undefined, _next: S): void {}

    /** Apply freshly read file content. Never throws. */
    update(bytes: string | Buffer): void {
        const text = typeof bytes === "string" ? bytes : bytes.toString("utf8");
        if (text.trim() === "") {
            this.reportFailure(malformedContent("file is empty", this.now()));
            return;
        }

        let next: S;
        try {
            const content: unknown = JSON.parse(text);
            if (!isJsonObject(content)) {
                this.reportFailure(malformedContent("top-level value is not a JSON object", this.now()));
                return;
            }
            const raw = deepFreeze(content);
            next = this.build(raw, { sequence: this.sequence + 1, observedAt: this.now(), raw });
            Object.freeze(next);
        } catch (err) {
            this.reportFailure(malformedContent(describeParseError(err), this.now()));
            return;
        }

        const previous = this.current;
        const recovered = this.failure !== undefined;
        this.sequence = next.sequence;
        this.current = next;
        this.failure = undefined;

        if (!previous) {
            this.logger.log(`[${this.source}] first snapshot applied (seq=${next.sequence})`);
        } else if (recovered) {
            this.logger.log(`[${this.source}] recovered (seq=${next.sequence})`);
        }
        this.afterUpdate(previous, next);
    }

    /** Record a failure seen outside `update` (read timeout, missing path). */
    reportFailure(failure: StatusFailure): void {
        this.failure = failure;
        this.logger.warn(`[${this.source}] ${describeFailure(failure)}`);
        this.events?.emit(this.source === "status" ? "status_failed" : "cargo_failed", {
            source: this.source,
            failure,
        });
    }

    read(): S | NotYetAvailable {
        return this.current ?? NOT_YET_AVAILABLE;
    }

    lastError(): StatusFailure | undefined {
        return this.failure;
    }

    state(): CacheState {
        return this.current ? "populated" : "uninitialized";
    }
}

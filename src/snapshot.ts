// Shapes shared by the file caches, the watch adapter and the API.

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

/** Fields every cached file snapshot carries. */
export type FileSnapshot = Readonly<{
    sequence: number;      // 1 for the first successful update, +1 per update
    observedAt: number;    // Date.now() when the content was applied
    raw: JsonObject;       // whole decoded file, untouched
}>;

export type StatusSnapshot = FileSnapshot &
    Readonly<{
        flags: number;
        flags2: number;
    }>;

export type CargoSnapshot = FileSnapshot;

export type CacheState = "uninitialized" | "populated";

/* =========================
 * Not-ready signal
 * ========================= */

export type NotYetAvailable = Readonly<{ kind: "not_yet_available" }>;

export const NOT_YET_AVAILABLE: NotYetAvailable = Object.freeze({ kind: "not_yet_available" });

export function isNotYetAvailable<T>(value: T | NotYetAvailable): value is NotYetAvailable {
    return value === NOT_YET_AVAILABLE;
}

/* =========================
 * Failure taxonomy
 * ========================= */

export type TransientReadFailure = Readonly<{
    kind: "transient_read_failure";
    path: string;
    message: string;
    at: number;
}>;

export type MalformedContent = Readonly<{
    kind: "malformed_content";
    message: string;
    at: number;
}>;

export type PathUnavailable = Readonly<{
    kind: "path_unavailable";
    target: "directory" | "file";
    path: string;
    message: string;
    at: number;
}>;

export type StatusFailure = TransientReadFailure | MalformedContent | PathUnavailable;

export function transientReadFailure(path: string, message: string, at = Date.now()): TransientReadFailure {
    return { kind: "transient_read_failure", path, message, at };
}

export function malformedContent(message: string, at = Date.now()): MalformedContent {
    return { kind: "malformed_content", message, at };
}

export function pathUnavailable(
    target: PathUnavailable["target"],
    path: string,
    at = Date.now()
): PathUnavailable {
    return { kind: "path_unavailable", target, path, message: `${target} not found: ${path}`, at };
}

export function describeFailure(f: StatusFailure): string {
    switch (f.kind) {
        case "transient_read_failure":
            return `transient read failure (${f.path}): ${f.message}`;
        case "malformed_content":
            return `malformed content: ${f.message}`;
        case "path_unavailable":
            return f.message;
    }
}

export function errorMessage(err: unknown): string {
    if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
        return err.message;
    }
    return String(err);
}

/** Freeze a decoded JSON value and everything under it. */
export function deepFreeze<T extends JsonValue>(value: T): T {
    if (value !== null && typeof value === "object") {
        for (const child of Object.values(value)) deepFreeze(child);
        Object.freeze(value);
    }
    return value;
}

// src/util/retry.ts
import { readFile } from "fs/promises";
import { setTimeout as delay } from "timers/promises";

import { errorMessage } from "../snapshot.js";

export type ReadFn = (path: string, signal: AbortSignal) => Promise<Buffer>;

export type ReadRetryOptions = {
    attempts: number;   // total tries, >= 1
    delayMs: number;    // pause between tries
    timeoutMs: number;  // per-try abort
    readFn?: ReadFn;    // default: fs.readFile
    sleep?: (ms: number) => Promise<void>;
};

export type ReadOutcome =
    | { ok: true; bytes: Buffer; attempts: number }
    | { ok: false; reason: "missing" | "empty" | "timeout" | "error"; message: string; attempts: number };

// The game rewrites these files in place; these clear up on the next try.
const RETRYABLE_CODES: ReadonlySet<string> = new Set(["ENOENT", "EBUSY", "EACCES", "EPERM", "EAGAIN"]);

const defaultRead: ReadFn = (path, signal) => readFile(path, { signal });

// fs errors may come from another realm (Jest's vm context), so match on shape, not class.
function errorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
    return undefined;
}

function isAbort(err: unknown): boolean {
    if (typeof err !== "object" || err === null || !("name" in err)) return false;
    return err.name === "AbortError" || err.name === "TimeoutError";
}

/**
 * Read a file that another process may be halfway through writing.
 * Empty content, a timeout and the codes above are retried; anything else
 * fails at once. Never rejects.
 */
export async function readFileWithRetry(path: string, opts: ReadRetryOptions): Promise<ReadOutcome> {
    const attempts = Math.max(1, Math.floor(opts.attempts));
    const read = opts.readFn ?? defaultRead;
    const sleep = opts.sleep ?? ((ms: number) => delay(ms));

    let last: Extract<ReadOutcome, { ok: false }> = {
        ok: false,
        reason: "error",
        message: "not attempted",
        attempts: 0,
    };

    for (let attempt = 1; attempt <= attempts; attempt++) {
        if (attempt > 1 && opts.delayMs > 0) await sleep(opts.delayMs);

        try {
            const bytes = await read(path, AbortSignal.timeout(opts.timeoutMs));
            if (bytes.length > 0 && bytes.toString("utf8").trim() !== "") {
                return { ok: true, bytes, attempts: attempt };
            }
            last = { ok: false, reason: "empty", message: "file is empty", attempts: attempt };
        } catch (err) {
            const code = errorCode(err);
            if (isAbort(err)) {
                last = { ok: false, reason: "timeout", message: `read timed out after ${opts.timeoutMs}ms`, attempts: attempt };
            } else if (code === "ENOENT") {
                last = { ok: false, reason: "missing", message: errorMessage(err), attempts: attempt };
            } else if (code !== undefined && RETRYABLE_CODES.has(code)) {
                last = { ok: false, reason: "error", message: errorMessage(err), attempts: attempt };
            } else {
                return { ok: false, reason: "error", message: errorMessage(err), attempts: attempt };
            }
        }
    }

    return last;
}

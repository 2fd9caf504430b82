import * as path from "path";

import {
    CARGO_FILE_NAME,
    DEFAULT_API_HOST,
    DEFAULT_API_PORT,
    DEFAULT_EVENT_BUFFER_SIZE,
    DEFAULT_READ_ATTEMPTS,
    DEFAULT_READ_RETRY_DELAY_MS,
    DEFAULT_READ_TIMEOUT_MS,
    DEFAULT_SSE_HEARTBEAT_MS,
    MAX_PORT,
    STATUS_FILE_NAME,
} from "./settings.js";
import { defaultSaveDirectory, resolveSaveDirectory, type SaveDirEnv } from "./paths.js";

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export type AppConfig = Readonly<{
    apiPort: number;
    apiHost: string;
    saveDir: string | undefined;   // undefined when nothing could be found
    statusFile: string | undefined;
    cargoFile: string | undefined;
    readAttempts: number;
    readRetryDelayMs: number;
    readTimeoutMs: number;
    eventBufferSize: number;
    sseHeartbeatMs: number;
}>;

function intFromEnv(
    env: SaveDirEnv["env"],
    key: string,
    fallback: number,
    min: number,
    max: number = Number.MAX_SAFE_INTEGER
): number {
    const value = env[key];
    if (value === undefined || value.trim() === "") return fallback;
    const n = Number(value);
    if (!Number.isInteger(n) || n < min || n > max) {
        const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in ${min}..${max}`;
        throw new ConfigError(`${key} must be an integer ${range}, got "${value}"`);
    }
    return n;
}

/**
 * Build the config from environment variables. The save directory is the
 * discovered one, else ELITE_STATUS_PATH or the platform default as given,
 * so the watcher can report it missing.
 */
export function loadConfig(ctx: SaveDirEnv): AppConfig {
    const env = ctx.env;
    const saveDir = resolveSaveDirectory(ctx) ?? (env["ELITE_STATUS_PATH"] || defaultSaveDirectory(ctx));

    return Object.freeze({
        apiPort: intFromEnv(env, "API_PORT", DEFAULT_API_PORT, 0, MAX_PORT),
        apiHost: env["API_HOST"] || DEFAULT_API_HOST,
        saveDir,
        statusFile: saveDir ? path.join(saveDir, STATUS_FILE_NAME) : undefined,
        cargoFile: saveDir ? path.join(saveDir, CARGO_FILE_NAME) : undefined,
        readAttempts: intFromEnv(env, "READ_ATTEMPTS", DEFAULT_READ_ATTEMPTS, 1),
        readRetryDelayMs: intFromEnv(env, "READ_RETRY_DELAY_MS", DEFAULT_READ_RETRY_DELAY_MS, 0),
        readTimeoutMs: intFromEnv(env, "READ_TIMEOUT_MS", DEFAULT_READ_TIMEOUT_MS, 1),
        eventBufferSize: intFromEnv(env, "EVENT_BUFFER_SIZE", DEFAULT_EVENT_BUFFER_SIZE, 1),
        sseHeartbeatMs: intFromEnv(env, "SSE_HEARTBEAT_MS", DEFAULT_SSE_HEARTBEAT_MS, 1000),
    });
}

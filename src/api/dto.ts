// Wire shapes of the HTTP API
import type { FlagName, ParsedFlags } from "../flags.js";
import type { CacheState, JsonObject, StatusFailure } from "../snapshot.js";

export type StatusDTO = {
    sequence: number;
    observedAt: string;   // ISO-8601
    flags: number;
    flags2: number;
    raw: JsonObject;
};

export type FlagsDTO = {
    sequence: number;
    observedAt: string;
    flags: ParsedFlags;
    active: FlagName[];
};

export type FlagDTO = {
    name: FlagName;
    value: boolean;
};

/** `{ "OnFoot": true }` */
export type LegacyFlagDTO = Record<string, boolean>;

export type CargoDTO = JsonObject;

export type StarSystemDTO = {
    StarSystem: string;
};

export type UnavailableDTO = {
    error: "status_unavailable" | "cargo_unavailable";
    message: string;
    lastError?: StatusFailure;
};

export type ErrorDTO = {
    error: string;
    message: string;
};

export type HealthDTO = {
    ok: boolean;
    status: CacheState;
    cargo: CacheState;
    statusError?: StatusFailure;
    cargoError?: StatusFailure;
};

export type RootDTO = {
    name: string;
    version: string;
    endpoints: string[];
};

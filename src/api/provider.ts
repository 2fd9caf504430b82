// Read-only provider interface the API consumes (no fs or watch imports here)
import type { ParsedFlags } from "../flags.js";
import type {
    CacheState,
    CargoSnapshot,
    NotYetAvailable,
    StatusFailure,
    StatusSnapshot,
} from "../snapshot.js";
import type { StatusCache } from "../status.js";
import type { CargoCache } from "../cargo.js";

export interface StatusProvider {
    readSnapshot(): StatusSnapshot | NotYetAvailable;
    readParsed(): ParsedFlags | NotYetAvailable;
    statusState(): CacheState;
    statusError(): StatusFailure | undefined;

    readCargo(): CargoSnapshot | NotYetAvailable;
    cargoState(): CacheState;
    cargoError(): StatusFailure | undefined;

    currentStarSystem(): Promise<string | undefined>;
}

export type CacheProviderDeps = {
    status: StatusCache;
    cargo: CargoCache;
    starSystem: () => Promise<string | undefined>;
};

/** Provider over the in-memory caches; every read but the journal one is synchronous. */
export function cacheProvider({ status, cargo, starSystem }: CacheProviderDeps): StatusProvider {
    return {
        readSnapshot: () => status.read(),
        readParsed: () => status.readParsed(),
        statusState: () => status.state(),
        statusError: () => status.lastError(),
        readCargo: () => cargo.read(),
        cargoState: () => cargo.state(),
        cargoError: () => cargo.lastError(),
        currentStarSystem: starSystem,
    };
}

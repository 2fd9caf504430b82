import { EventHub } from "../src/api/events.js";
import { CargoCache } from "../src/cargo.js";
import { StatusCache } from "../src/status.js";
import type { Logger } from "../src/util/logger.js";

export type MockLogger = Logger & {
    log: jest.Mock;
    warn: jest.Mock;
    error: jest.Mock;
};

export function makeLogger(): MockLogger {
    return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

/** Status.json text as the game writes it, with some pass-through fields. */
export function statusJson(flags: number, flags2?: number, extra: Record<string, unknown> = {}): string {
    const body: Record<string, unknown> = {
        timestamp: "3310-10-19T12:00:00Z",
        event: "Status",
        Flags: flags,
        ...extra,
    };
    if (flags2 !== undefined) body["Flags2"] = flags2;
    return JSON.stringify(body);
}

export type Fixture = {
    logger: MockLogger;
    events: EventHub;
    status: StatusCache;
    cargo: CargoCache;
};

/** Fresh caches sharing one hub and one mock logger, on a fixed clock. */
export function makeFixture(now: () => number = () => 1_700_000_000_000): Fixture {
    const logger = makeLogger();
    const events = new EventHub(100);
    return {
        logger,
        events,
        status: new StatusCache({ logger, events, now }),
        cargo: new CargoCache({ logger, events, now }),
    };
}

/** Yield to the event loop until `cond` holds (or give up after `rounds`). */
export async function waitFor(cond: () => boolean, rounds = 200): Promise<void> {
    for (let i = 0; i < rounds && !cond(); i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
    if (!cond()) throw new Error("condition not met");
}

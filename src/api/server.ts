// src/api/server.ts
import type { Server } from "http";
import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import cors from "cors";

import type { StatusProvider } from "./provider.js";
import type {
    CargoDTO,
    ErrorDTO,
    FlagDTO,
    FlagsDTO,
    HealthDTO,
    LegacyFlagDTO,
    RootDTO,
    StarSystemDTO,
    StatusDTO,
    UnavailableDTO,
} from "./dto.js";
import type { EventHub } from "./events.js";
import { eventsRouter } from "./sse.js";
import { activeFlags, flagNameFromPath, legacyFlagKey } from "../flags.js";
import { API_PREFIX, DEFAULT_API_HOST, DEFAULT_API_PORT, SERVICE_NAME, SERVICE_VERSION } from "../settings.js";
import { errorMessage, isNotYetAvailable, type StatusFailure } from "../snapshot.js";
import { consoleLogger, type Logger } from "../util/logger.js";

export type ApiOptions = {
    port?: number;
    host?: string;
    heartbeatMs?: number;
    logger?: Logger;
};

const ENDPOINTS = [
    `${API_PREFIX}/health`,
    `${API_PREFIX}/status`,
    `${API_PREFIX}/status/flags`,
    `${API_PREFIX}/status/flags/:name`,
    `${API_PREFIX}/status/:name`,
    `${API_PREFIX}/cargo`,
    `${API_PREFIX}/currentStarSystem`,
    `${API_PREFIX}/events`,
    `${API_PREFIX}/events/snapshot`,
];

function unavailable(
    res: Response,
    error: UnavailableDTO["error"],
    message: string,
    lastError: StatusFailure | undefined
): void {
    const body: UnavailableDTO = lastError ? { error, message, lastError } : { error, message };
    res.status(503).json(body);
}

/**
 * Build the read-only API around an injected provider.
 * Handlers only read memory; nothing here touches the save directory except
 * the journal lookup behind currentStarSystem.
 */
export function createApp(provider: StatusProvider, events: EventHub, opts: ApiOptions = {}): Express {
    const log = opts.logger ?? consoleLogger;
    const app = express();
    app.use(cors());

    app.get("/", (_req: Request, res: Response) => {
        const body: RootDTO = { name: SERVICE_NAME, version: SERVICE_VERSION, endpoints: ENDPOINTS };
        res.json(body);
    });

    app.get(`${API_PREFIX}/health`, (_req: Request, res: Response) => {
        const body: HealthDTO = {
            ok: provider.statusState() === "populated",
            status: provider.statusState(),
            cargo: provider.cargoState(),
            statusError: provider.statusError(),
            cargoError: provider.cargoError(),
        };
        res.json(body);
    });

    app.get(`${API_PREFIX}/status`, (_req: Request, res: Response) => {
        const snap = provider.readSnapshot();
        if (isNotYetAvailable(snap)) {
            return unavailable(res, "status_unavailable", "No status has been read yet.", provider.statusError());
        }
        const body: StatusDTO = {
            sequence: snap.sequence,
            observedAt: new Date(snap.observedAt).toISOString(),
            flags: snap.flags,
            flags2: snap.flags2,
            raw: snap.raw,
        };
        res.json(body);
    });

    app.get(`${API_PREFIX}/status/flags`, (_req: Request, res: Response) => {
        const snap = provider.readSnapshot();
        const parsed = provider.readParsed();
        if (isNotYetAvailable(snap) || isNotYetAvailable(parsed)) {
            return unavailable(res, "status_unavailable", "No status has been read yet.", provider.statusError());
        }
        const body: FlagsDTO = {
            sequence: snap.sequence,
            observedAt: new Date(snap.observedAt).toISOString(),
            flags: parsed,
            active: activeFlags(parsed),
        };
        res.json(body);
    });

    app.get(`${API_PREFIX}/status/flags/:name`, (req: Request, res: Response) => {
        const name = flagNameFromPath(req.params.name);
        if (!name) {
            const body: ErrorDTO = { error: "unknown_flag", message: `No flag named "${req.params.name}".` };
            return res.status(404).json(body);
        }
        const parsed = provider.readParsed();
        if (isNotYetAvailable(parsed)) {
            return unavailable(res, "status_unavailable", "No status has been read yet.", provider.statusError());
        }
        const body: FlagDTO = { name, value: parsed[name] };
        res.json(body);
    });

    // First-version routes: /status/onFoot -> { "OnFoot": true }
    app.get(`${API_PREFIX}/status/:name`, (req: Request, res: Response) => {
        const name = flagNameFromPath(req.params.name);
        if (!name) {
            const body: ErrorDTO = { error: "unknown_flag", message: `No flag named "${req.params.name}".` };
            return res.status(404).json(body);
        }
        const parsed = provider.readParsed();
        if (isNotYetAvailable(parsed)) {
            return unavailable(res, "status_unavailable", "No status has been read yet.", provider.statusError());
        }
        const body: LegacyFlagDTO = { [legacyFlagKey(req.params.name, name)]: parsed[name] };
        res.json(body);
    });

    app.get(`${API_PREFIX}/cargo`, (_req: Request, res: Response) => {
        const snap = provider.readCargo();
        if (isNotYetAvailable(snap)) {
            return unavailable(res, "cargo_unavailable", "No cargo has been read yet.", provider.cargoError());
        }
        const body: CargoDTO = snap.raw;
        res.json(body);
    });

    app.get(`${API_PREFIX}/currentStarSystem`, (_req: Request, res: Response) => {
        provider
            .currentStarSystem()
            .then((system) => {
                const body: StarSystemDTO = { StarSystem: system ?? "Unknown" };
                res.json(body);
            })
            .catch((err: unknown) => {
                log.warn(`[api] journal read failed: ${errorMessage(err)}`);
                const body: StarSystemDTO = { StarSystem: "Unknown" };
                res.json(body);
            });
    });

    app.use(API_PREFIX, eventsRouter(events, opts.heartbeatMs));

    app.use((_req: Request, res: Response) => {
        const body: ErrorDTO = { error: "not_found", message: "Not found" };
        res.status(404).json(body);
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        log.error(`[api] unhandled error: ${errorMessage(err)}`);
        const body: ErrorDTO = { error: "internal_error", message: "Internal server error" };
        res.status(500).json(body);
    });

    return app;
}

/** Start the API with a provider injected from the watch side. */
export function startApiServer(provider: StatusProvider, events: EventHub, opts: ApiOptions = {}): Server {
    const log = opts.logger ?? consoleLogger;
    const app = createApp(provider, events, opts);
    const port = opts.port ?? DEFAULT_API_PORT;
    const host = opts.host ?? DEFAULT_API_HOST;
    return app.listen(port, host, () => {
        log.log(`[api] listening on http://${host}:${port}`);
    });
}

// src/api/sse.ts
import { Router, type Request, type Response } from "express";

import { parseEventTypes, type AnyEvent, type EventHub } from "./events.js";
import { DEFAULT_SSE_HEARTBEAT_MS } from "../settings.js";

function writeEvent(res: Response, e: AnyEvent): void {
    res.write(`event: ${e.type}\n`);
    res.write(`id: ${e.id}\n`);
    res.write(`data: ${JSON.stringify(e)}\n\n`);
}

/** `?since=` wins over the Last-Event-ID header. */
export function resolveSince(query: unknown, lastEventId: string | undefined): number | undefined {
    const fromQuery = typeof query === "string" && query !== "" ? Number(query) : undefined;
    if (fromQuery !== undefined && Number.isFinite(fromQuery)) return fromQuery;
    const fromHeader = lastEventId ? Number(lastEventId) : undefined;
    return fromHeader !== undefined && Number.isFinite(fromHeader) ? fromHeader : undefined;
}

/**
 * GET /events
 *  - Live SSE stream.
 *  - Supports Last-Event-ID header or ?since=<id>
 *  - Filter by ?types=status_updated,flags_changed
 *
 * GET /events/snapshot
 *  - Same selection as JSON, for clients that poll.
 */
export function eventsRouter(hub: EventHub, heartbeatMs: number = DEFAULT_SSE_HEARTBEAT_MS): Router {
    const router = Router();

    router.get("/events", (req: Request, res: Response) => {
        // CORS is enabled in server.ts. We only set SSE-specific headers here.
        res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
        res.setHeader("Cache-Control", "no-cache, no-transform");
        res.setHeader("Connection", "keep-alive");
        res.flushHeaders();

        // Tell the client how long to wait before retrying the connection (ms)
        res.write(`retry: 5000\n\n`);

        const since = resolveSince(req.query.since, req.header("Last-Event-ID"));
        const types = parseEventTypes(req.query.types);
        const typeSet = types.length ? new Set(types) : undefined;

        // 1) Send backlog to catch up
        for (const e of hub.getSince(since, types)) writeEvent(res, e);

        // 2) Subscribe to live events
        const unsubscribe = hub.subscribe((e) => {
            if (typeSet && !typeSet.has(e.type)) return;
            writeEvent(res, e);
        });

        // 3) Keepalive comments (helps load balancers / proxies)
        const ping = setInterval(() => {
            res.write(`: ping ${Date.now()}\n\n`);
        }, heartbeatMs);

        // 4) Cleanup on disconnect
        req.on("close", () => {
            clearInterval(ping);
            unsubscribe();
        });
    });

    router.get("/events/snapshot", (req: Request, res: Response) => {
        const since = resolveSince(req.query.since, req.header("Last-Event-ID"));
        const events = hub.getSince(since, parseEventTypes(req.query.types));
        // latest id of the whole buffer, not just the filtered set
        res.json({ latest: hub.latestId(), count: events.length, events });
    });

    return router;
}

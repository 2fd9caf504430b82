import { config } from "dotenv";

import { loadConfig, type AppConfig } from "./config.js";
import { EventHub } from "./api/events.js";
import { cacheProvider } from "./api/provider.js";
import { startApiServer } from "./api/server.js";
import { CargoCache } from "./cargo.js";
import { readCurrentStarSystem } from "./journal.js";
import { systemSaveDirEnv } from "./paths.js";
import { errorMessage, pathUnavailable } from "./snapshot.js";
import { StatusCache } from "./status.js";
import { FileWatchAdapter, type FileSink } from "./watch.js";
import type { ReadRetryOptions } from "./util/retry.js";

config();

function readOptions(cfg: AppConfig): ReadRetryOptions {
    return { attempts: cfg.readAttempts, delayMs: cfg.readRetryDelayMs, timeoutMs: cfg.readTimeoutMs };
}

function watchOrReport(file: string | undefined, sink: FileSink, cfg: AppConfig): FileWatchAdapter | undefined {
    if (!file) {
        sink.reportFailure(pathUnavailable("directory", "(save directory not found)"));
        return undefined;
    }
    return new FileWatchAdapter({ filePath: file, sink, read: readOptions(cfg) });
}

async function main(): Promise<void> {
    const cfg = loadConfig(systemSaveDirEnv());
    console.log(`[server] save directory: ${cfg.saveDir ?? "(not found)"}`);

    const events = new EventHub(cfg.eventBufferSize);
    const status = new StatusCache({ events });
    const cargo = new CargoCache({ events });

    const watchers = [watchOrReport(cfg.statusFile, status, cfg), watchOrReport(cfg.cargoFile, cargo, cfg)].filter(
        (w): w is FileWatchAdapter => w !== undefined
    );
    await Promise.all(watchers.map((w) => w.start()));

    const saveDir = cfg.saveDir;
    const provider = cacheProvider({
        status,
        cargo,
        starSystem: () => (saveDir ? readCurrentStarSystem(saveDir) : Promise.resolve(undefined)),
    });

    const server = startApiServer(provider, events, {
        port: cfg.apiPort,
        host: cfg.apiHost,
        heartbeatMs: cfg.sseHeartbeatMs,
    });

    const shutdown = () => {
        console.log("[server] shutting down");
        watchers.forEach((w) => w.stop());
        server.close();
        // SSE connections keep the server open otherwise
        server.closeAllConnections();
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
    console.error(`[server] failed to start: ${errorMessage(err)}`);
    process.exitCode = 1;
});

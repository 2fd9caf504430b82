import { EventEmitter } from "events";
import { mkdtemp, rm, writeFile } from "fs/promises";
import * as os from "os";
import * as path from "path";

import { isNotYetAvailable } from "../src/snapshot.js";
import type { StatusCache } from "../src/status.js";
import type { ReadFn } from "../src/util/retry.js";
import { FileWatchAdapter, type WatchFn } from "../src/watch.js";
import { makeFixture, makeLogger, statusJson, waitFor } from "./helpers.js";

const FILE = path.join("/saves", "Status.json");

class FakeWatcher extends EventEmitter {
    close = jest.fn();
}

type Harness = {
    watcher: FakeWatcher;
    watchFn: jest.Mock<FakeWatcher, Parameters<WatchFn>>;
    change: (filename: string | null) => void;
};

function fakeWatch(): Harness {
    const watcher = new FakeWatcher();
    let listener: ((filename: string | null) => void) | undefined;
    const watchFn = jest.fn((_dir: string, onChange: (filename: string | null) => void) => {
        listener = onChange;
        return watcher;
    });
    return {
        watcher,
        watchFn,
        change: (filename) => {
            if (!listener) throw new Error("not watching");
            listener(filename);
        },
    };
}

/** A read function whose results the test releases one by one. */
function gatedRead() {
    const gates: Array<(bytes: Buffer) => void> = [];
    const readFn: jest.Mock<ReturnType<ReadFn>, Parameters<ReadFn>> = jest.fn(
        (_p: string, _s: AbortSignal) => new Promise<Buffer>((resolve) => gates.push(resolve))
    );
    return { gates, readFn };
}

function flagsOf(status: StatusCache): number | undefined {
    const snap = status.read();
    return isNotYetAvailable(snap) ? undefined : snap.flags;
}

describe("WATCH: start", () => {
    test("missing directory is reported once and nothing is watched", async () => {
        const { status, logger } = makeFixture();
        const h = fakeWatch();
        const adapter = new FileWatchAdapter({
            filePath: FILE,
            sink: status,
            read: { attempts: 1, delayMs: 0, timeoutMs: 100 },
            watchFn: h.watchFn,
            dirExists: () => false,
            logger,
        });

        await expect(adapter.start()).resolves.toBe(false);

        expect(h.watchFn).not.toHaveBeenCalled();
        expect(adapter.isWatching()).toBe(false);
        expect(status.lastError()).toMatchObject({ kind: "path_unavailable", target: "directory", path: "/saves" });
        expect(logger.warn).toHaveBeenCalledTimes(1);
        expect(logger.warn).toHaveBeenCalledWith("[status] directory not found: /saves");
    });

    test("watches the directory and does a first read", async () => {
        const { status, logger } = makeFixture();
        const h = fakeWatch();
        const readFn = jest.fn((_p: string, _s: AbortSignal) => Promise.resolve(Buffer.from(statusJson(1))));
        const adapter = new FileWatchAdapter({
            filePath: FILE,
            sink: status,
            read: { attempts: 1, delayMs: 0, timeoutMs: 100, readFn },
            watchFn: h.watchFn,
            dirExists: () => true,
            logger,
        });

        await expect(adapter.start()).resolves.toBe(true);

        expect(h.watchFn.mock.calls[0][0]).toBe("/saves");
        expect(readFn).toHaveBeenCalledTimes(1);
        expect(flagsOf(status)).toBe(1);
        expect(adapter.reads()).toBe(1);
        expect(logger.log).toHaveBeenCalledWith(`[watch] watching ${FILE}`);
    });

    test("a missing file at start is reported as path_unavailable(file)", async () => {
        const { status } = makeFixture();
        const h = fakeWatch();
        const readFn = jest.fn((_p: string, _s: AbortSignal) =>
            Promise.reject(Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT" }))
        );
        const adapter = new FileWatchAdapter({
            filePath: FILE,
            sink: status,
            read: { attempts: 2, delayMs: 0, timeoutMs: 100, readFn },
            watchFn: h.watchFn,
            dirExists: () => true,
            logger: makeLogger(),
        });

        await adapter.start();

        expect(adapter.isWatching()).toBe(true);
        expect(status.state()).toBe("uninitialized");
        expect(status.lastError()).toMatchObject({ kind: "path_unavailable", target: "file", path: FILE });
    });
});

describe("WATCH: notifications", () => {
    async function started(readFn: ReadFn) {
        const fx = makeFixture();
        const h = fakeWatch();
        const adapter = new FileWatchAdapter({
            filePath: FILE,
            sink: fx.status,
            read: { attempts: 1, delayMs: 0, timeoutMs: 100, readFn },
            watchFn: h.watchFn,
            dirExists: () => true,
            logger: fx.logger,
        });
        return { ...fx, h, adapter };
    }

    test("changes to other files are ignored", async () => {
        const readFn = jest.fn((_p: string, _s: AbortSignal) => Promise.resolve(Buffer.from(statusJson(1))));
        const { h, adapter } = await started(readFn);
        await adapter.start();

        h.change("Cargo.json");
        h.change("Journal.2026-10-19T120000.01.log");
        await adapter.refresh();

        // first read + the explicit refresh
        expect(readFn).toHaveBeenCalledTimes(2);
    });

    test("a null filename still triggers a read", async () => {
        const { gates, readFn } = gatedRead();
        const { status, h, adapter } = await started(readFn);
        const starting = adapter.start();
        gates[0](Buffer.from(statusJson(1)));
        await starting;

        h.change(null);
        expect(readFn).toHaveBeenCalledTimes(2);
        gates[1](Buffer.from(statusJson(2)));
        await waitFor(() => flagsOf(status) === 2);
    });

    test("bursts during a read collapse into one more read; last write wins", async () => {
        const { gates, readFn } = gatedRead();
        const { status, h, adapter } = await started(readFn);
        const starting = adapter.start();
        gates[0](Buffer.from(statusJson(1)));
        await starting;

        h.change("Status.json");   // starts read #2
        h.change("Status.json");   // queued
        h.change("Status.json");   // same slot
        expect(readFn).toHaveBeenCalledTimes(2);

        const drained = adapter.refresh();
        gates[1](Buffer.from(statusJson(2)));
        await waitFor(() => gates.length === 3);
        gates[2](Buffer.from(statusJson(3)));
        await drained;

        expect(readFn).toHaveBeenCalledTimes(3);
        expect(adapter.reads()).toBe(3);
        expect(flagsOf(status)).toBe(3);
    });

    test("a read that times out keeps the last good snapshot", async () => {
        let call = 0;
        const readFn = jest.fn((_p: string, _s: AbortSignal) => {
            call++;
            if (call === 1) return Promise.resolve(Buffer.from(statusJson(1)));
            const err = new Error("The operation was aborted");
            err.name = "AbortError";
            return Promise.reject(err);
        });
        const { status, adapter, logger } = await started(readFn);
        await adapter.start();

        await adapter.refresh();

        expect(flagsOf(status)).toBe(1);
        expect(status.lastError()).toMatchObject({
            kind: "transient_read_failure",
            path: FILE,
            message: "read timed out after 100ms",
        });
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    test("watcher errors are logged, stop closes the watcher", async () => {
        const readFn = jest.fn((_p: string, _s: AbortSignal) => Promise.resolve(Buffer.from(statusJson(1))));
        const { h, adapter, logger } = await started(readFn);
        await adapter.start();

        h.watcher.emit("error", new Error("EMFILE"));
        expect(logger.error).toHaveBeenCalledWith("[watch] Status.json: EMFILE");

        adapter.stop();
        expect(h.watcher.close).toHaveBeenCalledTimes(1);
        expect(adapter.isWatching()).toBe(false);
        adapter.stop();
        expect(h.watcher.close).toHaveBeenCalledTimes(1);
    });
});

describe("WATCH: real directory", () => {
    test("reads through fs on start and refresh", async () => {
        const dir = await mkdtemp(path.join(os.tmpdir(), "watch-"));
        const { status, logger } = makeFixture();
        const adapter = new FileWatchAdapter({
            filePath: path.join(dir, "Status.json"),
            sink: status,
            read: { attempts: 3, delayMs: 10, timeoutMs: 1000 },
            logger,
        });
        try {
            await writeFile(path.join(dir, "Status.json"), statusJson(1));
            await expect(adapter.start()).resolves.toBe(true);
            expect(flagsOf(status)).toBe(1);

            await writeFile(path.join(dir, "Status.json"), statusJson(6, 1));
            await adapter.refresh();
            expect(flagsOf(status)).toBe(6);
        } finally {
            adapter.stop();
            await rm(dir, { recursive: true, force: true });
        }
    });
});

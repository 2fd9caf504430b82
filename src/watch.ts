import * as fs from "fs";
import * as path from "path";

import { errorMessage, pathUnavailable, transientReadFailure, type StatusFailure } from "./snapshot.js";
import { consoleLogger, type Logger } from "./util/logger.js";
import { readFileWithRetry, type ReadRetryOptions } from "./util/retry.js";

/** Where the adapter pushes what it read. Both file caches implement this. */
export interface FileSink {
    update(bytes: string | Buffer): void;
    reportFailure(failure: StatusFailure): void;
}

export interface DirectoryWatcher {
    close(): void;
    on(event: "error", listener: (err: Error) => void): unknown;
}

export type WatchFn = (dir: string, onChange: (filename: string | null) => void) => DirectoryWatcher;

export type FileWatchOptions = {
    filePath: string;
    sink: FileSink;
    read: ReadRetryOptions;
    watchFn?: WatchFn;
    dirExists?: (dir: string) => boolean;
    logger?: Logger;
};

const defaultWatch: WatchFn = (dir, onChange) =>
    fs.watch(dir, { persistent: true }, (_event, filename) => onChange(filename));

function defaultDirExists(dir: string): boolean {
    try {
        return fs.statSync(dir).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Watches one file's directory and feeds fresh content into a sink.
 *
 * Notifications land in a single-slot inbox: while a read is running,
 * more notifications only mark the slot dirty, and one more read follows
 * when the current one ends. Reads never overlap and the last one applied
 * reflects the file after the last notification.
 */
export class FileWatchAdapter {
    readonly filePath: string;
    private readonly dir: string;
    private readonly fileName: string;
    private readonly sink: FileSink;
    private readonly readOpts: ReadRetryOptions;
    private readonly watchFn: WatchFn;
    private readonly dirExists: (dir: string) => boolean;
    private readonly logger: Logger;

    private watcher: DirectoryWatcher | undefined;
    private inFlight: Promise<void> | undefined;
    private dirty = false;
    private readCount = 0;

    constructor(opts: FileWatchOptions) {
        this.filePath = opts.filePath;
        this.dir = path.dirname(opts.filePath);
        this.fileName = path.basename(opts.filePath);
        this.sink = opts.sink;
        this.readOpts = opts.read;
        this.watchFn = opts.watchFn ?? defaultWatch;
        this.dirExists = opts.dirExists ?? defaultDirExists;
        this.logger = opts.logger ?? consoleLogger;
    }

    /**
     * Start watching and do the first read. Resolves false, without
     * watching, when the directory doesn't exist; a restart is needed once
     * it appears.
     */
    async start(): Promise<boolean> {
        if (this.watcher) return true;

        if (!this.dirExists(this.dir)) {
            this.sink.reportFailure(pathUnavailable("directory", this.dir));
            return false;
        }

        try {
            this.watcher = this.watchFn(this.dir, (filename) => this.onChange(filename));
        } catch (err) {
            this.logger.error(`[watch] cannot watch ${this.dir}: ${errorMessage(err)}`);
            return false;
        }
        this.watcher.on("error", (err) => {
            this.logger.error(`[watch] ${this.fileName}: ${err.message}`);
        });
        this.logger.log(`[watch] watching ${this.filePath}`);

        await this.refresh();
        return true;
    }

    stop(): void {
        if (!this.watcher) return;
        this.watcher.close();
        this.watcher = undefined;
        this.logger.log(`[watch] stopped ${this.filePath}`);
    }

    isWatching(): boolean {
        return this.watcher !== undefined;
    }

    /** Completed reads, successful or not. */
    reads(): number {
        return this.readCount;
    }

    /** Queue a read; resolves once the inbox is drained. */
    refresh(): Promise<void> {
        this.dirty = true;
        this.inFlight ??= this.drain();
        return this.inFlight;
    }

    private onChange(filename: string | null): void {
        if (filename !== null && filename !== this.fileName) return;
        this.refresh().catch((err: unknown) => {
            this.logger.error(`[watch] refresh failed for ${this.fileName}: ${errorMessage(err)}`);
        });
    }

    private async drain(): Promise<void> {
        try {
            while (this.dirty) {
                this.dirty = false;
                await this.readOnce();
            }
        } finally {
            this.inFlight = undefined;
        }
    }

    private async readOnce(): Promise<void> {
        const outcome = await readFileWithRetry(this.filePath, this.readOpts);
        this.readCount++;
        if (outcome.ok) {
            this.sink.update(outcome.bytes);
        } else if (outcome.reason === "missing") {
            this.sink.reportFailure(pathUnavailable("file", this.filePath));
        } else {
            this.sink.reportFailure(transientReadFailure(this.filePath, outcome.message));
        }
    }
}

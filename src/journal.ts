import { readdir, readFile, stat } from "fs/promises";
import * as path from "path";

import { JOURNAL_FILE_EXTENSION } from "./settings.js";

const LOCATION_EVENTS: ReadonlySet<string> = new Set(["FSDJump", "Location"]);

/** Newest journal log in `dir` by ctime, or undefined when there is none. */
export async function latestJournalFile(dir: string): Promise<string | undefined> {
    let names: string[];
    try {
        names = await readdir(dir);
    } catch {
        return undefined;
    }

    let newest: { file: string; ctimeMs: number } | undefined;
    for (const name of names) {
        if (!name.endsWith(JOURNAL_FILE_EXTENSION)) continue;
        const file = path.join(dir, name);
        try {
            const info = await stat(file);
            if (!info.isFile()) continue;
            if (!newest || info.ctimeMs > newest.ctimeMs) newest = { file, ctimeMs: info.ctimeMs };
        } catch {
            // removed between readdir and stat
            continue;
        }
    }
    return newest?.file;
}

/**
 * Star system of the last FSDJump or Location entry in a journal's text.
 * Lines that aren't JSON are skipped.
 */
export function lastStarSystem(journal: string): string | undefined {
    const lines = journal.split(/\r?\n/);
    for (let i = lines.length - 1; i >= 0; i--) {
        const line = lines[i].trim();
        if (!line) continue;
        let entry: unknown;
        try {
            entry = JSON.parse(line);
        } catch {
            continue;
        }
        if (typeof entry !== "object" || entry === null) continue;
        if (!("event" in entry) || typeof entry.event !== "string" || !LOCATION_EVENTS.has(entry.event)) continue;
        return "StarSystem" in entry && typeof entry.StarSystem === "string" ? entry.StarSystem : undefined;
    }
    return undefined;
}

export async function readCurrentStarSystem(dir: string): Promise<string | undefined> {
    const file = await latestJournalFile(dir);
    if (!file) return undefined;
    return lastStarSystem(await readFile(file, "utf8"));
}

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { PROTON_USER_SEGMENTS, SAVE_DIR_SEGMENTS } from "./settings.js";

export type SaveDirEnv = {
    env: Readonly<Record<string, string | undefined>>;
    platform: NodeJS.Platform;
    homedir: string;
    exists: (dir: string) => boolean;
};

function isDirectory(dir: string): boolean {
    try {
        return fs.statSync(dir).isDirectory();
    } catch {
        return false;
    }
}

export function systemSaveDirEnv(env: Readonly<Record<string, string | undefined>> = process.env): SaveDirEnv {
    return { env, platform: process.platform, homedir: os.homedir(), exists: isDirectory };
}

/** Where the game keeps its save directory on this platform, whether or not it exists. */
export function defaultSaveDirectory(ctx: Omit<SaveDirEnv, "exists">): string | undefined {
    if (ctx.platform === "win32") {
        const profile = ctx.env["USERPROFILE"];
        return profile ? path.win32.join(profile, ...SAVE_DIR_SEGMENTS) : undefined;
    }
    if (ctx.platform === "linux") {
        return path.posix.join(ctx.homedir, ...PROTON_USER_SEGMENTS, ...SAVE_DIR_SEGMENTS);
    }
    return undefined;
}

/**
 * Locate the game's save directory. ELITE_STATUS_PATH wins when it names an
 * existing directory; otherwise the platform default, if it exists.
 */
export function resolveSaveDirectory(ctx: SaveDirEnv): string | undefined {
    const custom = ctx.env["ELITE_STATUS_PATH"];
    if (custom && ctx.exists(custom)) return custom;

    const fallback = defaultSaveDirectory(ctx);
    if (fallback && ctx.exists(fallback)) return fallback;
    return undefined;
}

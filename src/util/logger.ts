/** The slice of `console` the caches, watchers and API write to. */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const consoleLogger: Logger = console;

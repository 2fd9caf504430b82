import { JsonFileCache } from "./jsonCache.js";
import type { CargoSnapshot, FileSnapshot, JsonObject } from "./snapshot.js";
import type { SourceFile } from "./api/events.js";

/** Cargo.json content is served as written; no schema beyond "a JSON object". */
export class CargoCache extends JsonFileCache<CargoSnapshot> {
    protected readonly source: SourceFile = "cargo";

    protected build(_raw: JsonObject, base: FileSnapshot): CargoSnapshot {
        return base;
    }

    protected afterUpdate(_previous: CargoSnapshot | undefined, next: CargoSnapshot): void {
        const count = next.raw["Count"];
        this.events?.emit("cargo_updated", {
            sequence: next.sequence,
            count: typeof count === "number" ? count : undefined,
        });
    }
}

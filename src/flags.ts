import { FLAGS2_WIDTH, FLAGS_WIDTH } from "./settings.js";

/* =========================
 * Bit tables
 * ========================= */

export const FLAGS_BITS = [
    [0, "docked"],
    [1, "landed"],
    [2, "landing_gear_down"],
    [3, "shields_up"],
    [4, "supercruise"],
    [5, "flight_assist_off"],
    [6, "hardpoints_deployed"],
    [7, "in_wing"],
    [8, "lights_on"],
    [9, "cargo_scoop_deployed"],
    [10, "silent_running"],
    [11, "scooping_fuel"],
    [12, "srv_handbrake"],
    [13, "srv_turret_view"],
    [14, "srv_turret_retracted"],
    [15, "srv_drive_assist"],
    [16, "fsd_mass_locked"],
    [17, "fsd_charging"],
    [18, "fsd_cooldown"],
    [19, "low_fuel"],
    [20, "over_heating"],
    [21, "has_lat_long"],
    [22, "is_in_danger"],
    [23, "being_interdicted"],
    [24, "in_main_ship"],
    [25, "in_fighter"],
    [26, "in_srv"],
    [27, "hud_analysis_mode"],
    [28, "night_vision"],
    [29, "altitude_from_average_radius"],
    [30, "fsd_jump"],
    [31, "srv_high_beam"],
] as const;

export const FLAGS2_BITS = [
    [0, "on_foot"],
    [1, "in_taxi"],
    [2, "in_multicrew"],
    [3, "on_foot_in_station"],
    [4, "on_foot_on_planet"],
    [5, "aim_down_sight"],
    [6, "low_oxygen"],
    [7, "low_health"],
    [8, "cold"],
    [9, "hot"],
    [10, "very_cold"],
    [11, "very_hot"],
    [12, "glide_mode"],
    [13, "on_foot_in_hangar"],
    [14, "on_foot_social_space"],
    [15, "on_foot_exterior"],
    [16, "breathable_atmosphere"],
    [17, "telepresence_multicrew"],
    [18, "physical_multicrew"],
    [19, "fsd_hyperdrive_charging"],
] as const;

export type PrimaryFlagName = (typeof FLAGS_BITS)[number][1];
export type SecondaryFlagName = (typeof FLAGS2_BITS)[number][1];
export type FlagName = PrimaryFlagName | SecondaryFlagName;

export type ParsedFlags = Readonly<Record<FlagName, boolean>>;

/** Every flag name, `Flags` table first, each in bit order. */
export const FLAG_NAMES: readonly FlagName[] = [
    ...FLAGS_BITS.map(([, name]) => name),
    ...FLAGS2_BITS.map(([, name]) => name),
];

const FLAG_NAME_SET: ReadonlySet<string> = new Set(FLAG_NAMES);

function assertTable(label: string, table: readonly (readonly [number, string])[], width: number): void {
    if (table.length !== width) {
        throw new Error(`${label} table defines ${table.length} bits, expected ${width}`);
    }
    table.forEach(([bit], i) => {
        if (bit !== i) throw new Error(`${label} table entry ${i} has bit ${bit}`);
    });
}

assertTable("Flags", FLAGS_BITS, FLAGS_WIDTH);
assertTable("Flags2", FLAGS2_BITS, FLAGS2_WIDTH);
if (FLAG_NAME_SET.size !== FLAG_NAMES.length) {
    throw new Error("flag names must be unique across Flags and Flags2");
}

/* =========================
 * Decoding
 * ========================= */

function bitSet(value: number, bit: number): boolean {
    // >>> coerces to uint32, so bit 31 tests correctly
    return ((value >>> bit) & 1) === 1;
}

/**
 * Decode the two status bitmasks into named booleans.
 * Bits of `flags2` above bit 19 have no name and are ignored.
 */
export function decodeFlags(flags: number, flags2: number = 0): ParsedFlags {
    const out: Partial<Record<FlagName, boolean>> = {};
    for (const [bit, name] of FLAGS_BITS) out[name] = bitSet(flags, bit);
    for (const [bit, name] of FLAGS2_BITS) out[name] = bitSet(flags2, bit);
    if (!isParsedFlags(out)) throw new Error("flag decoding left names unset");
    return out;
}

function isParsedFlags(value: Partial<Record<FlagName, boolean>>): value is Record<FlagName, boolean> {
    return FLAG_NAMES.every((name) => typeof value[name] === "boolean");
}

/** Names of the flags that are set, in table order. */
export function activeFlags(parsed: ParsedFlags): FlagName[] {
    return FLAG_NAMES.filter((name) => parsed[name]);
}

/** Names whose value differs between two decodings. */
export function diffFlags(before: ParsedFlags, after: ParsedFlags): FlagName[] {
    return FLAG_NAMES.filter((name) => before[name] !== after[name]);
}

export function isFlagName(name: string): name is FlagName {
    return FLAG_NAME_SET.has(name);
}

// Route names the first version of the API exposed that don't snake_case onto a table name.
const ROUTE_ALIASES: ReadonlyMap<string, FlagName> = new Map<string, FlagName>([
    ["hud_in_analysis_mode", "hud_analysis_mode"],
    ["srv_using_turret_view", "srv_turret_view"],
    ["glidemode", "glide_mode"],
    ["verycold", "very_cold"],
    ["veryhot", "very_hot"],
]);

/**
 * Resolve a route segment to a flag name. Accepts snake_case
 * (`landing_gear_down`), camelCase (`landingGearDown`) and the legacy aliases.
 */
export function flagNameFromPath(segment: string): FlagName | undefined {
    const snake = toSnake(segment);
    if (isFlagName(snake)) return snake;
    return ROUTE_ALIASES.get(snake);
}

function toSnake(segment: string): string {
    return segment
        .trim()
        .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
        .replace(/-/g, "_")
        .toLowerCase();
}

/**
 * Response key for the per-flag routes of the first API version:
 * `onFoot` -> `OnFoot`, `hudInAnalysisMode` -> `HudInAnalysisMode`,
 * `verycold` -> `VeryCold`. Single-word segments take the table name's words.
 */
export function legacyFlagKey(segment: string, name: FlagName): string {
    const snake = toSnake(segment);
    const words = (snake.includes("_") ? snake : name).split("_");
    return words.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join("");
}

export const SERVICE_NAME = "Elite Dangerous Status API";
export const SERVICE_VERSION = "1.0.0";
export const API_PREFIX = "/api/v1";

export const STATUS_FILE_NAME = "Status.json";
export const CARGO_FILE_NAME = "Cargo.json";
export const JOURNAL_FILE_EXTENSION = ".log";

export const FLAGS_WIDTH = 32;
export const FLAGS2_WIDTH = 20;
export const UINT32_MAX = 0xffffffff;

export const DEFAULT_API_PORT = 8000;
export const MAX_PORT = 65535;
export const DEFAULT_API_HOST = "0.0.0.0";
export const DEFAULT_READ_ATTEMPTS = 3;
export const DEFAULT_READ_RETRY_DELAY_MS = 50;
export const DEFAULT_READ_TIMEOUT_MS = 500;
export const DEFAULT_EVENT_BUFFER_SIZE = 1000;
export const DEFAULT_SSE_HEARTBEAT_MS = 15_000;

// Path segments below the user's profile / Proton prefix.
export const SAVE_DIR_SEGMENTS = ["Saved Games", "Frontier Developments", "Elite Dangerous"] as const;
export const STEAM_APP_ID = "359320";
export const PROTON_USER_SEGMENTS = [
    ".local",
    "share",
    "Steam",
    "steamapps",
    "compatdata",
    STEAM_APP_ID,
    "pfx",
    "drive_c",
    "users",
    "steamuser",
] as const;

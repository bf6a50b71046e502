export const PACKAGE_NAME = "mpdlink";
export const OK = "OK";
export const ACK = "ACK";
export const GREETING_PREFIX = "OK MPD ";
export const CHANGED_EVENT_PREFIX = "changed: ";
export const COMMAND_LIST_BEGIN = "command_list_begin";
export const COMMAND_LIST_END = "command_list_end";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 6600;
export const DEFAULT_TIMEOUT = 5000;
export const DEFAULT_RECONNECT_DELAY = 5000;
export const MIN_SERVER_VERSION = "0.22";

export const FAVORITES_PLAYLIST = "Favorites";
export const UNKNOWN_ARTIST = "Unknown Artist";
export const UNKNOWN_TITLE = "Unknown Title";
export const UNKNOWN_ALBUM = "Unknown Album";

// Subsystems MPD may report on a `changed:` line.
export const IDLE_EVENTS = [
	"database",
	"update",
	"stored_playlist",
	"playlist",
	"player",
	"mixer",
	"output",
	"options",
	"partition",
	"sticker",
	"subscription",
	"message",
	"neighbor",
	"mount",
] as const;

export const ARTWORK_COMMANDS = ["albumart", "readpicture"] as const;

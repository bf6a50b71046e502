import type { ARTWORK_COMMANDS, IDLE_EVENTS } from "./const.js";

/** A subsystem tag reported on a `changed:` line. */
export type IdleEvent = (typeof IDLE_EVENTS)[number];

/** A command that can stream artwork bytes. */
export type ArtworkCommand = (typeof ARTWORK_COMMANDS)[number];

export type PlayerState = "play" | "pause" | "stop";

/**
 * An artist as derived from a song's `AlbumArtist` (or `Artist`) tag.
 * Two artists are the same when their names match.
 */
export interface Artist {
	readonly kind: "artist";
	/** File of the song this artist was derived from. */
	readonly file: string;
	readonly name: string;
	readonly nameSort?: string;
}

/**
 * An album, usually derived from the first song of a group.
 * Identified by `"<artist> - <title>"`, see {@link albumId}.
 */
export interface Album {
	readonly kind: "album";
	readonly file: string;
	readonly title: string;
	readonly titleSort?: string;
	readonly date?: string;
	readonly artist: Artist;
}

export interface Song {
	readonly kind: "song";
	/** Path of the song relative to the music directory, or a stream URI. */
	readonly file: string;
	/** Queue id (`Id`), present only for queue entries. */
	readonly identifier?: number;
	/** Queue or playlist position (`Pos`). */
	readonly position?: number;
	readonly artist: string;
	readonly artistSort?: string;
	readonly title: string;
	readonly titleSort?: string;
	readonly date?: string;
	/** Seconds. */
	readonly duration: number;
	readonly disc: number;
	readonly track: number;
	readonly genre?: string;
	readonly composer?: string;
	readonly performer?: string;
	readonly conductor?: string;
	readonly ensemble?: string;
	readonly mood?: string;
	readonly comment?: string;
	readonly album: Album;
}

/** Any item the library can play or list. */
export type Media = Song | Album | Artist;

export type MediaKind = Media["kind"];

export interface Playlist {
	readonly name: string;
}

export interface Output {
	readonly id: number;
	readonly name: string;
	readonly plugin?: string;
	readonly isEnabled: boolean;
	/** Runtime attributes reported as `attribute: key=value`. */
	readonly attributes: Readonly<Record<string, string>>;
}

export interface Status {
	readonly state?: PlayerState;
	readonly isConsume?: boolean;
	readonly isRandom?: boolean;
	readonly isRepeat?: boolean;
	readonly elapsed?: number;
	readonly volume?: number;
	readonly song?: Song;
}

export interface Stats {
	readonly artists?: number;
	readonly albums?: number;
	readonly songs?: number;
	readonly uptime?: number;
	/** Sum of all song durations in the database, in seconds. */
	readonly playtime?: number;
	/** Last database update as a UNIX timestamp. */
	readonly dbUpdate?: number;
}

/** Where a list of songs comes from or goes to. */
export type Source =
	| { readonly kind: "database" }
	| { readonly kind: "queue" }
	| { readonly kind: "playlist"; readonly playlist: Playlist }
	| { readonly kind: "favorites" };

export type SortOption = "artist" | "album" | "song" | "modified";
export type SortDirection = "ascending" | "descending";

export interface SortDescriptor {
	readonly option: SortOption;
	readonly direction: SortDirection;
}

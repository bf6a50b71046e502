import { FAVORITES_PLAYLIST } from "./const.js";
import type {
	Album,
	Artist,
	Media,
	Playlist,
	SortDescriptor,
	SortOption,
	Source,
} from "./types.js";

const SORT_TAGS: Record<SortOption, string> = {
	artist: "albumartistsort",
	album: "albumsort",
	song: "titlesort",
	modified: "Last-Modified",
};

export const DEFAULT_SORT: SortDescriptor = {
	option: "artist",
	direction: "ascending",
};

export const Sources = {
	database: { kind: "database" },
	queue: { kind: "queue" },
	favorites: { kind: "favorites" },
	playlist: (playlist: Playlist): Source => ({ kind: "playlist", playlist }),
} as const satisfies Record<string, Source | ((playlist: Playlist) => Source)>;

/** The `sort` argument for `find`, e.g. `-albumsort`. */
export function sortArgument(sort: SortDescriptor): string {
	return `${sort.direction === "descending" ? "-" : ""}${SORT_TAGS[sort.option]}`;
}

/** The stored playlist behind a source, if it is one. */
export function sourcePlaylist(source: Source): Playlist | undefined {
	switch (source.kind) {
		case "playlist":
			return source.playlist;
		case "favorites":
			return { name: FAVORITES_PLAYLIST };
		case "database":
		case "queue":
			return undefined;
	}
}

export function artistId(artist: Artist): string {
	return artist.name;
}

export function albumId(album: Album): string {
	return `${album.artist.name} - ${album.title}`;
}

/** Identity used to compare media of the same kind. */
export function mediaId(media: Media): string {
	switch (media.kind) {
		case "song":
			return media.file;
		case "album":
			return albumId(media);
		case "artist":
			return artistId(media);
	}
}

/** Keeps the first item for every distinct id, in order. */
export function uniqueBy<T>(items: readonly T[], id: (item: T) => string): T[] {
	const seen = new Set<string>();
	const unique: T[] = [];
	for (const item of items) {
		const key = id(item);
		if (!seen.has(key)) {
			seen.add(key);
			unique.push(item);
		}
	}
	return unique;
}

import { ArtworkConnection } from "./artworkConnection.js";
import { Client, applyDefaultValuesIfNotSet } from "./client.js";
import type { Config, ResolvedConfig } from "./client.js";
import { Command } from "./command.js";
import { CommandConnection } from "./commandConnection.js";
import { Connection } from "./connection.js";
import type { ConnectionOptions } from "./connection.js";
import {
	ConnectionError,
	MalformedResponseError,
	MpdError,
	UnsupportedOperationError,
} from "./error.js";
import type { ConnectionErrorCode } from "./error.js";
import { EventManager } from "./event.js";
import { IdleConnection } from "./idleConnection.js";
import { DEFAULT_SORT, Sources, albumId, artistId, mediaId } from "./media.js";
import { ArtworkMode, CommandMode, IdleMode } from "./mode.js";
import type { ConnectionMode } from "./mode.js";
import { and, escapeArg, filter } from "./parserUtils.js";
import { Parsers } from "./parsers.js";

export type * from "./types.js";
export type {
	Config,
	ResolvedConfig,
	ConnectionOptions,
	ConnectionMode,
	ConnectionErrorCode,
};

export default Client;
export {
	Client,
	applyDefaultValuesIfNotSet,
	Connection,
	CommandConnection,
	ArtworkConnection,
	IdleConnection,
	IdleMode,
	CommandMode,
	ArtworkMode,
	EventManager,
	MpdError,
	ConnectionError,
	MalformedResponseError,
	UnsupportedOperationError,
	Command,
	Parsers,
	Sources,
	DEFAULT_SORT,
	albumId,
	artistId,
	mediaId,
	escapeArg,
	filter,
	and,
};

/**
 * Types for Minecraft Java Server List Ping and Bedrock RakNet ping responses
 */

export interface ServerVersion {
	name: string;
	protocol: number;
}

export interface ServerPlayers {
	max: number;
	online: number;
	sample?: PlayerSample[];
}

export interface PlayerSample {
	name: string;
	id: string;
}

export interface ServerDescription {
	text?: string;
	// Can also be a complex chat component, but we'll flatten to string
	extra?: Array<{ text?: string }>;
}

/**
 * Raw response from a Java server (JSON structure)
 */
export interface ServerStatusRaw {
	version: ServerVersion;
	players: ServerPlayers;
	description: ServerDescription | string;
	favicon?: string;
	enforcesSecureChat?: boolean;
	previewsChat?: boolean;
}

/**
 * Normalized Java server status
 */
export interface ServerStatus {
	host: string;
	port: number;
	version: string;
	protocol: number;
	players: {
		online: number;
		max: number;
		sample: PlayerSample[];
	};
	motd: string;
	favicon?: string;
	latency: number;
}

/**
 * Normalized Bedrock server status, decoded from the unconnected pong advertisement
 */
export interface BedrockStatus {
	host: string;
	port: number;
	/** "MCPE" for Bedrock, "MCEE" for Education Edition */
	edition: string;
	motd: string;
	levelName?: string;
	gameMode?: string;
	version: string;
	protocol: number;
	players: {
		online: number;
		max: number;
	};
	serverId: string;
	latency: number;
}

export interface PingOptions {
	timeout?: number;
	protocolVersion?: number;
}

export interface BedrockPingOptions {
	timeout?: number;
	clientGuid?: bigint;
}

export type PingErrorCode = "TIMEOUT" | "CONNECTION" | "PROTOCOL";

export class PingError extends Error {
	constructor(
		readonly code: PingErrorCode,
		message: string
	) {
		super(message);
		this.name = "PingError";
	}
}

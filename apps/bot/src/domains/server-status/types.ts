export type ProbeMode = "auto" | "java" | "bedrock";
export type Edition = "java" | "bedrock";

export type ServerState = "online" | "offline";
export type AnnouncedState = ServerState | "unknown";

/**
 * Whatever the probe learned about the server. Every field except `edition` is
 * best-effort: a TCP fallback reports reachability with no metadata at all.
 */
export interface StatusDetail {
	edition: Edition;
	latencyMs?: number;
	playersOnline?: number;
	playersMax?: number;
	version?: string;
	motd?: string;
	error?: string;
}

/** One poll result */
export interface RawStatus {
	timestamp: Date;
	reachable: boolean;
	detail?: StatusDetail;
}

export interface AnnouncementEvent {
	newState: ServerState;
	observedAt: Date;
	detail?: StatusDetail;
}

export type MessageStyle = "plain" | "embed";

/**
 * mc-monitor - Minecraft server status library
 *
 * Pure TypeScript implementations of the Java Server List Ping protocol (1.7+)
 * and the Bedrock RakNet unconnected ping.
 *
 * @example
 * ```ts
 * import { ping, pingBedrock } from "@blockwatch/mc-monitor";
 *
 * const java = await ping("play.example.com", 25565);
 * console.log(`${java.players.online}/${java.players.max} players`);
 *
 * const bedrock = await pingBedrock("play.example.com", 19132, { timeout: 3000 });
 * console.log(bedrock.version);
 * ```
 */

export { pingBedrock } from "./bedrock";
export { isPortOpen, parseDescription, ping } from "./ping";
export type {
	BedrockPingOptions,
	BedrockStatus,
	PingErrorCode,
	PingOptions,
	PlayerSample,
	ServerPlayers,
	ServerStatus,
	ServerVersion,
} from "./types";
export { PingError } from "./types";

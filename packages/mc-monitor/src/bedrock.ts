/**
 * Minecraft Bedrock status via RakNet unconnected ping
 * Protocol: https://wiki.vg/Raknet_Protocol#Unconnected_Ping
 */

import { randomBytes } from "node:crypto";
import { createSocket } from "node:dgram";
import { type BedrockPingOptions, type BedrockStatus, PingError } from "./types";

const DEFAULT_TIMEOUT = 5000;

const UNCONNECTED_PING = 0x01;
const UNCONNECTED_PONG = 0x1c;

// Offline message ID every RakNet implementation checks for
export const RAKNET_MAGIC = Uint8Array.from([
	0x00, 0xff, 0xff, 0x00, 0xfe, 0xfe, 0xfe, 0xfe, 0xfd, 0xfd, 0xfd, 0xfd, 0x12, 0x34, 0x56, 0x78,
]);

// id (1) + time (8) + server guid (8) + magic (16) + string length (2)
const PONG_HEADER_LENGTH = 35;

/**
 * Build an unconnected ping: id, timestamp, magic, client GUID
 */
export function buildUnconnectedPing(timestamp: bigint, clientGuid: bigint): Uint8Array {
	const packet = new Uint8Array(1 + 8 + RAKNET_MAGIC.length + 8);
	const view = new DataView(packet.buffer);

	packet[0] = UNCONNECTED_PING;
	view.setBigInt64(1, timestamp, false);
	packet.set(RAKNET_MAGIC, 9);
	view.setBigUint64(9 + RAKNET_MAGIC.length, clientGuid, false);

	return packet;
}

/**
 * Decode an unconnected pong into its timestamp, server GUID and advertisement string
 */
export function parseUnconnectedPong(packet: Uint8Array): {
	timestamp: bigint;
	serverGuid: bigint;
	advertisement: string;
} {
	if (packet[0] !== UNCONNECTED_PONG) {
		throw new PingError("PROTOCOL", `Unexpected packet id ${packet[0]}`);
	}
	if (packet.length < PONG_HEADER_LENGTH) {
		throw new PingError("PROTOCOL", "Unconnected pong is truncated");
	}

	const view = new DataView(packet.buffer, packet.byteOffset, packet.byteLength);
	const magic = packet.subarray(17, 17 + RAKNET_MAGIC.length);
	if (!magic.every((byte, i) => byte === RAKNET_MAGIC[i])) {
		throw new PingError("PROTOCOL", "Unconnected pong has an invalid magic");
	}

	const length = view.getUint16(33, false);
	if (packet.length < PONG_HEADER_LENGTH + length) {
		throw new PingError("PROTOCOL", "Unconnected pong advertisement is truncated");
	}

	return {
		timestamp: view.getBigInt64(1, false),
		serverGuid: view.getBigUint64(9, false),
		advertisement: new TextDecoder().decode(
			packet.subarray(PONG_HEADER_LENGTH, PONG_HEADER_LENGTH + length)
		),
	};
}

function toInt(value: string | undefined): number {
	const parsed = Number.parseInt(value ?? "", 10);
	return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Parse the semicolon-separated server advertisement:
 * edition;motd;protocol;version;online;max;serverId;levelName;gameMode;...
 */
export function parseAdvertisement(
	advertisement: string,
	host: string,
	port: number,
	latency: number
): BedrockStatus {
	const [edition, motd, protocol, version, online, max, serverId, levelName, gameMode] =
		advertisement.split(";");

	if (edition === undefined || max === undefined || motd === undefined || version === undefined) {
		throw new PingError("PROTOCOL", `Malformed Bedrock advertisement: ${advertisement}`);
	}

	return {
		host,
		port,
		edition,
		motd,
		levelName: levelName || undefined,
		gameMode: gameMode || undefined,
		version,
		protocol: toInt(protocol),
		players: {
			online: toInt(online),
			max: toInt(max),
		},
		serverId: serverId ?? "",
		latency,
	};
}

/**
 * Ping a Minecraft Bedrock server over UDP
 */
export async function pingBedrock(
	host: string,
	port = 19132,
	options: BedrockPingOptions = {}
): Promise<BedrockStatus> {
	const timeout = options.timeout ?? DEFAULT_TIMEOUT;
	const clientGuid = options.clientGuid ?? randomBytes(8).readBigUInt64BE(0);

	return new Promise((resolve, reject) => {
		const socket = createSocket("udp4");
		const sentAt = Date.now();
		let settled = false;

		const finish = (result: { status: BedrockStatus } | { error: PingError }) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			socket.close();
			if ("error" in result) {
				reject(result.error);
			} else {
				resolve(result.status);
			}
		};

		const timeoutId = setTimeout(() => {
			finish({ error: new PingError("TIMEOUT", `No Bedrock response after ${timeout}ms`) });
		}, timeout);

		socket.on("message", (message: Buffer) => {
			try {
				const pong = parseUnconnectedPong(message);
				// Only the pong echoing our ping answers it
				if (pong.timestamp !== BigInt(sentAt)) return;
				finish({ status: parseAdvertisement(pong.advertisement, host, port, Date.now() - sentAt) });
			} catch (e) {
				finish({
					error: e instanceof PingError ? e : new PingError("PROTOCOL", `Malformed pong: ${e}`),
				});
			}
		});

		socket.on("error", (error) => {
			finish({ error: new PingError("CONNECTION", error.message) });
		});

		socket.send(buildUnconnectedPing(BigInt(sentAt), clientGuid), port, host, (error) => {
			if (error) {
				finish({ error: new PingError("CONNECTION", error.message) });
			}
		});
	});
}

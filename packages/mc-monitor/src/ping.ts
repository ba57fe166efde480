/**
 * Minecraft Server List Ping implementation
 * Protocol: https://wiki.vg/Server_List_Ping
 */

import { createConnection } from "node:net";
import { PingError, type PingOptions, type ServerStatus, type ServerStatusRaw } from "./types";
import { decodeVarInt, encodeVarInt, hasCompleteVarInt } from "./varint";

const DEFAULT_TIMEOUT = 5000;
const DEFAULT_PROTOCOL_VERSION = 767; // 1.21.x

export interface Packet {
	id: number;
	payload: Uint8Array;
}

/**
 * Build a packet with length prefix
 */
export function buildPacket(packetId: number, ...data: Uint8Array[]): Uint8Array {
	const packetIdBytes = encodeVarInt(packetId);
	const dataLength = data.reduce((sum, d) => sum + d.length, 0);
	const totalLength = packetIdBytes.length + dataLength;
	const lengthBytes = encodeVarInt(totalLength);

	const packet = new Uint8Array(lengthBytes.length + totalLength);
	let offset = 0;

	packet.set(lengthBytes, offset);
	offset += lengthBytes.length;

	packet.set(packetIdBytes, offset);
	offset += packetIdBytes.length;

	for (const d of data) {
		packet.set(d, offset);
		offset += d.length;
	}

	return packet;
}

/**
 * Split the first complete packet off a stream buffer.
 * Returns null while the packet is still incomplete.
 */
export function readPacket(buffer: Uint8Array): { packet: Packet; rest: Uint8Array } | null {
	if (!hasCompleteVarInt(buffer, 0)) {
		return null;
	}
	const { value: packetLength, bytesRead: lengthBytes } = decodeVarInt(buffer, 0);
	if (buffer.length < lengthBytes + packetLength) {
		return null;
	}

	const packetData = buffer.slice(lengthBytes, lengthBytes + packetLength);
	const { value: id, bytesRead: idBytes } = decodeVarInt(packetData, 0);

	return {
		packet: { id, payload: packetData.slice(idBytes) },
		rest: buffer.slice(lengthBytes + packetLength),
	};
}

/**
 * Encode a string as length-prefixed UTF-8
 */
export function encodeString(str: string): Uint8Array {
	const utf8 = new TextEncoder().encode(str);
	const lengthBytes = encodeVarInt(utf8.length);
	const result = new Uint8Array(lengthBytes.length + utf8.length);
	result.set(lengthBytes, 0);
	result.set(utf8, lengthBytes.length);
	return result;
}

/**
 * Build handshake packet (packet ID 0x00)
 */
export function buildHandshake(host: string, port: number, protocolVersion: number): Uint8Array {
	const protocolBytes = encodeVarInt(protocolVersion);
	const hostBytes = encodeString(host);
	const portBytes = new Uint8Array(2);
	new DataView(portBytes.buffer).setUint16(0, port, false); // big-endian
	const nextState = encodeVarInt(1); // 1 = status

	return buildPacket(0x00, protocolBytes, hostBytes, portBytes, nextState);
}

function buildStatusRequest(): Uint8Array {
	return buildPacket(0x00);
}

function buildPingPacket(timestamp: bigint): Uint8Array {
	const timestampBytes = new Uint8Array(8);
	new DataView(timestampBytes.buffer).setBigInt64(0, timestamp, false);
	return buildPacket(0x01, timestampBytes);
}

/**
 * Parse description to plain text
 */
export function parseDescription(desc: ServerStatusRaw["description"]): string {
	if (typeof desc === "string") {
		return desc;
	}
	if (desc.text !== undefined) {
		let text = desc.text;
		if (desc.extra) {
			text += desc.extra.map((e) => e.text || "").join("");
		}
		return text;
	}
	return "";
}

/**
 * Decode the JSON body of a status response (packet 0x00) into a normalized status.
 */
export function parseStatusResponse(
	payload: Uint8Array,
	host: string,
	port: number,
	latency: number
): ServerStatus {
	const { value: jsonLength, bytesRead } = decodeVarInt(payload, 0);
	const json = new TextDecoder().decode(payload.slice(bytesRead, bytesRead + jsonLength));

	let raw: ServerStatusRaw;
	try {
		raw = JSON.parse(json);
	} catch (e) {
		throw new PingError("PROTOCOL", `Failed to parse status JSON: ${e}`);
	}
	if (!raw?.version || !raw.players) {
		throw new PingError("PROTOCOL", "Status response is missing version or players");
	}

	return {
		host,
		port,
		version: raw.version.name,
		protocol: raw.version.protocol,
		players: {
			online: raw.players.online,
			max: raw.players.max,
			sample: raw.players.sample ?? [],
		},
		motd: parseDescription(raw.description ?? ""),
		favicon: raw.favicon,
		latency,
	};
}

/**
 * Ping a Minecraft Java server using the Server List Ping protocol
 */
export async function ping(host: string, port = 25565, options: PingOptions = {}): Promise<ServerStatus> {
	const timeout = options.timeout ?? DEFAULT_TIMEOUT;
	const protocolVersion = options.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;

	return new Promise((resolve, reject) => {
		let buffer: Uint8Array = new Uint8Array(0);
		let statusPayload: Uint8Array | null = null;
		let pingSentAt = 0n;
		let settled = false;

		const socket = createConnection({ host, port });

		const finish = (result: { status: ServerStatus } | { error: PingError }) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			socket.destroy();
			if ("error" in result) {
				reject(result.error);
			} else {
				resolve(result.status);
			}
		};

		const timeoutId = setTimeout(() => {
			finish({ error: new PingError("TIMEOUT", `Connection timeout after ${timeout}ms`) });
		}, timeout);

		socket.on("connect", () => {
			socket.write(buildHandshake(host, port, protocolVersion));
			socket.write(buildStatusRequest());
		});

		socket.on("data", (data: Buffer) => {
			const newBuffer = new Uint8Array(buffer.length + data.length);
			newBuffer.set(buffer, 0);
			newBuffer.set(data, buffer.length);
			buffer = newBuffer;

			try {
				let next = readPacket(buffer);
				while (next && !settled) {
					buffer = next.rest;
					const { packet } = next;

					if (packet.id === 0x00 && !statusPayload) {
						// Status response; measure latency with a ping before resolving
						statusPayload = packet.payload;
						pingSentAt = BigInt(Date.now());
						socket.write(buildPingPacket(pingSentAt));
					} else if (packet.id === 0x01) {
						// Pong response
						const latency = Number(BigInt(Date.now()) - pingSentAt);
						if (!statusPayload) {
							finish({ error: new PingError("PROTOCOL", "No status response received") });
							return;
						}
						finish({ status: parseStatusResponse(statusPayload, host, port, latency) });
						return;
					}

					next = readPacket(buffer);
				}
			} catch (e) {
				finish({
					error: e instanceof PingError ? e : new PingError("PROTOCOL", `Malformed packet: ${e}`),
				});
			}
		});

		socket.on("error", (error) => {
			finish({ error: new PingError("CONNECTION", error.message) });
		});

		socket.on("close", () => {
			finish({ error: new PingError("CONNECTION", "Connection closed before receiving response") });
		});
	});
}

/**
 * Check whether anything accepts TCP connections on the port.
 * Used as a reachability fallback when a server does not answer the status query.
 */
export async function isPortOpen(host: string, port: number, timeout = DEFAULT_TIMEOUT): Promise<boolean> {
	return new Promise((resolve) => {
		const socket = createConnection({ host, port });
		let settled = false;

		const finish = (open: boolean) => {
			if (settled) return;
			settled = true;
			clearTimeout(timeoutId);
			socket.destroy();
			resolve(open);
		};

		const timeoutId = setTimeout(() => finish(false), timeout);

		socket.on("connect", () => finish(true));
		socket.on("error", () => finish(false));
		socket.on("close", () => finish(false));
	});
}

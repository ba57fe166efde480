/**
 * Probe adapter
 *
 * Queries the server over the Java or Bedrock protocol and reduces the answer to a
 * RawStatus. Strategies reject with a ProbeError on failure; `probeServer` is the only
 * entry point the poller uses and it never rejects.
 */

import logger from "@blockwatch/logger";
import { isPortOpen, PingError, ping, pingBedrock } from "@blockwatch/mc-monitor";
import type { Edition, ProbeMode, RawStatus, StatusDetail } from "./types";

const log = logger.child({ module: "probe" });

export type ProbeErrorKind = "timeout" | "unreachable" | "protocol" | "unavailable";

export class ProbeError extends Error {
	constructor(
		readonly kind: ProbeErrorKind,
		readonly edition: Edition,
		message: string
	) {
		super(message);
		this.name = "ProbeError";
	}
}

export interface ProbeTarget {
	host: string;
	port: number;
	timeoutMs: number;
}

export interface ProbeStrategy {
	readonly name: string;
	query(target: ProbeTarget): Promise<StatusDetail>;
}

export interface ProbeCapabilities {
	bedrock: boolean;
	javaTcpFallback: boolean;
}

function toProbeError(edition: Edition, error: unknown): ProbeError {
	if (error instanceof ProbeError) {
		return error;
	}
	if (error instanceof PingError) {
		const kind = error.code === "TIMEOUT" ? "timeout" : error.code === "PROTOCOL" ? "protocol" : "unreachable";
		return new ProbeError(kind, edition, error.message);
	}
	return new ProbeError("unreachable", edition, error instanceof Error ? error.message : String(error));
}

/**
 * Java edition Server List Ping, optionally falling back to a bare TCP connect
 */
export class JavaProbe implements ProbeStrategy {
	readonly name = "java";

	constructor(private readonly tcpFallback: boolean) {}

	async query(target: ProbeTarget): Promise<StatusDetail> {
		try {
			const status = await ping(target.host, target.port, { timeout: target.timeoutMs });
			return {
				edition: "java",
				latencyMs: status.latency,
				playersOnline: status.players.online,
				playersMax: status.players.max,
				version: status.version,
				motd: status.motd,
			};
		} catch (error) {
			const failure = toProbeError("java", error);
			if (!this.tcpFallback) {
				throw failure;
			}
			log.debug({ err: failure, host: target.host, port: target.port }, "java status query failed, trying TCP");
			if (await isPortOpen(target.host, target.port, target.timeoutMs)) {
				return { edition: "java" };
			}
			throw failure;
		}
	}
}

export class BedrockProbe implements ProbeStrategy {
	readonly name = "bedrock";

	async query(target: ProbeTarget): Promise<StatusDetail> {
		try {
			const status = await pingBedrock(target.host, target.port, { timeout: target.timeoutMs });
			return {
				edition: "bedrock",
				latencyMs: status.latency,
				playersOnline: status.players.online,
				playersMax: status.players.max,
				version: status.version,
				motd: status.motd,
			};
		} catch (error) {
			throw toProbeError("bedrock", error);
		}
	}
}

/**
 * Stands in for the Bedrock probe when Bedrock probing is switched off
 */
export class UnavailableProbe implements ProbeStrategy {
	readonly name = "bedrock-unavailable";

	async query(): Promise<StatusDetail> {
		throw new ProbeError("unavailable", "bedrock", "Bedrock probing is not available");
	}
}

/**
 * Tries each strategy in order and returns the first answer.
 * When all fail, the last failure is reported.
 */
export class FallbackProbe implements ProbeStrategy {
	readonly name: string;

	constructor(private readonly strategies: [ProbeStrategy, ...ProbeStrategy[]]) {
		this.name = strategies.map((s) => s.name).join("+");
	}

	async query(target: ProbeTarget): Promise<StatusDetail> {
		let lastError: unknown;
		for (const strategy of this.strategies) {
			try {
				return await strategy.query(target);
			} catch (error) {
				log.debug({ err: error, strategy: strategy.name }, "probe attempt failed");
				lastError = error;
			}
		}
		throw lastError;
	}
}

/**
 * Pick the probing strategy for a protocol mode given what this process can do
 */
export function selectStrategy(mode: ProbeMode, capabilities: ProbeCapabilities): ProbeStrategy {
	const java = new JavaProbe(capabilities.javaTcpFallback);
	const bedrock = capabilities.bedrock ? new BedrockProbe() : new UnavailableProbe();

	switch (mode) {
		case "java":
			return java;
		case "bedrock":
			return bedrock;
		case "auto":
			return new FallbackProbe([java, bedrock]);
	}
}

/**
 * Run one probe and report it as a RawStatus. Never rejects.
 */
export async function probeServer(
	strategy: ProbeStrategy,
	target: ProbeTarget,
	now: () => Date = () => new Date()
): Promise<RawStatus> {
	try {
		const detail = await strategy.query(target);
		return { timestamp: now(), reachable: true, detail };
	} catch (error) {
		const failure = toProbeError(error instanceof ProbeError ? error.edition : "java", error);
		log.debug({ kind: failure.kind, edition: failure.edition, error: failure.message }, "server unreachable");
		return {
			timestamp: now(),
			reachable: false,
			detail: { edition: failure.edition, error: failure.message },
		};
	}
}

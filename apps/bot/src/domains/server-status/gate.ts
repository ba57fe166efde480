/**
 * Status gate
 *
 * Turns the noisy reachable/unreachable signal from the poller into announcements.
 * A state is announced once it has been observed `stableThreshold` times in a row,
 * differs from the last announced state, and at least `rateLimitMs` has passed since
 * the previous announcement. A transition held back by the rate limit stays pending and
 * fires on the first observation after the window closes.
 *
 * The gate is not safe for overlapping callers; the poller serializes `observe` calls.
 */

import type { AnnouncedState, AnnouncementEvent, RawStatus, ServerState } from "./types";

export interface GateOptions {
	/** Consecutive agreeing observations required before announcing (>= 1) */
	stableThreshold: number;
	/** Minimum time between announcements; 0 disables the limit */
	rateLimitMs: number;
}

export interface GateSnapshot {
	announced: AnnouncedState;
	pending: ServerState | null;
	pendingCount: number;
	lastAnnouncedAt: Date | null;
}

export class StatusGate {
	private announced: AnnouncedState = "unknown";
	private pending: ServerState | null = null;
	private pendingCount = 0;
	private lastAnnouncedAt: Date | null = null;

	constructor(private readonly options: GateOptions) {}

	observe(raw: RawStatus): AnnouncementEvent | null {
		const state: ServerState = raw.reachable ? "online" : "offline";

		if (state === this.pending) {
			this.pendingCount++;
		} else {
			this.pending = state;
			this.pendingCount = 1;
		}

		// From here on `state` is the pending state
		if (state === this.announced) {
			return null;
		}
		if (this.pendingCount < this.options.stableThreshold) {
			return null;
		}
		if (this.isRateLimited(raw.timestamp)) {
			return null;
		}

		this.announced = state;
		this.lastAnnouncedAt = raw.timestamp;

		return {
			newState: state,
			observedAt: raw.timestamp,
			detail: raw.detail,
		};
	}

	snapshot(): GateSnapshot {
		return {
			announced: this.announced,
			pending: this.pending,
			pendingCount: this.pendingCount,
			lastAnnouncedAt: this.lastAnnouncedAt,
		};
	}

	private isRateLimited(now: Date): boolean {
		if (this.options.rateLimitMs <= 0 || this.lastAnnouncedAt === null) {
			return false;
		}
		return now.getTime() - this.lastAnnouncedAt.getTime() < this.options.rateLimitMs;
	}
}

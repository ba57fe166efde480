/**
 * Server status poller
 *
 * Probes the server on a fixed interval and on demand, feeds every result through the
 * status gate and hands emitted announcements to the notifier. Scheduled and manual
 * checks share one queue, so the gate sees one observation at a time in timestamp order.
 */

import logger from "@blockwatch/logger";
import { withSpan } from "../../infra/telemetry";
import type { StatusGate } from "./gate";
import type { DeliveryResult, Notifier } from "./notifier";
import { type ProbeStrategy, type ProbeTarget, probeServer } from "./probe";
import type { AnnouncementEvent, RawStatus } from "./types";

const log = logger.child({ module: "status-poller" });

export type CheckSource = "schedule" | "command";

export interface CheckReport {
	source: CheckSource;
	status: RawStatus;
	announcement: AnnouncementEvent | null;
	delivery: DeliveryResult | null;
}

export interface PollerOptions {
	strategy: ProbeStrategy;
	target: ProbeTarget;
	gate: StatusGate;
	notifier: Notifier;
	intervalMs: number;
	now?: () => Date;
}

export class StatusPoller {
	private pollInterval: ReturnType<typeof setInterval> | null = null;
	private queue: Promise<unknown> = Promise.resolve();

	constructor(private readonly options: PollerOptions) {}

	get running(): boolean {
		return this.pollInterval !== null;
	}

	/**
	 * Start polling: one check right away, then one per interval.
	 */
	start(): void {
		if (this.pollInterval) {
			log.warn("status poller already running");
			return;
		}

		log.info(
			{ intervalMs: this.options.intervalMs, strategy: this.options.strategy.name },
			"starting status poller"
		);

		this.scheduleCheck();
		this.pollInterval = setInterval(() => this.scheduleCheck(), this.options.intervalMs);
	}

	stop(): void {
		if (this.pollInterval) {
			clearInterval(this.pollInterval);
			this.pollInterval = null;
			log.info("status poller stopped");
		}
	}

	/**
	 * Manual check: runs the same probe → gate → notify sequence as a scheduled poll,
	 * in turn with any check already in progress.
	 */
	checkNow(): Promise<CheckReport> {
		return this.enqueue("command");
	}

	/**
	 * Resolves once every check queued so far has finished.
	 */
	async idle(): Promise<void> {
		await this.queue;
	}

	private scheduleCheck(): void {
		this.enqueue("schedule").catch((err: unknown) => {
			log.error({ err }, "scheduled status check failed");
		});
	}

	private enqueue(source: CheckSource): Promise<CheckReport> {
		const run = this.queue.then(() => this.runCheck(source));
		// Keep the queue moving past a failed check; the failure reaches the caller through `run`
		this.queue = run.catch(() => undefined);
		return run;
	}

	private async runCheck(source: CheckSource): Promise<CheckReport> {
		const { strategy, target, gate, notifier, now } = this.options;

		return withSpan("status-poller", "status.check", async (span) => {
			span.setAttribute("status.source", source);

			const status = await probeServer(strategy, target, now);
			const announcement = gate.observe(status);
			span.setAttribute("status.reachable", status.reachable);

			log.debug(
				{ source, reachable: status.reachable, edition: status.detail?.edition, gate: gate.snapshot() },
				"status check complete"
			);

			if (!announcement) {
				return { source, status, announcement, delivery: null };
			}

			span.setAttribute("status.announced", announcement.newState);
			const delivery = await notifier.notify(announcement);
			return { source, status, announcement, delivery };
		});
	}
}

/**
 * Delivers announcements to the status channel. Failures are reported to the caller
 * and logged; nothing is retried here.
 */

import logger from "@blockwatch/logger";
import { type OutboundMessage, type RenderContext, renderAnnouncement } from "./render";
import type { AnnouncementEvent, MessageStyle } from "./types";

const log = logger.child({ module: "notifier" });

export type DeliveryErrorKind = "permission" | "channel" | "rejected" | "network";

export class DeliveryError extends Error {
	constructor(
		readonly kind: DeliveryErrorKind,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "DeliveryError";
	}
}

export type DeliveryResult = { ok: true } | { ok: false; error: DeliveryError };

/**
 * Where rendered messages go. Implementations throw on failure, ideally a DeliveryError.
 */
export interface ChannelSink {
	readonly channelId: string;
	send(message: OutboundMessage): Promise<void>;
}

export interface NotifierOptions {
	sink: ChannelSink;
	style: MessageStyle;
	context: RenderContext;
}

export class Notifier {
	constructor(private readonly options: NotifierOptions) {}

	async notify(event: AnnouncementEvent, style: MessageStyle = this.options.style): Promise<DeliveryResult> {
		const { sink, context } = this.options;
		const message = renderAnnouncement(event, style, context);

		try {
			await sink.send(message);
			log.info({ state: event.newState, channelId: sink.channelId }, "announced status");
			return { ok: true };
		} catch (err) {
			const error =
				err instanceof DeliveryError
					? err
					: new DeliveryError("network", err instanceof Error ? err.message : String(err), { cause: err });
			log.error(
				{ err: error, kind: error.kind, state: event.newState, channelId: sink.channelId },
				"failed to deliver announcement"
			);
			return { ok: false, error };
		}
	}
}

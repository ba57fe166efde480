import logger from "@blockwatch/logger";
import { type Client, DiscordAPIError, RESTJSONErrorCodes } from "discord.js";
import { type ChannelSink, DeliveryError } from "../domains/server-status/notifier";
import type { OutboundMessage } from "../domains/server-status/render";

const log = logger.child({ module: "discord" });

/**
 * Map a failed Discord call onto a delivery error
 */
export function toDeliveryError(error: unknown, channelId: string): DeliveryError {
	if (error instanceof DeliveryError) {
		return error;
	}
	if (error instanceof DiscordAPIError) {
		switch (error.code) {
			case RESTJSONErrorCodes.MissingPermissions:
			case RESTJSONErrorCodes.MissingAccess:
				return new DeliveryError("permission", `Missing permission to send in channel ${channelId}`, {
					cause: error,
				});
			case RESTJSONErrorCodes.UnknownChannel:
				return new DeliveryError("channel", `Channel ${channelId} does not exist`, { cause: error });
			default:
				return new DeliveryError("rejected", error.message, { cause: error });
		}
	}
	return new DeliveryError("network", error instanceof Error ? error.message : String(error), {
		cause: error,
	});
}

/**
 * Channel sink backed by the bot's Discord client. Resolves the channel from the
 * cache first and falls back to fetching it.
 */
export function discordChannelSink(client: Client, channelId: string): ChannelSink {
	return {
		channelId,
		async send(message: OutboundMessage) {
			try {
				const channel = client.channels.cache.get(channelId) ?? (await client.channels.fetch(channelId));
				if (!channel?.isSendable()) {
					throw new DeliveryError("channel", `Channel ${channelId} is not a text channel the bot can post in`);
				}
				await channel.send(message);
				log.debug({ channelId }, "message sent");
			} catch (error) {
				throw toDeliveryError(error, channelId);
			}
		},
	};
}

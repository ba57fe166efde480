import { DiscordAPIError, RESTJSONErrorCodes } from "discord.js";
import { describe, expect, test } from "vitest";
import { DeliveryError } from "../domains/server-status/notifier";
import { toDeliveryError } from "./discord";

const channelId = "123456789012345678";

function apiError(code: number, message: string): DiscordAPIError {
	return new DiscordAPIError(
		{ code, message },
		code,
		403,
		"POST",
		`https://discord.com/api/v10/channels/${channelId}/messages`,
		{}
	);
}

describe("toDeliveryError", () => {
	test("maps missing permissions and access to a permission error", () => {
		for (const code of [RESTJSONErrorCodes.MissingPermissions, RESTJSONErrorCodes.MissingAccess]) {
			const error = toDeliveryError(apiError(code, "Missing Permissions"), channelId);
			expect(error.kind).toBe("permission");
			expect(error.message).toBe(`Missing permission to send in channel ${channelId}`);
		}
	});

	test("maps an unknown channel to a channel error", () => {
		const error = toDeliveryError(apiError(RESTJSONErrorCodes.UnknownChannel, "Unknown Channel"), channelId);
		expect(error.kind).toBe("channel");
	});

	test("treats other API errors as rejected messages", () => {
		const cause = apiError(RESTJSONErrorCodes.CannotSendAnEmptyMessage, "Cannot send an empty message");
		const error = toDeliveryError(cause, channelId);
		expect(error.kind).toBe("rejected");
		expect(error.cause).toBe(cause);
	});

	test("treats anything else as a network error", () => {
		expect(toDeliveryError(new Error("getaddrinfo ENOTFOUND discord.com"), channelId)).toMatchObject({
			kind: "network",
			message: "getaddrinfo ENOTFOUND discord.com",
		});
	});

	test("passes delivery errors through", () => {
		const original = new DeliveryError("channel", "not sendable");
		expect(toDeliveryError(original, channelId)).toBe(original);
	});
});

/**
 * Discord Embed Utilities
 */

import { EmbedBuilder } from "discord.js";

// === Color Palette ===
export const COLORS = {
	SUCCESS: 0x22c55e, // Green
	ERROR: 0xef4444, // Red
	UNKNOWN: 0x6b7280, // Gray
} as const;

// Discord rejects embed field values longer than this
export const FIELD_VALUE_LIMIT = 1024;

// === Status Helpers ===
export function statusColor(status: string): number {
	switch (status.toLowerCase()) {
		case "online":
			return COLORS.SUCCESS;
		case "offline":
			return COLORS.ERROR;
		default:
			return COLORS.UNKNOWN;
	}
}

export function statusEmoji(status: string): string {
	switch (status.toLowerCase()) {
		case "online":
			return "🟢";
		case "offline":
			return "🔴";
		default:
			return "⚪";
	}
}

// === Formatting Helpers ===
export function truncate(value: string, limit: number): string {
	if (value.length <= limit) return value;
	// Cut on code points so surrogate pairs stay whole
	const chars = Array.from(value);
	return chars.length > limit ? `${chars.slice(0, limit - 3).join("")}...` : value;
}

/**
 * "2024-05-01 12:00:00 UTC"
 */
export function formatUtc(date: Date): string {
	return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

/**
 * Create an embed in the given color, stamped with the given time
 */
export function statusEmbed(title: string, color: number, timestamp: Date): EmbedBuilder {
	return new EmbedBuilder().setTitle(title).setColor(color).setTimestamp(timestamp);
}

/**
 * Renders server status as Discord messages, either as an embed or as plain text.
 * Announcements say the server "is now" online/offline; manual status replies
 * describe the current probe result.
 */

import type { EmbedBuilder } from "discord.js";
import {
	FIELD_VALUE_LIMIT,
	formatUtc,
	statusColor,
	statusEmbed,
	statusEmoji,
	truncate,
} from "../../utils/embeds";
import type { AnnouncementEvent, MessageStyle, RawStatus, ServerState, StatusDetail } from "./types";

export interface RenderContext {
	host: string;
	port: number;
	stableThreshold: number;
	rateLimitSeconds: number;
}

export type ReportKind = "announcement" | "status";

export interface OutboundMessage {
	content?: string;
	embeds?: EmbedBuilder[];
}

interface StatusView {
	state: ServerState;
	at: Date;
	detail?: StatusDetail;
}

function headline(view: StatusView, kind: ReportKind): string {
	const verb = kind === "announcement" ? "is now" : "is";
	return `Server ${verb} ${view.state === "online" ? "ONLINE" : "OFFLINE"}`;
}

function formatPlayers(detail: StatusDetail): string | null {
	const { playersOnline, playersMax } = detail;
	if (playersOnline === undefined && playersMax === undefined) {
		return null;
	}
	if (playersMax === undefined) {
		return `${playersOnline}`;
	}
	return `${playersOnline ?? "?"}/${playersMax}`;
}

function nonEmpty(value: string | undefined): string | null {
	const trimmed = value?.trim();
	return trimmed ? trimmed : null;
}

function renderEmbed(view: StatusView, kind: ReportKind, context: RenderContext): EmbedBuilder {
	const online = view.state === "online";
	const detail = view.detail;
	const title = `${headline(view, kind)} ${online ? "✅" : "❌"}`;

	const embed = statusEmbed(title, statusColor(view.state), view.at).addFields(
		{ name: "Host", value: `${context.host}:${context.port}`, inline: true },
		{ name: "Edition", value: detail?.edition ?? "unknown", inline: true },
		{ name: "Checked", value: formatUtc(view.at), inline: false }
	);

	if (online && detail) {
		const players = formatPlayers(detail);
		if (players) {
			embed.addFields({ name: "Players", value: players, inline: true });
		}
		const version = nonEmpty(detail.version);
		if (version) {
			embed.addFields({ name: "Version", value: truncate(version, FIELD_VALUE_LIMIT), inline: true });
		}
		if (detail.latencyMs !== undefined) {
			embed.addFields({ name: "Ping (ms)", value: String(detail.latencyMs), inline: true });
		}
		const motd = nonEmpty(detail.motd);
		if (motd) {
			embed.addFields({ name: "MOTD", value: truncate(motd, FIELD_VALUE_LIMIT), inline: false });
		}
	} else if (!online) {
		const error = nonEmpty(detail?.error);
		if (error) {
			embed.addFields({ name: "Error", value: truncate(error, FIELD_VALUE_LIMIT), inline: false });
		}
	}

	return embed.setFooter({
		text: `Debounce: ${context.stableThreshold} checks • RateLimit: ${context.rateLimitSeconds}s`,
	});
}

function renderText(view: StatusView, kind: ReportKind, context: RenderContext): string {
	const online = view.state === "online";
	const detail = view.detail;

	const lines = [
		online && detail
			? `${statusEmoji("online")} **${headline(view, kind)}!** (${detail.edition})`
			: `${statusEmoji(view.state)} **${headline(view, kind)}!**`,
		`Host: ${context.host}:${context.port}`,
		`Time: ${formatUtc(view.at)}`,
	];

	if (online && detail) {
		const players = formatPlayers(detail);
		if (players) lines.push(`Players: ${players}`);
		const version = nonEmpty(detail.version);
		if (version) lines.push(`Version: ${version}`);
		const motd = nonEmpty(detail.motd);
		if (motd) lines.push(`MOTD: ${motd}`);
	} else if (!online) {
		const error = nonEmpty(detail?.error);
		if (error) lines.push(`Error: ${error}`);
	}

	return lines.join("\n");
}

export function renderStatus(
	view: StatusView,
	kind: ReportKind,
	style: MessageStyle,
	context: RenderContext
): OutboundMessage {
	return style === "embed"
		? { embeds: [renderEmbed(view, kind, context)] }
		: { content: renderText(view, kind, context) };
}

export function renderAnnouncement(
	event: AnnouncementEvent,
	style: MessageStyle,
	context: RenderContext
): OutboundMessage {
	return renderStatus(
		{ state: event.newState, at: event.observedAt, detail: event.detail },
		"announcement",
		style,
		context
	);
}

export function renderStatusReport(
	status: RawStatus,
	style: MessageStyle,
	context: RenderContext
): OutboundMessage {
	return renderStatus(
		{ state: status.reachable ? "online" : "offline", at: status.timestamp, detail: status.detail },
		"status",
		style,
		context
	);
}

import { SlashCommandBuilder } from "discord.js";
import type { CheckReport } from "../domains/server-status/poller";
import { type OutboundMessage, type RenderContext, renderStatusReport } from "../domains/server-status/render";
import type { MessageStyle } from "../domains/server-status/types";

export const serverCommand = new SlashCommandBuilder()
	.setName("server")
	.setDescription("Check the Minecraft server status now");

export interface ServerCommandDeps {
	poller: { checkNow(): Promise<CheckReport> };
	style: MessageStyle;
	context: RenderContext;
}

/** The slice of an interaction the command replies through */
export interface StatusReply {
	deferReply(): Promise<unknown>;
	editReply(message: OutboundMessage): Promise<unknown>;
}

export async function handleServerCommand(
	interaction: StatusReply,
	{ poller, style, context }: ServerCommandDeps
): Promise<CheckReport> {
	// Probing can take longer than Discord's three second reply window
	await interaction.deferReply();

	const report = await poller.checkNow();
	await interaction.editReply(renderStatusReport(report.status, style, context));
	return report;
}

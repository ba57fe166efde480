import type { ChatInputCommandInteraction } from "discord.js";
import { handleServerCommand, type ServerCommandDeps, serverCommand } from "./server";

export type CommandDeps = ServerCommandDeps;

export const commands = [serverCommand];

export async function handleCommand(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<void> {
	switch (interaction.commandName) {
		case "server":
			await handleServerCommand(interaction, deps);
			return;
		default:
			await interaction.reply({
				content: "Unknown command",
				flags: 64, // Ephemeral
			});
	}
}

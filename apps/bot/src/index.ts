// Must stay the first import
import "./instrumentation";

import logger from "@blockwatch/logger";
import { Client, Events, GatewayIntentBits, REST, Routes } from "discord.js";
import { type CommandDeps, commands, handleCommand } from "./commands";
import { type Config, ConfigError, loadConfig } from "./config";
import { StatusGate } from "./domains/server-status/gate";
import { Notifier } from "./domains/server-status/notifier";
import { StatusPoller } from "./domains/server-status/poller";
import { selectStrategy } from "./domains/server-status/probe";
import type { RenderContext } from "./domains/server-status/render";
import { discordChannelSink } from "./infra/discord";
import { shutdownTelemetry, withSpan } from "./infra/telemetry";

const log = logger.child({ module: "bot" });

function readConfig(): Config {
	try {
		return loadConfig();
	} catch (error) {
		if (error instanceof ConfigError) {
			log.fatal({ issues: error.issues }, "invalid configuration");
			process.exit(1);
		}
		throw error;
	}
}

const config = readConfig();

const client = new Client({
	intents: [GatewayIntentBits.Guilds],
});

const context: RenderContext = {
	host: config.MC_SERVER_HOST,
	port: config.MC_SERVER_PORT,
	stableThreshold: config.STABLE_THRESHOLD,
	rateLimitSeconds: config.RATE_LIMIT_SECONDS,
};
const style = config.USE_EMBED ? "embed" : "plain";

if (config.MC_PROTOCOL !== "java" && !config.MC_BEDROCK_ENABLED) {
	log.warn({ mode: config.MC_PROTOCOL }, "Bedrock probing is disabled; Bedrock checks will report offline");
}

const strategy = selectStrategy(config.MC_PROTOCOL, {
	bedrock: config.MC_BEDROCK_ENABLED,
	javaTcpFallback: config.MC_JAVA_TCP_FALLBACK,
});

const poller = new StatusPoller({
	strategy,
	target: { host: config.MC_SERVER_HOST, port: config.MC_SERVER_PORT, timeoutMs: config.PROBE_TIMEOUT_MS },
	gate: new StatusGate({
		stableThreshold: config.STABLE_THRESHOLD,
		rateLimitMs: config.RATE_LIMIT_SECONDS * 1000,
	}),
	notifier: new Notifier({ sink: discordChannelSink(client, config.DISCORD_CHANNEL_ID), style, context }),
	intervalMs: config.CHECK_INTERVAL * 1000,
});

const deps: CommandDeps = { poller, style, context };

client.once(Events.ClientReady, async (readyClient) => {
	log.info(
		{
			tag: readyClient.user.tag,
			target: `${config.MC_SERVER_HOST}:${config.MC_SERVER_PORT}`,
			mode: config.MC_PROTOCOL,
			strategy: strategy.name,
			channelId: config.DISCORD_CHANNEL_ID,
		},
		"bot ready"
	);

	// Register commands globally
	const rest = new REST().setToken(config.DISCORD_TOKEN);
	try {
		log.info("registering slash commands");
		await rest.put(Routes.applicationCommands(readyClient.application.id), {
			body: commands.map((c) => c.toJSON()),
		});
		log.info({ commandCount: commands.length }, "slash commands registered");
	} catch (error) {
		log.error({ error }, "failed to register commands");
	}

	readyClient.user.setActivity("watching the server");
	poller.start();
});

client.on(Events.InteractionCreate, async (interaction) => {
	if (!interaction.isChatInputCommand()) return;

	const commandName = interaction.commandName;
	log.info({ command: commandName, user: interaction.user.tag }, "command received");

	try {
		await withSpan("discord", `command.${commandName}`, async (span) => {
			span.setAttribute("discord.command", commandName);
			span.setAttribute("discord.user", interaction.user.tag);
			span.setAttribute("discord.guild", interaction.guildId ?? "dm");

			try {
				await handleCommand(interaction, deps);
				log.info({ command: commandName }, "command completed");
			} catch (error) {
				log.error({ error, command: commandName }, "command error");
				const content = "An error occurred while executing this command.";
				if (interaction.deferred || interaction.replied) {
					await interaction.followUp({ content, flags: 64 });
				} else {
					await interaction.reply({ content, flags: 64 });
				}
				throw error; // Re-throw so span records error
			}
		});
	} catch (error) {
		log.debug({ error, command: commandName }, "command span closed with error");
	}
});

async function shutdown(signal: NodeJS.Signals): Promise<void> {
	log.info({ signal }, "shutting down");
	poller.stop();
	await client.destroy();
	await shutdownTelemetry();
	process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		shutdown(signal).catch((error: unknown) => {
			log.error({ error }, "shutdown failed");
			process.exit(1);
		});
	});
}

client.login(config.DISCORD_TOKEN).catch((error: unknown) => {
	log.fatal({ error }, "failed to log in to Discord");
	process.exit(1);
});

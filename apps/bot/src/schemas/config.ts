import { z } from "zod";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);

function envBoolean(fallback: boolean) {
	return z
		.string()
		.optional()
		.transform((value) => (value === undefined ? fallback : TRUTHY.has(value.trim().toLowerCase())));
}

// Node timers clamp delays above this to 1ms
const MAX_TIMER_MS = 2_147_483_647;

function envInt(fallback: number, min: number, max: number) {
	return z.coerce
		.number({ invalid_type_error: "must be a whole number" })
		.int("must be a whole number")
		.min(min, `must be at least ${min}`)
		.max(max, `must be at most ${max}`)
		.default(fallback);
}

export const configSchema = z.object({
	DISCORD_TOKEN: z
		.string({ required_error: "DISCORD_TOKEN is required" })
		.trim()
		.min(1, "DISCORD_TOKEN is required"),
	DISCORD_CHANNEL_ID: z
		.string({ required_error: "DISCORD_CHANNEL_ID is required" })
		.trim()
		.regex(/^\d{17,20}$/, "DISCORD_CHANNEL_ID must be a numeric channel id"),

	MC_SERVER_HOST: z.string().trim().min(1, "MC_SERVER_HOST must not be empty").default("23.ip.gl.ply.gg"),
	MC_SERVER_PORT: envInt(12696, 1, 65535),
	MC_PROTOCOL: z
		.string()
		.trim()
		.toLowerCase()
		.pipe(z.enum(["auto", "java", "bedrock"]))
		.default("auto"),
	MC_BEDROCK_ENABLED: envBoolean(true),
	MC_JAVA_TCP_FALLBACK: envBoolean(true),

	CHECK_INTERVAL: envInt(60, 1, Math.floor(MAX_TIMER_MS / 1000)),
	STABLE_THRESHOLD: envInt(2, 1, Number.MAX_SAFE_INTEGER),
	RATE_LIMIT_SECONDS: envInt(300, 0, Number.MAX_SAFE_INTEGER),
	PROBE_TIMEOUT_MS: envInt(5000, 100, MAX_TIMER_MS),
	USE_EMBED: envBoolean(true),
});

export type Config = z.infer<typeof configSchema>;

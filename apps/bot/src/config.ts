import { type Config, configSchema } from "./schemas/config";

export class ConfigError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration:\n${issues.map((issue) => `- ${issue}`).join("\n")}`);
		this.name = "ConfigError";
	}
}

/**
 * Read the bot configuration from the environment.
 * Throws ConfigError listing every invalid or missing key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	// Blank variables count as unset so their defaults apply
	const input = Object.fromEntries(
		Object.keys(configSchema.shape).map((key) => {
			const value = env[key];
			return [key, value?.trim() ? value : undefined];
		})
	);
	const result = configSchema.safeParse(input);

	if (!result.success) {
		throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
	}
	return result.data;
}

export type { Config };

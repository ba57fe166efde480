import pino, { type Level, type Logger } from "pino";

const LEVELS: ReadonlyArray<Level | "silent"> = [
	"fatal",
	"error",
	"warn",
	"info",
	"debug",
	"trace",
	"silent",
];

export function resolveLevel(value: string | undefined): Level | "silent" {
	const normalized = value?.trim().toLowerCase();
	return LEVELS.find((level) => level === normalized) ?? "info";
}

const logger: Logger = pino({
	level: resolveLevel(process.env.LOG_LEVEL),
	base: { service: "blockwatch" },
	timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };
export default logger;

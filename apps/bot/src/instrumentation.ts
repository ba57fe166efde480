/**
 * Starts tracing as a side effect. Imported first by the entry point so the SDK is
 * running before discord.js and the rest of the bot load.
 */
import { initTelemetry } from "./infra/telemetry";

initTelemetry("blockwatch-bot");

/**
 * OpenTelemetry initialization.
 * Must be imported BEFORE any other modules to ensure proper instrumentation.
 * Exporting only starts when OTEL_EXPORTER_OTLP_ENDPOINT is set; without it spans are no-ops.
 */
import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { NodeSDK } from "@opentelemetry/sdk-node";
import logger from "@blockwatch/logger";

const log = logger.child({ module: "telemetry" });

let sdk: NodeSDK | null = null;

/**
 * Initialize the OpenTelemetry SDK for a service.
 */
export function initTelemetry(serviceName: string, env: NodeJS.ProcessEnv = process.env): boolean {
	if (sdk) {
		log.warn("Telemetry already initialized");
		return true;
	}
	if (!env.OTEL_EXPORTER_OTLP_ENDPOINT) {
		log.debug("OTEL_EXPORTER_OTLP_ENDPOINT not set, tracing disabled");
		return false;
	}

	sdk = new NodeSDK({
		serviceName,
		traceExporter: new OTLPTraceExporter(),
	});

	sdk.start();
	log.info({ serviceName }, "OpenTelemetry initialized");
	return true;
}

/**
 * Flush and stop the SDK, if it was started.
 */
export async function shutdownTelemetry(): Promise<void> {
	if (!sdk) return;
	try {
		await sdk.shutdown();
		log.info("OpenTelemetry shut down");
	} catch (error) {
		log.error({ error }, "Error shutting down OpenTelemetry");
	} finally {
		sdk = null;
	}
}

/**
 * Execute a function within a new span.
 * Automatically handles errors and span lifecycle.
 */
export async function withSpan<T>(
	tracerName: string,
	spanName: string,
	fn: (span: Span) => Promise<T>,
	attributes?: Record<string, string | number | boolean>
): Promise<T> {
	const tracer = trace.getTracer(tracerName);

	return tracer.startActiveSpan(spanName, async (span) => {
		try {
			if (attributes) {
				span.setAttributes(attributes);
			}
			const result = await fn(span);
			span.setStatus({ code: SpanStatusCode.OK });
			return result;
		} catch (error) {
			span.setStatus({
				code: SpanStatusCode.ERROR,
				message: error instanceof Error ? error.message : "Unknown error",
			});
			span.recordException(error instanceof Error ? error : String(error));
			throw error;
		} finally {
			span.end();
		}
	});
}

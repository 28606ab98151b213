/**
 * @fileoverview OpenTelemetry Tracing Setup
 *
 * Auto-instrumentation for the HTTP surface with OTLP export. Resource
 * attributes come from tracing-resource.ts.
 * This file MUST be imported before any other imports in main.ts.
 *
 * @remarks
 * Local: Exports to http://localhost:4318, 100% sampling
 * Production: Configure OTEL_EXPORTER_OTLP_ENDPOINT, 10% sampling
 * Set OTEL_SDK_DISABLED=true to skip tracing entirely.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { ParentBasedSampler, TraceIdRatioBasedSampler, AlwaysOnSampler } from '@opentelemetry/sdk-trace-node';
import { tracingResourceAttributes } from './tracing-resource';

const isProduction = process.env.NODE_ENV === 'production';

const sampler = isProduction
    ? new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(0.1) })
    : new AlwaysOnSampler();

const traceExporter = new OTLPTraceExporter({
    url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
});

const sdk = new NodeSDK({
    resource: new Resource(tracingResourceAttributes(process.env)),
    traceExporter,
    sampler,
    instrumentations: [
        getNodeAutoInstrumentations({
            // The table and config are read once at boot; fs spans are noise
            '@opentelemetry/instrumentation-fs': { enabled: false },
            '@opentelemetry/instrumentation-dns': { enabled: false },
        }),
    ],
});

if (process.env.OTEL_SDK_DISABLED !== 'true') {
    sdk.start();

    // Graceful shutdown
    process.on('SIGTERM', () => {
        sdk.shutdown()
            .then(() => console.log('Tracing terminated'))
            .catch((error: Error) => console.error('Error terminating tracing', error))
            .finally(() => process.exit(0));
    });
}

export { sdk };

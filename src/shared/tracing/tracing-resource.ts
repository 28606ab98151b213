import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';

export const DEFAULT_SERVICE_NAME = 'registry-search-agent';

/**
 * Resource attributes for exported spans. `npm start` sets
 * `npm_package_version`; `OTEL_SERVICE_NAME` and `OTEL_SERVICE_VERSION` win
 * over both defaults.
 */
export function tracingResourceAttributes(env: NodeJS.ProcessEnv): Record<string, string> {
    return {
        [SemanticResourceAttributes.SERVICE_NAME]: env.OTEL_SERVICE_NAME || DEFAULT_SERVICE_NAME,
        [SemanticResourceAttributes.SERVICE_VERSION]: env.OTEL_SERVICE_VERSION || env.npm_package_version || 'unknown',
        [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: env.NODE_ENV || 'development',
    };
}

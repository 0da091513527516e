import { z } from 'zod';
import type { GuardRule } from '../config-guard.js';

/**
 * Engine Configuration Guards
 * Secrets have no defaults; everything else is policy and may fall back.
 */
export const ENGINE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'WEBHOOK_SECRET' },
    { type: 'required', name: 'SESSION_SECRET' },
    { type: 'required', name: 'GATEWAY_BASE_URL' },
    { type: 'required', name: 'GATEWAY_API_KEY' },
    {
        type: 'assert',
        check: () => (process.env.SESSION_SECRET ?? '').length >= 32,
        message: 'SESSION_SECRET must be at least 32 characters',
    },
    {
        type: 'forbidIf',
        name: 'INSECURE_GATEWAY_URL',
        when: () => process.env.NODE_ENV === 'production' && !(process.env.GATEWAY_BASE_URL ?? '').startsWith('https://'),
        message: 'Production gateway must be reached over https',
    }
];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EngineEnvSchema = z.object({
    PORT: positiveInt(8080),
    WEBHOOK_SECRET: z.string().min(1),
    SESSION_SECRET: z.string().min(32),
    GATEWAY_BASE_URL: z.string().url(),
    GATEWAY_API_KEY: z.string().min(1),
    GATEWAY_TIMEOUT_MS: positiveInt(10_000),
    PUBLIC_BASE_URL: z.string().url().default('http://localhost:8080'),
    SUCCESS_REDIRECT_PATH: z.string().startsWith('/').default('/library'),
    AWAIT_TIMEOUT_MS: positiveInt(60_000),
    STREAM_HEARTBEAT_MS: positiveInt(15_000),
    PENDING_EXPIRY_MS: positiveInt(600_000),
    EXPIRY_SWEEP_INTERVAL_MS: positiveInt(30_000),
    MAX_RETRIES: z.coerce.number().int().min(0).default(5),
    RECOVERY_WINDOW_MS: positiveInt(15 * 60 * 1000),
    RECOVERY_MAX_ATTEMPTS: positiveInt(3),
    SESSION_TTL_SECONDS: positiveInt(30 * 24 * 60 * 60),
    CHANNEL_RETENTION_MS: positiveInt(5 * 60 * 1000),
    CATALOG_PATH: z.string().min(1).default('config/catalog.json'),
    TRUST_PROXY: z.enum(['true', 'false']).default('false'),
});

export interface EngineConfig {
    port: number;
    webhookSecret: string;
    sessionSecret: string;
    gateway: {
        baseUrl: string;
        apiKey: string;
        timeoutMs: number;
        callbackUrl: string;
    };
    successRedirectUrl: string;
    awaitTimeoutMs: number;
    streamHeartbeatMs: number;
    pendingExpiryMs: number;
    expirySweepIntervalMs: number;
    maxRetries: number;
    recovery: {
        windowMs: number;
        maxAttempts: number;
    };
    sessionTtlSeconds: number;
    channelRetentionMs: number;
    catalogPath: string;
    trustProxy: boolean;
}

/**
 * Parse the environment into a typed EngineConfig.
 * Run ENGINE_CONFIG_GUARDS first; this throws on anything the guards let through malformed.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = EngineEnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid engine configuration: ${details.join('; ')}`);
    }

    const values = parsed.data;
    const publicBaseUrl = values.PUBLIC_BASE_URL.replace(/\/+$/, '');

    return {
        port: values.PORT,
        webhookSecret: values.WEBHOOK_SECRET,
        sessionSecret: values.SESSION_SECRET,
        gateway: {
            baseUrl: values.GATEWAY_BASE_URL.replace(/\/+$/, ''),
            apiKey: values.GATEWAY_API_KEY,
            timeoutMs: values.GATEWAY_TIMEOUT_MS,
            callbackUrl: `${publicBaseUrl}/api/webhooks/gateway`
        },
        successRedirectUrl: `${publicBaseUrl}${values.SUCCESS_REDIRECT_PATH}`,
        awaitTimeoutMs: values.AWAIT_TIMEOUT_MS,
        streamHeartbeatMs: values.STREAM_HEARTBEAT_MS,
        pendingExpiryMs: values.PENDING_EXPIRY_MS,
        expirySweepIntervalMs: values.EXPIRY_SWEEP_INTERVAL_MS,
        maxRetries: values.MAX_RETRIES,
        recovery: {
            windowMs: values.RECOVERY_WINDOW_MS,
            maxAttempts: values.RECOVERY_MAX_ATTEMPTS
        },
        sessionTtlSeconds: values.SESSION_TTL_SECONDS,
        channelRetentionMs: values.CHANNEL_RETENTION_MS,
        catalogPath: values.CATALOG_PATH,
        trustProxy: values.TRUST_PROXY === 'true'
    };
}

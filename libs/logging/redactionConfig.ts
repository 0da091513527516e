/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'sessionToken', '*.sessionToken',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Gateway callbacks
    'webhookSecret', '*.webhookSecret',
    'signature', '*.signature',
    'headers["x-gateway-signature"]',
    'headers["x-gateway-secret"]',

    // Configuration snapshots
    'sessionSecret', '*.sessionSecret',
    'gatewayApiKey', '*.gatewayApiKey'
];

export const REDACT_CENSOR = '[REDACTED]';

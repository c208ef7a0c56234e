/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs: destination credentials and
 * database secrets, at the root and one level down.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'Authorization', '*.Authorization',
    'token', '*.token',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'password', '*.password',
    'secret', '*.secret',

    // Destination credentials (Root and Nested)
    'cdcsToken', '*.cdcsToken',
    'elabftwApiKey', '*.elabftwApiKey',
    'labarchivesApiKey', '*.labarchivesApiKey',

    // Outgoing HTTP headers
    'headers.Authorization', '*.headers.Authorization'
];

export const REDACT_CENSOR = '[REDACTED]';

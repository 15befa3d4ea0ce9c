/**
 * Centralized Redaction Configuration
 * Keys that must never reach log sinks in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'id_token', '*.id_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Session references carried in auth contexts
    'sessionRef', '*.sessionRef',
    'session_ref', '*.session_ref',
    'authContext.sessionRef',
    'auth_context.session_ref',

    // AI interaction content (hashes are fine, raw text is not)
    'promptText', '*.promptText',
    'responseText', '*.responseText',
    'prompt_text', '*.prompt_text',
    'response_text', '*.response_text',

    // Database connection
    'connectionString', '*.connectionString'
];

export const REDACT_CENSOR = '[REDACTED]';

import type { GuardRule } from '../config-guard.js';

const isProtectedEnv = (env: NodeJS.ProcessEnv): boolean =>
    ['production', 'staging'].includes(env.NODE_ENV ?? '');

/**
 * Outcome Log database guards.
 * Connection parameters must be explicit; TLS is mandatory outside development.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: (env) => !Number.isNaN(Number.parseInt(env.DB_PORT ?? '', 10)),
        message: 'DB_PORT must be an integer',
    },

    {
        type: 'assert',
        check: (env) => !isProtectedEnv(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },

    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: (env) => isProtectedEnv(env) && env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging',
    }
];

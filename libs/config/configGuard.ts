import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/coreErrors.js';

export type EnvRecord = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: EnvRecord) => boolean; message: string }
    | { type: 'assert'; check: (env: EnvRecord) => boolean; message: string };

export const PROTECTED_ENVIRONMENTS: ReadonlySet<string> = new Set(['production', 'staging']);

export function isProtectedEnvironment(env: EnvRecord): boolean {
    return PROTECTED_ENVIRONMENTS.has(env.TRUSTMESH_ENV ?? env.NODE_ENV ?? 'development');
}

/**
 * Rules every service enforces before building its CoreConfig.
 */
export const CORE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'SERVICE_NAME' },
    {
        type: 'assert',
        check: env => !isProtectedEnvironment(env) || !!env.REGISTRY_URL,
        message: 'REGISTRY_URL must be explicitly set in production/staging'
    },
    {
        type: 'forbidIf',
        name: 'AUDIT_INCLUDE_PROMPTS',
        when: env => isProtectedEnvironment(env) && env.AUDIT_INCLUDE_PROMPTS?.trim().toLowerCase() === 'true',
        message: 'Raw prompt text must not be written to audit details in production/staging'
    }
];

/**
 * Database rules, enforced only when a Postgres-backed store is configured.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'DB_NAME' },
    {
        type: 'assert',
        check: env => !isProtectedEnvironment(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging'
    }
];

/**
 * Fail-closed configuration guard. Collects every violation, logs them once
 * and throws; there are no silent defaults for guarded values.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: EnvRecord): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(rule.message);
                        }
                        break;
                    }
                }
            } catch (err) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            throw new ConfigurationError(errors);
        }

        logger.debug("Configuration guard passed.");
    }
}

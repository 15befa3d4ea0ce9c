import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';
import { deepFreeze } from '../canonical/json.js';
import { ConfigGuard, CORE_CONFIG_GUARDS, DB_CONFIG_GUARDS, type EnvRecord } from './configGuard.js';

const GENESIS_HASH = '0'.repeat(64);

export const StreamPartitioningSchema = z.enum(['service', 'tenant', 'global']);
export type StreamPartitioning = z.infer<typeof StreamPartitioningSchema>;

const ServiceConfigSchema = z.object({
    name: z.string().min(1),
    environment: z.string().min(1).default('development'),
    nodeId: z.string().min(1).default('local'),
    version: z.string().min(1).default('0.0.0')
}).strict();

const RbacConfigSchema = z.object({
    /** Age after which cached roles/permissions are refreshed. */
    stalenessWindowMs: z.number().int().positive().default(60_000),
    /** Upper bound on a cold identity-source call when the caller sets none. */
    resolutionTimeoutMs: z.number().int().positive().default(2_000),
    maxCachedActors: z.number().int().positive().default(10_000),
    maxCachedRoles: z.number().int().positive().default(1_000)
}).strict();

const AuditConfigSchema = z.object({
    genesisHash: z.string().regex(/^[0-9a-f]+$/).default(GENESIS_HASH),
    hashAlgorithm: z.enum(['sha256', 'sha384', 'sha512']).default('sha256'),
    appendRetryLimit: z.number().int().min(1).max(32).default(5),
    readPageSize: z.number().int().positive().default(100),
    streamPartitioning: StreamPartitioningSchema.default('service'),
    includePromptText: z.boolean().default(false),
    includeResponseText: z.boolean().default(false)
}).strict();

const RegistryConfigSchema = z.object({
    url: z.string().url().optional(),
    requestTimeoutMs: z.number().int().positive().default(5_000),
    heartbeatIntervalMs: z.number().int().positive().default(30_000),
    maxAttempts: z.number().int().min(1).default(5),
    baseDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(30_000)
}).strict();

const DatabaseConfigSchema = z.object({
    host: z.string().min(1),
    port: z.number().int().positive(),
    user: z.string().min(1),
    password: z.string().min(1),
    database: z.string().min(1),
    caCert: z.string().optional(),
    poolMax: z.number().int().positive().default(10),
    auditSchema: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('audit'),
    iamSchema: z.string().regex(/^[a-z_][a-z0-9_]*$/).default('iam')
}).strict();

export const CoreConfigSchema = z.object({
    service: ServiceConfigSchema,
    rbac: RbacConfigSchema.default({}),
    audit: AuditConfigSchema.default({}),
    registry: RegistryConfigSchema.default({}),
    database: DatabaseConfigSchema.optional()
}).strict();

export type CoreConfigInput = z.input<typeof CoreConfigSchema>;
export type CoreConfig = z.infer<typeof CoreConfigSchema>;
export type RbacConfig = CoreConfig['rbac'];
export type AuditConfig = CoreConfig['audit'];
export type RegistryConfig = CoreConfig['registry'];
export type DatabaseConfig = NonNullable<CoreConfig['database']>;

/**
 * Builds the explicit, frozen configuration value handed to components.
 */
export function createCoreConfig(input: CoreConfigInput): CoreConfig {
    return deepFreeze(validate(CoreConfigSchema, input, 'CoreConfig'));
}

function intFrom(env: EnvRecord, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    // Non-numeric values surface as schema errors (NaN) instead of defaulting.
    return Number(raw);
}

function boolFrom(env: EnvRecord, name: string): boolean | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    return raw.trim().toLowerCase() === 'true';
}

function stringFrom(env: EnvRecord, name: string): string | undefined {
    const raw = env[name];
    return raw === undefined || raw.trim() === '' ? undefined : raw;
}

/**
 * Reads configuration from an environment record at the service boundary.
 * Components never read the environment themselves.
 */
export function loadCoreConfig(env: EnvRecord): CoreConfig {
    const wantsDatabase = stringFrom(env, 'DB_HOST') !== undefined;
    ConfigGuard.enforce(wantsDatabase ? [...CORE_CONFIG_GUARDS, ...DB_CONFIG_GUARDS] : CORE_CONFIG_GUARDS, env);

    const partitioning = stringFrom(env, 'AUDIT_STREAM_PARTITIONING');
    const hashAlgorithm = stringFrom(env, 'AUDIT_HASH_ALGO');

    const input = {
        service: {
            name: stringFrom(env, 'SERVICE_NAME'),
            environment: stringFrom(env, 'TRUSTMESH_ENV') ?? stringFrom(env, 'NODE_ENV'),
            nodeId: stringFrom(env, 'NODE_ID'),
            version: stringFrom(env, 'SERVICE_VERSION')
        },
        rbac: {
            stalenessWindowMs: intFrom(env, 'RBAC_STALENESS_WINDOW_MS'),
            resolutionTimeoutMs: intFrom(env, 'RBAC_RESOLUTION_TIMEOUT_MS'),
            maxCachedActors: intFrom(env, 'RBAC_MAX_CACHED_ACTORS'),
            maxCachedRoles: intFrom(env, 'RBAC_MAX_CACHED_ROLES')
        },
        audit: {
            genesisHash: stringFrom(env, 'AUDIT_GENESIS_HASH'),
            hashAlgorithm,
            appendRetryLimit: intFrom(env, 'AUDIT_APPEND_RETRY_LIMIT'),
            readPageSize: intFrom(env, 'AUDIT_READ_PAGE_SIZE'),
            streamPartitioning: partitioning,
            includePromptText: boolFrom(env, 'AUDIT_INCLUDE_PROMPTS'),
            includeResponseText: boolFrom(env, 'AUDIT_INCLUDE_RESPONSES')
        },
        registry: {
            url: stringFrom(env, 'REGISTRY_URL'),
            requestTimeoutMs: intFrom(env, 'REGISTRY_TIMEOUT_MS'),
            heartbeatIntervalMs: intFrom(env, 'REGISTRY_HEARTBEAT_MS'),
            maxAttempts: intFrom(env, 'REGISTRY_MAX_ATTEMPTS'),
            baseDelayMs: intFrom(env, 'REGISTRY_BASE_DELAY_MS'),
            maxDelayMs: intFrom(env, 'REGISTRY_MAX_DELAY_MS')
        },
        database: wantsDatabase ? {
            host: stringFrom(env, 'DB_HOST'),
            port: intFrom(env, 'DB_PORT'),
            user: stringFrom(env, 'DB_USER'),
            password: stringFrom(env, 'DB_PASSWORD'),
            database: stringFrom(env, 'DB_NAME'),
            caCert: stringFrom(env, 'DB_CA_CERT'),
            poolMax: intFrom(env, 'DB_POOL_MAX')
        } : undefined
    };

    return deepFreeze(validate(CoreConfigSchema, input, 'CoreConfig:env'));
}


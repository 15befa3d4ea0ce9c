/**
 * Unit Tests: CoreConfig
 *
 * @see libs/config/coreConfig.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createCoreConfig, loadCoreConfig } from '../../libs/config/coreConfig.js';
import { ConfigurationError, SchemaError } from '../../libs/errors/coreErrors.js';

describe('CoreConfig', () => {
    describe('createCoreConfig', () => {
        it('should fill defaults for omitted sections', () => {
            const config = createCoreConfig({ service: { name: 'docs-api' } });

            assert.deepStrictEqual(config, {
                service: { name: 'docs-api', environment: 'development', nodeId: 'local', version: '0.0.0' },
                rbac: { stalenessWindowMs: 60_000, resolutionTimeoutMs: 2_000, maxCachedActors: 10_000, maxCachedRoles: 1_000 },
                audit: {
                    genesisHash: '0'.repeat(64),
                    hashAlgorithm: 'sha256',
                    appendRetryLimit: 5,
                    readPageSize: 100,
                    streamPartitioning: 'service',
                    includePromptText: false,
                    includeResponseText: false
                },
                registry: { requestTimeoutMs: 5_000, heartbeatIntervalMs: 30_000, maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30_000 }
            });
        });

        it('should freeze the result', () => {
            const config = createCoreConfig({ service: { name: 'docs-api' }, audit: { appendRetryLimit: 3 } });

            assert.ok(Object.isFrozen(config));
            assert.ok(Object.isFrozen(config.audit));
            assert.strictEqual(Reflect.set(config.audit, 'appendRetryLimit', 9), false);
            assert.strictEqual(config.audit.appendRetryLimit, 3);
        });

        it('should reject out-of-range and unknown settings', () => {
            assert.throws(
                () => createCoreConfig({ service: { name: 'docs-api' }, audit: { appendRetryLimit: 0 } }),
                (err: unknown) => err instanceof SchemaError && err.context === 'CoreConfig' && err.issues[0]?.path === 'audit.appendRetryLimit'
            );
            assert.throws(
                () => createCoreConfig({ service: { name: 'docs-api' }, rbac: { stalenessWindowMs: -1 } }),
                SchemaError
            );
        });
    });

    describe('loadCoreConfig', () => {
        it('should read the environment', () => {
            const config = loadCoreConfig({
                SERVICE_NAME: 'docs-api',
                NODE_ENV: 'test',
                NODE_ID: 'node-7',
                RBAC_STALENESS_WINDOW_MS: '5000',
                AUDIT_STREAM_PARTITIONING: 'tenant',
                AUDIT_HASH_ALGO: 'sha512',
                AUDIT_INCLUDE_PROMPTS: 'TRUE',
                REGISTRY_URL: 'http://registry.local:7000',
                REGISTRY_MAX_ATTEMPTS: '3'
            });

            assert.strictEqual(config.service.environment, 'test');
            assert.strictEqual(config.service.nodeId, 'node-7');
            assert.strictEqual(config.rbac.stalenessWindowMs, 5_000);
            assert.strictEqual(config.audit.streamPartitioning, 'tenant');
            assert.strictEqual(config.audit.hashAlgorithm, 'sha512');
            assert.strictEqual(config.audit.includePromptText, true);
            assert.strictEqual(config.registry.url, 'http://registry.local:7000');
            assert.strictEqual(config.registry.maxAttempts, 3);
            assert.strictEqual(config.database, undefined);
        });

        it('should treat blank values as unset', () => {
            const config = loadCoreConfig({ SERVICE_NAME: 'docs-api', AUDIT_READ_PAGE_SIZE: ' ' });
            assert.strictEqual(config.audit.readPageSize, 100);
        });

        it('should reject non-numeric values instead of defaulting', () => {
            assert.throws(
                () => loadCoreConfig({ SERVICE_NAME: 'docs-api', RBAC_STALENESS_WINDOW_MS: 'soon' }),
                (err: unknown) => err instanceof SchemaError
                    && err.context === 'CoreConfig:env'
                    && err.issues[0]?.path === 'rbac.stalenessWindowMs'
            );
        });

        it('should run the guards first', () => {
            assert.throws(() => loadCoreConfig({}), ConfigurationError);
            assert.throws(() => loadCoreConfig({ SERVICE_NAME: 'docs-api', TRUSTMESH_ENV: 'production' }), ConfigurationError);
        });

        it('should build database settings when DB_HOST is set', () => {
            const config = loadCoreConfig({
                SERVICE_NAME: 'docs-api',
                DB_HOST: 'db.internal',
                DB_PORT: '5432',
                DB_USER: 'svc',
                DB_PASSWORD: 'test-secret',
                DB_NAME: 'trust'
            });

            assert.deepStrictEqual(config.database, {
                host: 'db.internal',
                port: 5432,
                user: 'svc',
                password: 'test-secret',
                database: 'trust',
                caCert: undefined,
                poolMax: 10,
                auditSchema: 'audit',
                iamSchema: 'iam'
            });
        });

        it('should enforce database guards when DB_HOST is set', () => {
            assert.throws(
                () => loadCoreConfig({ SERVICE_NAME: 'docs-api', DB_HOST: 'db.internal' }),
                (err: unknown) => err instanceof ConfigurationError && err.errors.length === 4
            );
        });
    });
});

import type { CoreConfig, DatabaseConfig } from '../config/coreConfig.js';
import type { RowStore } from '../db/index.js';
import type { IdentitySource } from '../rbac/identitySource.js';
import type { AuditStore } from '../audit/store.js';
import type { RegistryTransport } from '../registry/transport.js';
import type { AccessResolver, Service } from './types.js';
import { RbacDecisionEngine } from '../rbac/engine.js';
import { RbacEnforcer } from '../rbac/enforcer.js';
import { PgIdentitySource } from '../rbac/pgIdentitySource.js';
import { PgAuditStore } from '../audit/pgStore.js';
import { AuditChain } from '../audit/chain.js';
import { AuditEventEmitter } from '../audit/emitter.js';
import { RegistrationClient } from '../registry/client.js';
import { HttpRegistryTransport } from '../registry/transport.js';
import { MessageProcessor } from './processor.js';
import { logger } from '../logging/logger.js';

export interface RuntimeDependencies {
    readonly identitySource: IdentitySource;
    readonly auditStore: AuditStore;
    /** Overrides the HTTP transport built from config.registry.url. */
    readonly registryTransport?: RegistryTransport;
}

export interface TrustRuntime {
    readonly config: CoreConfig;
    readonly engine: RbacDecisionEngine;
    readonly chain: AuditChain;
    readonly emitter: AuditEventEmitter;
    readonly enforcer: RbacEnforcer;
    /** Absent when no registry is configured. */
    readonly registry: RegistrationClient | null;
    /** accessRule overrides the default message-to-permission mapping. */
    createProcessor(service: Service, accessRule?: AccessResolver): MessageProcessor;
}

export interface PgAdapters {
    readonly identitySource: PgIdentitySource;
    readonly auditStore: PgAuditStore;
}

/**
 * Postgres identity source and audit store in the schemas named by
 * database.iamSchema and database.auditSchema.
 */
export function createPgAdapters(db: RowStore, database: DatabaseConfig): PgAdapters {
    return {
        identitySource: new PgIdentitySource(db, database.iamSchema),
        auditStore: new PgAuditStore(db, database.auditSchema)
    };
}

/**
 * Wires the components from one explicit configuration value.
 */
export function createTrustRuntime(config: CoreConfig, deps: RuntimeDependencies): TrustRuntime {
    logger.info({ serviceName: config.service.name, environment: config.service.environment }, 'Bootstrapping trust runtime');

    const engine = new RbacDecisionEngine(deps.identitySource, config.rbac);
    const chain = new AuditChain(deps.auditStore, config.audit);
    const emitter = new AuditEventEmitter(chain, { serviceName: config.service.name, audit: config.audit });
    const enforcer = new RbacEnforcer(engine, emitter);

    const transport = deps.registryTransport
        ?? (config.registry.url
            ? new HttpRegistryTransport(config.registry.url, { requestTimeoutMs: config.registry.requestTimeoutMs })
            : null);
    const registry = transport ? new RegistrationClient(transport, config.registry) : null;

    return {
        config,
        engine,
        chain,
        emitter,
        enforcer,
        registry,
        createProcessor: (service, accessRule) => new MessageProcessor({
            serviceName: config.service.name,
            service,
            enforcer,
            emitter,
            ...(accessRule !== undefined ? { accessRule } : {})
        })
    };
}

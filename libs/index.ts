// Envelope model
export * from './envelope/types.js';
export { createEnvelope, createReply, createChild, validateEnvelope, payloadHash } from './envelope/envelope.js';
export type { CreateEnvelopeInput, CreateReplyInput, CreateChildInput } from './envelope/envelope.js';
export { serializeEnvelope, deserializeEnvelope, toWire, fromWire } from './envelope/codec.js';
export { EnvelopeSchema, EnvelopeWireSchema, MessageTypeSchema, MESSAGE_PAYLOAD_SCHEMAS } from './envelope/schema.js';
export type { EnvelopeWire } from './envelope/schema.js';

// RBAC
export * from './rbac/decision.js';
export { compilePattern, matchesResource, compareSpecificity } from './rbac/pattern.js';
export type { CompiledPattern, Specificity } from './rbac/pattern.js';
export { StaticIdentitySource } from './rbac/identitySource.js';
export type { IdentitySource, StaticIdentityData } from './rbac/identitySource.js';
export { RoleMappingCache } from './rbac/roleMappingCache.js';
export type { RoleMappingCacheOptions } from './rbac/roleMappingCache.js';
export { RbacDecisionEngine } from './rbac/engine.js';
export type { AuthorizeOptions, RbacEngineOptions } from './rbac/engine.js';
export { RbacEnforcer } from './rbac/enforcer.js';
export { PgIdentitySource } from './rbac/pgIdentitySource.js';

// Audit
export * from './audit/schema.js';
export { computeEventHash, sealEvent } from './audit/hashing.js';
export { InMemoryAuditStore, isMalformedRecord } from './audit/store.js';
export type { AuditStore, ChainTip, MalformedAuditRecord, StoredAuditEntry } from './audit/store.js';
export { PgAuditStore } from './audit/pgStore.js';
export { AuditChain } from './audit/chain.js';
export type { AuditChainOptions, SequenceRange } from './audit/chain.js';
export * from './audit/integrity.js';
export * from './audit/jsonl.js';
export { AuditEventEmitter } from './audit/emitter.js';
export type { AiInteraction, AuditEmitterOptions, EventDescriptor, SystemEventOptions, SystemEventType } from './audit/emitter.js';

// Registry
export * from './registry/types.js';
export { HttpRegistryTransport } from './registry/transport.js';
export type { RegistryTransport, FetchLike, HttpRegistryTransportOptions } from './registry/transport.js';
export { RegistrationClient, RegistrationHandle } from './registry/client.js';
export type { RegistryResult, HeartbeatDetailsProvider, RegistrationClientOptions } from './registry/client.js';

// Service pipeline
export * from './service/types.js';
export { defaultAccessRule } from './service/accessRules.js';
export { MessageProcessor } from './service/processor.js';
export type { ProcessOutcome, MessageProcessorDeps } from './service/processor.js';
export { createTrustRuntime, createPgAdapters } from './service/runtime.js';
export type { RuntimeDependencies, TrustRuntime, PgAdapters } from './service/runtime.js';

// Ambient
export * from './errors/coreErrors.js';
export { ErrorSanitizer, InternalSystemError } from './errors/sanitizer.js';
export { createCoreConfig, loadCoreConfig, CoreConfigSchema } from './config/coreConfig.js';
export type { CoreConfig, CoreConfigInput, RbacConfig, AuditConfig, RegistryConfig, DatabaseConfig, StreamPartitioning } from './config/coreConfig.js';
export { ConfigGuard, CORE_CONFIG_GUARDS, DB_CONFIG_GUARDS, isProtectedEnvironment } from './config/configGuard.js';
export type { GuardRule, EnvRecord } from './config/configGuard.js';
export { createDatabase } from './db/index.js';
export type { Database, Queryable, TxClient, RowQuery, RowStore } from './db/index.js';
export { logger, getEnvelopeLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export { canonicalize, digestHex, sha256Hex, deepFreeze } from './canonical/json.js';
export type { JsonValue, JsonObject, JsonPrimitive, HashAlgorithm } from './canonical/json.js';

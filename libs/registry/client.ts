/**
 * Registration/Discovery Client
 * Registry failures only degrade discoverability: they are retried with
 * backoff or reported as results, and never stop local processing.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { RegistryConfig } from '../config/coreConfig.js';
import type { RegistryTransport } from './transport.js';
import {
    RegistrationPayloadSchema,
    type DiscoveredInstance,
    type HeartbeatPayload,
    type ServiceHealth,
    type ServiceIdentity
} from './types.js';
import { RegistryUnreachable, type RegistryOperation } from '../errors/coreErrors.js';
import { validate } from '../validation/zod-middleware.js';
import { logger } from '../logging/logger.js';

const log = logger.child({ component: 'RegistrationClient' });

export type RegistryResult = { ok: true } | { ok: false; error: RegistryUnreachable };

export type HeartbeatDetailsProvider = () => HeartbeatPayload['details'];

export class RegistrationHandle {
    private currentHealth: ServiceHealth = 'reachable';
    private consecutiveFailures = 0;
    private lastSuccessAt: string;
    private active = true;

    constructor(
        readonly identity: ServiceIdentity,
        readonly instanceId: string,
        readonly capabilities: readonly string[],
        registeredAt: string
    ) {
        this.lastSuccessAt = registeredAt;
    }

    get health(): ServiceHealth {
        return this.currentHealth;
    }

    get isRegistered(): boolean {
        return this.active;
    }

    get lastHeartbeatAt(): string {
        return this.lastSuccessAt;
    }

    get failureCount(): number {
        return this.consecutiveFailures;
    }

    /** @internal */
    recordSuccess(at: string): void {
        this.consecutiveFailures = 0;
        this.currentHealth = 'reachable';
        this.lastSuccessAt = at;
    }

    /** @internal */
    recordFailure(unreachableAfter: number): void {
        this.consecutiveFailures++;
        this.currentHealth = this.consecutiveFailures >= unreachableAfter ? 'unreachable' : 'degraded';
    }

    /** @internal */
    markDeregistered(): void {
        this.active = false;
    }
}

export interface RegistrationClientOptions {
    readonly sleep?: (ms: number) => Promise<void>;
    readonly clock?: () => Date;
}

function asUnreachable(operation: RegistryOperation, err: unknown): RegistryUnreachable {
    if (err instanceof RegistryUnreachable) return err;
    return new RegistryUnreachable(operation, err instanceof Error ? err.message : String(err), { cause: err });
}

export class RegistrationClient {
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly clock: () => Date;

    constructor(
        private readonly transport: RegistryTransport,
        private readonly config: RegistryConfig,
        options: RegistrationClientOptions = {}
    ) {
        this.sleep = options.sleep ?? (ms => delay(ms));
        this.clock = options.clock ?? (() => new Date());
    }

    /**
     * Single registration attempt.
     * @throws RegistryUnreachable
     */
    async register(identity: ServiceIdentity, capabilities: readonly string[]): Promise<RegistrationHandle> {
        const payload = validate(RegistrationPayloadSchema, {
            service_name: identity.serviceName,
            address: identity.address,
            node_id: identity.nodeId,
            capabilities: [...capabilities],
            health: 'reachable',
            ...(identity.version !== undefined ? { service_version: identity.version } : {}),
            ...(identity.environment !== undefined ? { environment: identity.environment } : {})
        }, 'Registry:register');

        try {
            const { instanceId } = await this.transport.register(payload);
            log.info({ serviceName: identity.serviceName, instanceId }, 'Registered with service registry');
            return new RegistrationHandle(identity, instanceId, Object.freeze([...capabilities]), this.clock().toISOString());
        } catch (err) {
            throw asUnreachable('register', err);
        }
    }

    /**
     * Retries registration with capped exponential backoff.
     * @throws RegistryUnreachable after maxAttempts failures
     */
    async registerWithBackoff(identity: ServiceIdentity, capabilities: readonly string[]): Promise<RegistrationHandle> {
        let lastError: RegistryUnreachable | undefined;

        for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
            try {
                return await this.register(identity, capabilities);
            } catch (err) {
                lastError = asUnreachable('register', err);
                if (attempt === this.config.maxAttempts) break;

                const backoffMs = this.backoffFor(attempt);
                log.warn({ serviceName: identity.serviceName, attempt, backoffMs, error: lastError.message },
                    'Registry unreachable; retrying registration');
                await this.sleep(backoffMs);
            }
        }

        throw lastError ?? new RegistryUnreachable('register', 'No registration attempts were made');
    }

    /**
     * Never throws. A failure marks the handle degraded, and unreachable after
     * maxAttempts consecutive failures.
     */
    async heartbeat(handle: RegistrationHandle, details: HeartbeatPayload['details'] = {}): Promise<RegistryResult> {
        try {
            await this.transport.heartbeat(handle.instanceId, { health: handle.health, details });
            handle.recordSuccess(this.clock().toISOString());
            return { ok: true };
        } catch (err) {
            const error = asUnreachable('heartbeat', err);
            handle.recordFailure(this.config.maxAttempts);
            log.warn({
                instanceId: handle.instanceId,
                health: handle.health,
                failures: handle.failureCount,
                error: error.message
            }, 'Registry heartbeat failed');
            return { ok: false, error };
        }
    }

    /**
     * Periodic heartbeat on an unref'd timer. Returns the stop function.
     */
    startHeartbeat(handle: RegistrationHandle, detailsProvider?: HeartbeatDetailsProvider): () => void {
        let running = false;

        const timer = setInterval(() => {
            if (running || !handle.isRegistered) return;
            running = true;
            void this.heartbeat(handle, detailsProvider?.() ?? {}).finally(() => {
                running = false;
            });
        }, this.config.heartbeatIntervalMs);
        timer.unref();

        return () => clearInterval(timer);
    }

    async deregister(handle: RegistrationHandle): Promise<RegistryResult> {
        try {
            await this.transport.deregister(handle.instanceId);
            handle.markDeregistered();
            log.info({ instanceId: handle.instanceId }, 'Deregistered from service registry');
            return { ok: true };
        } catch (err) {
            const error = asUnreachable('deregister', err);
            log.warn({ instanceId: handle.instanceId, error: error.message }, 'Registry deregistration failed');
            return { ok: false, error };
        }
    }

    /**
     * @throws RegistryUnreachable
     */
    async discover(serviceName: string): Promise<readonly DiscoveredInstance[]> {
        try {
            return await this.transport.discover(serviceName);
        } catch (err) {
            throw asUnreachable('discover', err);
        }
    }

    private backoffFor(attempt: number): number {
        return Math.min(this.config.maxDelayMs, this.config.baseDelayMs * 2 ** (attempt - 1));
    }
}

import type { ZodType, ZodTypeDef } from 'zod';
import {
    DiscoveryResponseSchema,
    RegistrationResponseSchema,
    type DiscoveredInstance,
    type HeartbeatPayload,
    type RegistrationPayload
} from './types.js';
import { RegistryUnreachable, type RegistryOperation } from '../errors/coreErrors.js';

/**
 * Wire access to the service registry. Every failure, including a response
 * the client cannot understand, surfaces as RegistryUnreachable.
 */
export interface RegistryTransport {
    register(payload: RegistrationPayload): Promise<{ instanceId: string }>;
    heartbeat(instanceId: string, payload: HeartbeatPayload): Promise<void>;
    deregister(instanceId: string): Promise<void>;
    discover(serviceName: string): Promise<readonly DiscoveredInstance[]>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpRegistryTransportOptions {
    readonly requestTimeoutMs: number;
    readonly fetch?: FetchLike;
}

export class HttpRegistryTransport implements RegistryTransport {
    private readonly baseUrl: string;
    private readonly fetchImpl: FetchLike;

    constructor(baseUrl: string, private readonly options: HttpRegistryTransportOptions) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    }

    async register(payload: RegistrationPayload): Promise<{ instanceId: string }> {
        const response = await this.send('register', 'POST', '/api/v1/services/register', payload);
        const body = await this.readJson('register', response, RegistrationResponseSchema);
        return { instanceId: body.instance_id };
    }

    async heartbeat(instanceId: string, payload: HeartbeatPayload): Promise<void> {
        await this.send('heartbeat', 'POST', `/api/v1/services/${encodeURIComponent(instanceId)}/heartbeat`, payload);
    }

    async deregister(instanceId: string): Promise<void> {
        await this.send('deregister', 'DELETE', `/api/v1/services/${encodeURIComponent(instanceId)}`);
    }

    async discover(serviceName: string): Promise<readonly DiscoveredInstance[]> {
        const response = await this.send('discover', 'GET', `/api/v1/services/discover/${encodeURIComponent(serviceName)}`);
        const body = await this.readJson('discover', response, DiscoveryResponseSchema);

        return body.instances.map(instance => ({
            instanceId: instance.instance_id,
            serviceName: instance.service_name,
            address: instance.address,
            nodeId: instance.node_id,
            capabilities: instance.capabilities,
            health: instance.health
        }));
    }

    private async send(operation: RegistryOperation, method: string, path: string, body?: unknown): Promise<Response> {
        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}${path}`, {
                method,
                headers: body === undefined ? {} : { 'content-type': 'application/json' },
                ...(body === undefined ? {} : { body: JSON.stringify(body) }),
                signal: AbortSignal.timeout(this.options.requestTimeoutMs)
            });
        } catch (err) {
            throw new RegistryUnreachable(operation, err instanceof Error ? err.message : String(err), { cause: err });
        }

        if (!response.ok) {
            throw new RegistryUnreachable(operation, `HTTP ${response.status}`);
        }
        return response;
    }

    private async readJson<T>(operation: RegistryOperation, response: Response, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
        let json: unknown;
        try {
            json = await response.json();
        } catch (err) {
            throw new RegistryUnreachable(operation, 'Response body is not JSON', { cause: err });
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
            throw new RegistryUnreachable(operation, `Unexpected response: ${parsed.error.issues.map(i => i.message).join('; ')}`);
        }
        return parsed.data;
    }
}

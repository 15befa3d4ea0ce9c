import { z } from 'zod';

export const ServiceHealthSchema = z.enum(['reachable', 'degraded', 'unreachable']);
export type ServiceHealth = z.infer<typeof ServiceHealthSchema>;

export interface ServiceIdentity {
    readonly serviceName: string;
    readonly address: string;
    readonly nodeId: string;
    readonly version?: string;
    readonly environment?: string;
}

// --- Wire shapes ---

export const RegistrationPayloadSchema = z.object({
    service_name: z.string().min(1),
    address: z.string().min(1),
    node_id: z.string().min(1),
    capabilities: z.array(z.string().min(1)),
    health: ServiceHealthSchema,
    service_version: z.string().optional(),
    environment: z.string().optional()
}).strict();

export type RegistrationPayload = z.infer<typeof RegistrationPayloadSchema>;

export const RegistrationResponseSchema = z.object({
    instance_id: z.string().min(1)
});

export interface HeartbeatPayload {
    readonly health: ServiceHealth;
    readonly details: Readonly<Record<string, string | number | boolean>>;
}

export const DiscoveredInstanceSchema = z.object({
    instance_id: z.string().min(1),
    service_name: z.string().min(1),
    address: z.string().min(1),
    node_id: z.string().min(1),
    capabilities: z.array(z.string()).default([]),
    health: ServiceHealthSchema
});

export const DiscoveryResponseSchema = z.object({
    instances: z.array(DiscoveredInstanceSchema)
});

export interface DiscoveredInstance {
    readonly instanceId: string;
    readonly serviceName: string;
    readonly address: string;
    readonly nodeId: string;
    readonly capabilities: readonly string[];
    readonly health: ServiceHealth;
}

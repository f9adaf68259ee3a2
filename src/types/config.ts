/**
 * Configuration type definitions for the MCP path router
 */

import { z } from 'zod';

/**
 * Backend MCP server launched over stdio when a route selects it
 */
export const ServerSpecSchema = z.object({
    name:        z.string().min(1, 'Server name cannot be empty'),
    command:     z.string().min(1, 'Command cannot be empty'),
    args:        z.array(z.string()).default([]),
    env:         z.record(z.string(), z.string()).optional(),
    description: z.string().optional(),
    cwd:         z.string().optional(),
});

export const RouteRuleSchema = z.object({
    /** Shell glob matched against the normalized working directory */
    pattern: z.string().min(1, 'Pattern cannot be empty'),
    server:  ServerSpecSchema,
});

export const ShutdownSettingsSchema = z.object({
    /** How long a child may take to exit after its input is closed */
    gracePeriodMs: z.number().int().nonnegative().default(2000),
    /** How long a child may take to exit after SIGTERM before SIGKILL */
    killTimeoutMs: z.number().int().nonnegative().default(2000),
});

export const RouterConfigSchema = z.object({
    routes:        z.array(RouteRuleSchema).default([]),
    defaultServer: ServerSpecSchema,
    shutdown:      ShutdownSettingsSchema.default({}),
});

export type ServerSpec = z.infer<typeof ServerSpecSchema>;
export type RouteRuleConfig = z.infer<typeof RouteRuleSchema>;
export type ShutdownSettings = z.infer<typeof ShutdownSettingsSchema>;
export type RouterConfig = z.infer<typeof RouterConfigSchema>;

/** Shape accepted before defaults are applied (what a user writes on disk) */
export type RouterConfigInput = z.input<typeof RouterConfigSchema>;

/**
 * Server spec as held by an immutable RouteTable
 */
export type RouteTarget = Readonly<Omit<ServerSpec, 'args' | 'env'>> & {
    readonly args: readonly string[]
    readonly env?: Readonly<Record<string, string>>
};

/**
 * Ordered (pattern, target) pair. Order in the table is significant.
 */
export interface RouteRule {
    readonly pattern: string
    readonly target:  RouteTarget
}

/**
 * Immutable routing table handed to the core
 */
export interface RouteTable {
    readonly rules:   readonly RouteRule[]
    readonly default: RouteTarget
}

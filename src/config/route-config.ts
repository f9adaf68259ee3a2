/**
 * Route configuration: loading, saving, editing and conversion to a RouteTable
 */

import _ from 'lodash';
import { loadJsonConfig, saveJsonConfig } from '../utils/config-loader.js';
import { logger } from '../utils/logger.js';
import {
    RouterConfigSchema,
    type RouterConfig,
    type RouterConfigInput,
    type RouteRuleConfig,
    type RouteTable,
    type RouteTarget,
    type ServerSpec
} from '../types/config.js';

/**
 * Substitute environment variables in a string
 * Supports ${VAR_NAME} syntax; unknown variables are left as written
 */
export function substituteString(str: string, env: NodeJS.ProcessEnv): string {
    return _.replace(str, /\$\{([^}]+)\}/g, (_match, varName: string) => {
        const value = env[varName];
        if(value === undefined) {
            logger.warn({ varName }, 'Environment variable not found, leaving unreplaced');
            return `\${${varName}}`;
        }
        return value;
    });
}

function substituteServer(server: ServerSpec, env: NodeJS.ProcessEnv): ServerSpec {
    return {
        ...server,
        command: substituteString(server.command, env),
        args:    _.map(server.args, arg => substituteString(arg, env)),
        ...(server.env ? { env: _.mapValues(server.env, value => substituteString(value, env)) } : {}),
        ...(server.cwd !== undefined ? { cwd: substituteString(server.cwd, env) } : {}),
    };
}

/**
 * Substitute environment variables in every server's command, args, env values and cwd
 */
export function substituteEnvVars(config: RouterConfig, env: NodeJS.ProcessEnv = process.env): RouterConfig {
    return {
        ...config,
        routes:        _.map(config.routes, route => ({ ...route, server: substituteServer(route.server, env) })),
        defaultServer: substituteServer(config.defaultServer, env),
    };
}

function freezeServer(server: ServerSpec): RouteTarget {
    return Object.freeze({
        ...server,
        args: Object.freeze([...server.args]),
        ...(server.env ? { env: Object.freeze({ ...server.env }) } : {}),
    });
}

/**
 * Build the immutable table the router consumes. Rule order follows the file.
 */
export function toRouteTable(config: RouterConfig): RouteTable {
    return Object.freeze({
        rules: Object.freeze(_.map(config.routes, route => Object.freeze({
            pattern: route.pattern,
            target:  freezeServer(route.server),
        }))),
        'default': freezeServer(config.defaultServer),
    });
}

/**
 * Load the configuration as written on disk (no substitution), for editing
 */
export async function loadRawRouterConfig(path: string): Promise<RouterConfig> {
    return loadJsonConfig({ path, schema: RouterConfigSchema });
}

/**
 * Load the configuration ready for routing, with ${VAR} references substituted
 */
export async function loadRouterConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<RouterConfig> {
    const config = await loadJsonConfig({
        path,
        schema:    RouterConfigSchema,
        transform: loaded => substituteEnvVars(loaded, env),
    });
    logger.debug({ configPath: path, routeCount: config.routes.length }, 'Loaded route configuration');
    return config;
}

export async function saveRouterConfig(path: string, config: RouterConfigInput): Promise<void> {
    await saveJsonConfig(path, RouterConfigSchema, config);
    logger.info({ configPath: path, routeCount: config.routes?.length ?? 0 }, 'Saved route configuration');
}

/**
 * Insert a rule at position (0-based), or append when position is omitted
 */
export function addRoute(config: RouterConfig, rule: RouteRuleConfig, position?: number): RouterConfig {
    const routes = [...config.routes];
    const index = position === undefined ? routes.length : _.clamp(position, 0, routes.length);
    routes.splice(index, 0, rule);
    return { ...config, routes };
}

/**
 * Remove every rule whose pattern is exactly `pattern`
 */
export function removeRoute(config: RouterConfig, pattern: string): { config: RouterConfig, removed: number } {
    const routes = _.reject(config.routes, route => route.pattern === pattern);
    return {
        config:  { ...config, routes },
        removed: config.routes.length - routes.length,
    };
}

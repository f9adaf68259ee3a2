/**
 * Text output for the maintenance and diagnostic commands
 */

import _ from 'lodash';
import { unsupportedSyntax } from '../router/glob.js';
import type { Resolution } from '../router/pattern-router.js';
import type { ProbeReport } from '../backend/probe.js';
import type { RouterConfig, RouteTarget } from '../types/config.js';

export function formatCommandLine(server: Pick<RouteTarget, 'command' | 'args'>): string {
    return _.trim(`${server.command} ${server.args.join(' ')}`);
}

function formatServer(server: RouteTarget, indent: string): string[] {
    const lines = [
        `${indent}Server:      ${server.name}`,
        `${indent}Command:     ${formatCommandLine(server)}`,
    ];
    if(server.env && _.keys(server.env).length > 0) {
        lines.push(`${indent}Env vars:    ${_.keys(server.env).join(', ')}`);
    }
    if(server.cwd) {
        lines.push(`${indent}Cwd:         ${server.cwd}`);
    }
    lines.push(`${indent}Description: ${server.description ?? 'N/A'}`);
    return lines;
}

export function formatRouteList(config: RouterConfig): string[] {
    const lines = ['Route patterns (first match wins):', ''];

    if(config.routes.length === 0) {
        lines.push('  No route patterns configured.', '');
    }
    _.forEach(config.routes, (route, index) => {
        lines.push(`  ${index + 1}. Pattern: ${route.pattern}`, ...formatServer(route.server, '     '), '');
    });

    lines.push('Default:', ...formatServer(config.defaultServer, '     '));
    return lines;
}

export function formatResolution(resolution: Resolution): string[] {
    return [
        `Path:        ${resolution.path}`,
        `Matched:     ${resolution.pattern === null ? '(default)' : `#${(resolution.ruleIndex ?? 0) + 1} ${resolution.pattern}`}`,
        ...formatServer(resolution.server, ''),
    ];
}

export function formatProbeReport(server: RouteTarget, report: ProbeReport): string[] {
    const lines = [
        `Server:      ${server.name}`,
        `Reports as:  ${report.serverName ?? 'unknown'} ${report.serverVersion ?? ''}`.trimEnd(),
        `Tools (${report.toolNames.length}):`,
    ];
    for(const toolName of report.toolNames) {
        lines.push(`  - ${toolName}`);
    }
    return lines;
}

/**
 * Warnings that do not make the configuration invalid
 */
export function validationWarnings(config: RouterConfig): string[] {
    const warnings: string[] = [];
    const seen = new Set<string>();

    _.forEach(config.routes, (route, index) => {
        const literal = unsupportedSyntax(route.pattern);
        if(literal.length > 0) {
            warnings.push(`routes.${index}.pattern "${route.pattern}": brace expansion is not supported; ${literal.join(' ')} will be matched literally`);
        }
        if(seen.has(route.pattern)) {
            warnings.push(`routes.${index}.pattern "${route.pattern}": duplicate of an earlier pattern and can never match`);
        }
        seen.add(route.pattern);
    });

    return warnings;
}

/**
 * Parse KEY=VALUE pairs given on the command line
 */
export function parseEnvAssignments(assignments: readonly string[]): Record<string, string> {
    const env: Record<string, string> = {};
    for(const assignment of assignments) {
        const separator = assignment.indexOf('=');
        if(separator <= 0) {
            throw new Error(`Invalid environment assignment "${assignment}", expected KEY=VALUE`);
        }
        env[assignment.slice(0, separator)] = assignment.slice(separator + 1);
    }
    return env;
}

/**
 * Pattern Router
 *
 * Picks the backend for a working directory: the first rule (in table order)
 * whose pattern matches wins, otherwise the table's default. Order decides,
 * not specificity. Pure; never throws for a missing match.
 */

import { posix, sep } from 'node:path';
import _ from 'lodash';
import { matchesPattern } from './glob.js';
import type { RouteTable, RouteTarget } from '../types/config.js';

export interface Resolution {
    /** Normalized path that was matched */
    path:      string
    server:    RouteTarget
    /** Index of the matching rule, or null when the default was used */
    ruleIndex: number | null
    pattern:   string | null
}

/**
 * Convert platform separators to "/" and collapse "//", "." and ".." segments.
 * A trailing separator is dropped except for the root itself.
 */
export function normalizePath(path: string, separator: string = sep): string {
    const forward = separator === '/' ? path : _.replace(path, new RegExp(_.escapeRegExp(separator), 'g'), '/');
    const normalized = posix.normalize(forward);
    if(normalized.length > 1 && _.endsWith(normalized, '/')) {
        return normalized.slice(0, -1);
    }
    return normalized;
}

function normalizePattern(pattern: string, separator: string): string {
    return separator === '/' ? pattern : _.replace(pattern, new RegExp(_.escapeRegExp(separator), 'g'), '/');
}

/**
 * Resolve a path and report which rule decided it
 */
export function explain(path: string, table: RouteTable, separator: string = sep): Resolution {
    const normalized = normalizePath(path, separator);

    const ruleIndex = _.findIndex(table.rules, rule => matchesPattern(normalizePattern(rule.pattern, separator), normalized));
    if(ruleIndex === -1) {
        return { path: normalized, server: table.default, ruleIndex: null, pattern: null };
    }

    const rule = table.rules[ruleIndex];
    return { path: normalized, server: rule.target, ruleIndex, pattern: rule.pattern };
}

export function resolve(path: string, table: RouteTable, separator: string = sep): RouteTarget {
    return explain(path, table, separator).server;
}

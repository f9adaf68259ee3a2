/**
 * Shared Configuration Loading Utility
 *
 * Provides generic config loading with:
 * - JSON parsing
 * - Zod schema validation
 * - Optional transformation after validation (e.g., environment variable substitution)
 * - Atomic saving (temp file + rename)
 */

import { readFile, writeFile, rename, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ZodType, ZodTypeDef, ZodIssue } from 'zod';
import _ from 'lodash';
import { ConfigurationError, errorMessage } from '../errors.js';
import { ensureDir } from './config-paths.js';
import { logger } from './logger.js';

/**
 * Options for loading JSON configuration
 */
export interface LoadJsonConfigOptions<T, I> {
    /** Path to the configuration file */
    path: string

    /** Zod schema for validation */
    schema: ZodType<T, ZodTypeDef, I>

    /** Optional transformation applied to the validated value */
    transform?: (config: T) => T
}

export function formatZodIssues(issues: ZodIssue[]): string[] {
    return _.map(issues, issue => `${issue.path.length > 0 ? _.join(issue.path, '.') : '(root)'}: ${issue.message}`);
}

/**
 * Load and validate a JSON configuration file
 *
 * @throws ConfigurationError if the file is missing, is invalid JSON, or fails validation
 */
export async function loadJsonConfig<T, I>(options: LoadJsonConfigOptions<T, I>): Promise<T> {
    const { path, schema, transform } = options;

    let content: string;
    try {
        content = await readFile(path, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Config file not found or unreadable: ${path} (${errorMessage(error)})`, { configPath: path, cause: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in config file ${path}: ${errorMessage(error)}`, { configPath: path, cause: error });
    }

    const result = schema.safeParse(data);
    if(!result.success) {
        const issues = formatZodIssues(result.error.issues);
        logger.error({ issues, configPath: path }, 'Invalid configuration file');
        throw new ConfigurationError(`Invalid configuration in ${path}: ${issues.join(', ')}`, { configPath: path, issues, cause: result.error });
    }

    return transform ? transform(result.data) : result.data;
}

/**
 * Validate and save a JSON configuration file
 * Uses atomic write (temp file + rename) to prevent corruption
 */
export async function saveJsonConfig<T, I>(path: string, schema: ZodType<T, ZodTypeDef, I>, config: I): Promise<void> {
    const result = schema.safeParse(config);
    if(!result.success) {
        const issues = formatZodIssues(result.error.issues);
        throw new ConfigurationError(`Refusing to save invalid configuration: ${issues.join(', ')}`, { configPath: path, issues });
    }

    await ensureDir(dirname(path));

    const tempPath = `${path}.tmp.${process.pid}`;
    try {
        await writeFile(tempPath, JSON.stringify(config, null, 2) + '\n', { encoding: 'utf-8', flag: 'w' });
        await rename(tempPath, path);
    } catch (error) {
        try {
            await unlink(tempPath);
        } catch{
            // temp file may never have been written
        }
        throw new ConfigurationError(`Failed to save configuration to ${path}: ${errorMessage(error)}`, { configPath: path, cause: error });
    }
}

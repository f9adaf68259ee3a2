/**
 * Backend probe
 *
 * Diagnostic only: performs an MCP initialize handshake against a backend and
 * lists its tools. Never used while proxying a session, which stays
 * byte-transparent.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import _ from 'lodash';
import { buildChildEnv } from './process-supervisor.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { RouteTarget } from '../types/config.js';

export interface ProbeReport {
    serverName:    string | undefined
    serverVersion: string | undefined
    toolNames:     string[]
}

const CLIENT_INFO = {
    name:    'mcp-path-router-probe',
    version: '0.1.0',
};

/**
 * Handshake over an already-created transport and report what the server offers
 */
export async function probeTransport(transport: Transport, timeoutMs: number): Promise<ProbeReport> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });

    try {
        await withTimeout(client.connect(transport), timeoutMs, `Backend did not complete the MCP handshake within ${timeoutMs}ms`);
        const info = client.getServerVersion();
        const capabilities = client.getServerCapabilities();

        let toolNames: string[] = [];
        if(capabilities?.tools) {
            const result = await withTimeout(client.listTools(), timeoutMs, `Backend did not list its tools within ${timeoutMs}ms`);
            toolNames = _.map(result.tools, 'name');
        }

        return {
            serverName:    info?.name,
            serverVersion: info?.version,
            toolNames,
        };
    } finally {
        await client.close();
    }
}

/**
 * Launch the backend for `workingDirectory` and probe it
 */
export async function probeServer(spec: RouteTarget, workingDirectory: string, timeoutMs: number): Promise<ProbeReport> {
    logger.info({ serverName: spec.name, command: spec.command }, 'Probing backend server');

    const transport = new StdioClientTransport({
        command: spec.command,
        args:    [...spec.args],
        env:     buildChildEnv(spec, { inheritedEnv: process.env, workingDirectory }),
        stderr:  'inherit',
        ...(spec.cwd !== undefined ? { cwd: spec.cwd } : {}),
    });

    return probeTransport(transport, timeoutMs);
}

/**
 * Tests for the routing session state machine
 *
 * Each terminal condition must end in TERMINATED with the backend reaped and
 * an exit code that tells the failure modes apart.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { ProcessSupervisor } from '../../src/backend/process-supervisor.js';
import { ChildExitError, SpawnError, StreamError } from '../../src/errors.js';
import { ExitCodes, Session, SessionState, exitCodeFor, type SessionOptions } from '../../src/session/session.js';
import { createMockSpawn, type MockProcessOptions } from '../helpers/mocks.js';
import { collect, waitFor } from '../helpers/async-utils.js';
import { routeTable } from '../helpers/builders.js';
import { logger } from '../../src/utils/logger.js';

const table = routeTable([
    ['/repo/a*', 'server-a'],
    ['/repo/b*', 'server-b'],
], 'server-default');

function setup(mockOptions: MockProcessOptions = {}, overrides: Partial<SessionOptions> = {}) {
    const mock = createMockSpawn(mockOptions);
    const input = new PassThrough();
    const output = new PassThrough();
    const received = collect(output);
    const session = new Session({
        table,
        streams:          { input, output },
        supervisor:       new ProcessSupervisor({ spawn: mock.spawn, gracePeriodMs: 20, killTimeoutMs: 20 }),
        workingDirectory: '/repo/a/service',
        env:              { PATH: '/usr/bin' },
        drainTimeoutMs:   200,
        ...overrides,
    });
    return { session, mock, input, output, received };
}

async function forwarding(session: Session): Promise<void> {
    await waitFor(() => session.state === SessionState.FORWARDING);
}

describe('Session', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should spawn the backend selected by the working-directory override', async () => {
        const { session, mock } = setup({ exitOnStdinEnd: 0 }, {
            workingDirectory: '/repo/b/api',
            env:              { PWD: '/repo/a/elsewhere' },
            cwd:              () => '/repo/c',
        });
        const running = session.run();
        await forwarding(session);
        mock.processes[0].exit(0);
        const result = await running;

        expect(session.resolvedTarget?.name).toBe('server-b');
        expect(mock.calls[0].options.env).toMatchObject({ PWD: '/repo/b/api', MCP_ROUTER_WORKDIR: '/repo/b/api' });
        expect(result.workingDirectory).toEqual({ path: '/repo/b/api', source: 'option' });
        expect(result.target.name).toBe('server-b');
    });

    it('should use the default backend when no pattern matches', async () => {
        const { session, mock } = setup({}, { workingDirectory: '/srv/other' });
        const running = session.run();
        await forwarding(session);
        mock.processes[0].exit(0);

        expect((await running).target.name).toBe('server-default');
    });

    it('should relay both directions and end cleanly when the backend exits', async () => {
        const { session, mock, input, received } = setup({ echo: true });
        const running = session.run();
        await forwarding(session);
        const child = mock.processes[0];

        input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
        await waitFor(() => received.text() === '{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
        child.stdout.write('{"jsonrpc":"2.0","id":1,"result":{}}\n');
        child.exit(0);

        const result = await running;
        expect(child.receivedText()).toBe('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
        expect(received.text()).toBe('{"jsonrpc":"2.0","id":1,"method":"ping"}\n{"jsonrpc":"2.0","id":1,"result":{}}\n');
        expect(result).toMatchObject({
            outcome:    'clean',
            reason:     'child-exited',
            exitCode:   ExitCodes.CLEAN,
            exitStatus: { code: 0, signal: null },
        });
        expect(result.error).toBeUndefined();
        expect(session.state).toBe(SessionState.TERMINATED);
    });

    it('should shut the backend down when the caller closes its input', async () => {
        const { session, mock, input } = setup();
        const running = session.run();
        await forwarding(session);

        input.end('{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
        const result = await running;

        expect(result).toMatchObject({
            outcome:    'clean',
            reason:     'caller-closed',
            exitCode:   ExitCodes.CLEAN,
            exitStatus: { code: null, signal: 'SIGTERM' },
        });
        expect(mock.processes[0].receivedText()).toBe('{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
        expect(mock.processes[0].exited).toBe(true);
    });

    it('should force-kill a backend that ignores every shutdown request', async () => {
        const { session, mock, input } = setup({ ignoreSigterm: true });
        const running = session.run();
        await forwarding(session);

        input.end();
        const result = await running;

        expect(result.reason).toBe('caller-closed');
        expect(result.exitStatus).toEqual({ code: null, signal: 'SIGKILL' });
        expect(mock.processes[0].signals).toEqual(['SIGTERM', 'SIGKILL']);
    });

    it('should report a nonzero backend exit as child-failed', async () => {
        const { session, mock } = setup();
        const running = session.run();
        await forwarding(session);
        mock.processes[0].exit(3);

        const result = await running;
        expect(result.outcome).toBe('error');
        expect(result.reason).toBe('child-failed');
        expect(result.exitCode).toBe(ExitCodes.CHILD_FAILED);
        expect(result.error).toBeInstanceOf(ChildExitError);
        expect(result.error?.message).toBe('Backend server-a exited with code 3');
    });

    it('should report a backend killed by a signal as child-failed', async () => {
        const { session, mock } = setup();
        const running = session.run();
        await forwarding(session);
        mock.processes[0].exit(null, 'SIGSEGV');

        const result = await running;
        expect(result.reason).toBe('child-failed');
        expect(result.error?.message).toBe('Backend server-a exited with signal SIGSEGV');
    });

    it('should report a backend that cannot be started as spawn-failed', async () => {
        const { session } = setup({ spawnError: new Error('spawn node ENOENT') });

        const result = await session.run();

        expect(result.outcome).toBe('error');
        expect(result.reason).toBe('spawn-failed');
        expect(result.exitCode).toBe(ExitCodes.SPAWN_FAILED);
        expect(result.error).toBeInstanceOf(SpawnError);
        expect(result.error?.message).toBe('Failed to start backend: node server-a.js (spawn node ENOENT)');
        expect(session.state).toBe(SessionState.TERMINATED);
    });

    it('should report a failed write to the caller as stream-failed and reap the backend', async () => {
        const output = new Writable({
            write: (_chunk, _encoding, callback) => {
                callback(new Error('EPIPE'));
            },
        });
        const { session, mock } = setup({}, { streams: { input: new PassThrough(), output } });
        const running = session.run();
        await forwarding(session);

        mock.processes[0].stdout.write('{"jsonrpc":"2.0","id":1,"result":{}}\n');
        const result = await running;

        expect(result.reason).toBe('stream-failed');
        expect(result.exitCode).toBe(ExitCodes.STREAM_FAILED);
        expect(result.error).toBeInstanceOf(StreamError);
        expect(result.error).toMatchObject({ direction: 'child-to-caller', side: 'destination' });
        expect(mock.processes[0].exited).toBe(true);
    });

    it('should report a failed read from the caller as stream-failed', async () => {
        const { session, mock, input } = setup();
        const running = session.run();
        await forwarding(session);

        input.destroy(new Error('connection reset'));
        const result = await running;

        expect(result.reason).toBe('stream-failed');
        expect(result.error).toMatchObject({ direction: 'caller-to-child', side: 'source' });
        expect(mock.processes[0].exited).toBe(true);
    });

    describe('backend closes its stdin', () => {
        it('should let the exit status decide when the backend exits soon after', async () => {
            const warn = vi.spyOn(logger, 'warn');
            const { session, mock, input } = setup();
            const running = session.run();
            await forwarding(session);
            const child = mock.processes[0];

            child.stdin.destroy();
            input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
            await waitFor(() => warn.mock.calls.some(call => call[1] === 'Forwarding loop failed'));
            child.exit(3);
            const result = await running;

            expect(result.reason).toBe('child-failed');
            expect(result.exitCode).toBe(ExitCodes.CHILD_FAILED);
            expect(result.exitStatus).toEqual({ code: 3, signal: null });
            expect(result.error).toBeInstanceOf(ChildExitError);
            expect(child.signals).toEqual([]);
        });

        it('should report a stream failure when the backend keeps running', async () => {
            const { session, mock, input } = setup();
            const running = session.run();
            await forwarding(session);
            const child = mock.processes[0];

            child.stdin.destroy();
            input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
            const result = await running;

            expect(result.reason).toBe('stream-failed');
            expect(result.exitCode).toBe(ExitCodes.STREAM_FAILED);
            expect(result.error).toBeInstanceOf(StreamError);
            expect(result.error).toMatchObject({ direction: 'caller-to-child', side: 'destination' });
            expect(child.signals).toEqual(['SIGTERM']);
            expect(child.exited).toBe(true);
        });
    });

    it('should end cleanly and reap the backend when cancelled', async () => {
        const controller = new AbortController();
        const { session, mock } = setup({}, { signal: controller.signal });
        const running = session.run();
        await forwarding(session);

        controller.abort();
        const result = await running;

        expect(result).toMatchObject({ outcome: 'clean', reason: 'cancelled', exitCode: ExitCodes.CLEAN });
        expect(mock.processes[0].signals).toEqual(['SIGTERM']);
        expect(mock.processes[0].exited).toBe(true);
    });

    it('should detach from the cancellation signal when the session ends', async () => {
        const controller = new AbortController();
        const add = vi.spyOn(controller.signal, 'addEventListener');
        const remove = vi.spyOn(controller.signal, 'removeEventListener');
        const { session, mock } = setup({}, { signal: controller.signal });
        const running = session.run();
        await forwarding(session);

        mock.processes[0].exit(0);
        await running;

        expect(add).toHaveBeenCalledTimes(1);
        expect(remove).toHaveBeenCalledTimes(1);
        expect(remove.mock.calls[0][1]).toBe(add.mock.calls[0][1]);
    });

    it('should spawn exactly one backend per session', async () => {
        const { session, mock } = setup({ exitOnStdinEnd: 0 });
        const running = session.run();
        await forwarding(session);
        mock.processes[0].exit(0);
        await running;

        expect(mock.calls).toHaveLength(1);
    });

    it('should refuse to run twice', async () => {
        const { session, mock } = setup();
        const running = session.run();
        await forwarding(session);

        await expect(session.run()).rejects.toThrow('Session has already been started');
        mock.processes[0].exit(0);
        await running;
    });
});

describe('exitCodeFor', () => {
    it('should distinguish spawn, stream and backend failures from clean endings', () => {
        expect(exitCodeFor('child-exited')).toBe(0);
        expect(exitCodeFor('caller-closed')).toBe(0);
        expect(exitCodeFor('cancelled')).toBe(0);
        expect(exitCodeFor('spawn-failed')).toBe(69);
        expect(exitCodeFor('child-failed')).toBe(70);
        expect(exitCodeFor('stream-failed')).toBe(74);
    });
});

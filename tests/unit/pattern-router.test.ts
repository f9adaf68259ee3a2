/**
 * Tests for first-match route resolution
 */

import { describe, it, expect } from 'vitest';
import { explain, normalizePath, resolve } from '../../src/router/pattern-router.js';
import { resolveWorkingDirectory } from '../../src/session/working-directory.js';
import { routeTable } from '../helpers/builders.js';

describe('resolve', () => {
    const table = routeTable([
        ['/repo/a*', 'server-a'],
        ['/repo/b*', 'server-b'],
    ], 'server-default');

    it('should pick the first matching rule', () => {
        expect(resolve('/repo/a/sub', table, '/').name).toBe('server-a');
        expect(resolve('/repo/b', table, '/').name).toBe('server-b');
    });

    it('should fall back to the default when nothing matches', () => {
        expect(resolve('/repo/c', table, '/').name).toBe('server-default');
        expect(resolve('/', table, '/').name).toBe('server-default');
        expect(resolve('/elsewhere/a', table, '/').name).toBe('server-default');
    });

    it('should return the default for every path when there are no rules', () => {
        const empty = routeTable([], 'only');
        for(const path of ['/', '/repo/a', '/home/dev/projects/web']) {
            expect(resolve(path, empty, '/')).toBe(empty.default);
        }
    });

    it('should let order, not specificity, decide', () => {
        const broadFirst = routeTable([
            ['/home/*', 'broad'],
            ['/home/dev/projects/web*', 'specific'],
        ]);
        expect(resolve('/home/dev/projects/web-app', broadFirst, '/').name).toBe('broad');

        const specificFirst = routeTable([
            ['/home/dev/projects/web*', 'specific'],
            ['/home/*', 'broad'],
        ]);
        expect(resolve('/home/dev/projects/web-app', specificFirst, '/').name).toBe('specific');
        expect(resolve('/home/dev/notes', specificFirst, '/').name).toBe('broad');
    });

    it('should match project directories under any user', () => {
        const web = routeTable([['/home/*/projects/web*', 'web']], 'fallback');
        expect(resolve('/home/dev/projects/web-app', web, '/').name).toBe('web');
        expect(resolve('/home/dev/projects/web', web, '/').name).toBe('web');
        expect(resolve('/home/dev/projects/api', web, '/').name).toBe('fallback');
    });

    it('should return the table\'s own target object', () => {
        expect(resolve('/repo/a', table, '/')).toBe(table.rules[0].target);
    });

    it('should route on the override rather than the process directory', () => {
        const workingDirectory = resolveWorkingDirectory({
            explicit: '/repo/b-service',
            env:      { PWD: '/repo/a-service' },
            cwd:      () => '/repo/c-service',
        });
        expect(resolve(workingDirectory.path, table).name).toBe('server-b');
    });
});

describe('explain', () => {
    const table = routeTable([
        ['/repo/a*', 'server-a'],
        ['/repo/b*', 'server-b'],
    ]);

    it('should report the index and pattern of the deciding rule', () => {
        expect(explain('/repo/b/x', table, '/')).toEqual({
            path:      '/repo/b/x',
            server:    table.rules[1].target,
            ruleIndex: 1,
            pattern:   '/repo/b*',
        });
    });

    it('should report null index and pattern for the default', () => {
        const resolution = explain('/srv', table, '/');
        expect(resolution.ruleIndex).toBeNull();
        expect(resolution.pattern).toBeNull();
        expect(resolution.server).toBe(table.default);
    });

    it('should match against the normalized path', () => {
        expect(explain('/repo/x/../a/', table, '/')).toMatchObject({ path: '/repo/a', ruleIndex: 0 });
    });

    it('should accept a platform separator in paths and patterns', () => {
        const windows = routeTable([['C:\\work\\api*', 'api']]);
        const resolution = explain('C:\\work\\api-gateway\\src', windows, '\\');
        expect(resolution.path).toBe('C:/work/api-gateway/src');
        expect(resolution.server.name).toBe('api');
    });
});

describe('normalizePath', () => {
    it('should drop a trailing separator', () => {
        expect(normalizePath('/repo/a/', '/')).toBe('/repo/a');
    });

    it('should keep the root', () => {
        expect(normalizePath('/', '/')).toBe('/');
    });

    it('should collapse duplicate separators and dot segments', () => {
        expect(normalizePath('/repo//a/./b/../c', '/')).toBe('/repo/a/c');
    });

    it('should convert backslashes when they are the separator', () => {
        expect(normalizePath('D:\\src\\app\\', '\\')).toBe('D:/src/app');
    });
});

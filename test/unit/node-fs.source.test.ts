/**
 * Unit tests for the node:fs Route Source
 *
 * Compiles the fixture tree under test/fixtures/api from disk.
 */

import { fileURLToPath } from 'node:url';
import { describe, expect, test } from 'vitest';
import { Dispatcher } from '../../src/dispatch/dispatcher.ts';
import { RouteDefinitionError } from '../../src/error/route.error.ts';
import { compileRoutes } from '../../src/route/route.compiler.ts';
import { RouteSourceError } from '../../src/type/route-source.type.ts';
import type { DirEntry } from '../../src/type/route-source.type.ts';
import { NodeFsRouteSource } from '../../runtime/node/node-fs.source.ts';

const fixtureRoot = fileURLToPath(new URL('../fixtures/api', import.meta.url));

describe('NodeFsRouteSource', () => {
  test('lists directory entries', async () => {
    const entries: DirEntry[] = [];
    for await (const entry of new NodeFsRouteSource(fixtureRoot).readDir('/users')) {
      entries.push(entry);
    }

    expect(entries.sort((a, b) => a.name.localeCompare(b.name))).toEqual([
      { name: '[id]', isFile: false, isDirectory: true },
      { name: 'route.ts', isFile: true, isDirectory: false },
    ]);
  });

  test('missing directory is NOT_FOUND', async () => {
    const source = new NodeFsRouteSource(fixtureRoot);
    const read = async () => {
      for await (const _ of source.readDir('/missing')) {
        // drain
      }
    };

    await expect(read()).rejects.toBeInstanceOf(RouteSourceError);
    await expect(read()).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  test('loads handler modules', async () => {
    const mod = await new NodeFsRouteSource(fixtureRoot).loadModule('/users/route.ts');

    expect(typeof mod.GET).toBe('function');
    expect(typeof mod.POST).toBe('function');
  });
});

describe('compileRoutes from disk', () => {
  test('builds the fixture route table', async () => {
    const tree = await compileRoutes(new NodeFsRouteSource(fixtureRoot));

    expect(tree.routes).toEqual([
      { pattern: '/', methods: ['GET'] },
      { pattern: '/files/*path', methods: ['GET'] },
      { pattern: '/users', methods: ['GET', 'POST'] },
      { pattern: '/users/:id', methods: ['GET', 'DELETE'] },
    ]);
  });

  test('loaded handlers dispatch', async () => {
    const dispatcher = new Dispatcher(await compileRoutes(new NodeFsRouteSource(fixtureRoot)));
    const response = await dispatcher.dispatch({
      method: 'GET',
      path: '/files/reports/q3.csv',
      query: '',
      headers: [],
      body: new Uint8Array(),
    });

    expect(new TextDecoder().decode(response?.body)).toBe('{"path":"reports/q3.csv"}');
  });

  test('missing routes directory', async () => {
    const error = compileRoutes(new NodeFsRouteSource(`${fixtureRoot}/../does-not-exist`));

    await expect(error).rejects.toBeInstanceOf(RouteDefinitionError);
    await expect(error).rejects.toMatchObject({ code: 'ROOT_NOT_FOUND' });
  });
});

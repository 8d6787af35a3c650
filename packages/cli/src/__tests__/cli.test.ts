import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { main } from '../index.js';

class ExitCalled extends Error {
  constructor(readonly code: string | number | null | undefined) {
    super(`process.exit(${String(code)})`);
  }
}

let dir: string;
let stdout: string[];
let stderr: string[];

async function fixture(name: string, contents: string): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, contents, 'utf8');
  return file;
}

async function run(...args: string[]): Promise<void> {
  await main(['node', 'typebridge', ...args]);
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'typebridge-cli-'));
  stdout = [];
  stderr = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  });
  vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
    throw new ExitCalled(code);
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('typebridge extract', () => {
  it('prints the translated schema', async () => {
    const file = await fixture(
      'schema.json',
      JSON.stringify({ type: 'string', minLength: 2, maxLength: 5 })
    );

    await run('extract', file);

    expect(stdout.join('')).toBe('import "strings"\n\nstrings.MinRunes(2) & strings.MaxRunes(5)\n');
  });

  it('passes flags through to the decoder', async () => {
    const file = await fixture('schema.json', JSON.stringify({ type: 'null' }));

    await run('extract', '--pkg', 'schemas', file);

    expect(stdout.join('')).toBe('package schemas\n\nnull\n');
  });

  it('extracts a single schema below --root', async () => {
    const file = await fixture(
      'openapi.json',
      JSON.stringify({ components: { schemas: { type: 'boolean' } } })
    );

    await run('extract', '--root', '#/components/schemas', '--single-root', file);

    expect(stdout.join('')).toBe('bool\n');
  });

  it('reports errors one per line and exits with their code', async () => {
    const file = await fixture('schema.json', JSON.stringify({ $ref: '#/$defs/missing' }));

    await expect(run('extract', file)).rejects.toMatchObject({ code: 21 });

    expect(stderr).toEqual(['#/$ref: JSON Pointer reference "/$defs/missing" not found']);
    expect(stdout).toEqual([]);
  });

  it('rejects unknown keywords under --strict', async () => {
    const file = await fixture('schema.json', JSON.stringify({ type: 'string', foo: 1 }));

    await expect(run('extract', '--strict', file)).rejects.toMatchObject({ code: 30 });

    expect(stderr).toEqual(['#/foo: unknown keyword "foo"']);
  });

  it('rejects an unknown default version', async () => {
    const file = await fixture('schema.json', '{}');

    await expect(run('extract', '--default-version', 'draft-99', file)).rejects.toMatchObject({
      code: 50,
    });

    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^--default-version: unknown schema version "draft-99"/);
  });

  it('reports files that are not JSON', async () => {
    const file = await fixture('schema.json', '{');

    await expect(run('extract', file)).rejects.toMatchObject({ code: 14 });

    expect(stderr[0]).toMatch(/schema\.json: invalid JSON: /);
  });

  it('reports files that cannot be read', async () => {
    await expect(run('extract', path.join(dir, 'absent.json'))).rejects.toMatchObject({
      code: 50,
    });

    expect(stderr[0]).toMatch(/^cannot read .*absent\.json: /);
  });
});

describe('typebridge generate', () => {
  it('describes JSON data as a schema', async () => {
    const file = await fixture('data.json', JSON.stringify({ kind: 'user' }));

    await run('generate', file);

    expect(JSON.parse(stdout.join(''))).toEqual({
      $schema: 'https://json-schema.org/draft/2020-12/schema',
      type: 'object',
      properties: { kind: { const: 'user' } },
    });
  });

  it('refuses other target versions', async () => {
    const file = await fixture('data.json', '1');

    await expect(run('generate', '--target', 'draft-07', file)).rejects.toMatchObject({
      code: 41,
    });
  });
});

describe('typebridge versions', () => {
  it('lists every version with its description', async () => {
    await run('versions');

    const lines = stdout.join('').split('\n');

    expect(lines[0]).toBe('draft-04\tJSON Schema draft 4\thttp://json-schema.org/draft-04/schema#');
    expect(lines[4]).toBe(
      '2020-12\tJSON Schema 2020-12 (default)\thttps://json-schema.org/draft/2020-12/schema'
    );
    expect(lines[5]).toBe('openapi\tOpenAPI 3.0 schema objects');
    expect(lines).toHaveLength(9);
  });
});

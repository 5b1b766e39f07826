import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createGameSession, serializeSession } from '@labyrinth/core';

import { FileSessionStore } from './file-session-store.js';

const snapshotFor = (heroNames: string[]) =>
  serializeSession(createGameSession({ playerLogin: 'tester', heroNames }));

describe('FileSessionStore', () => {
  let directory: string;
  let path: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'labyrinth-saves-'));
    path = join(directory, 'game_save.json');
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('treats a missing file as an empty collection', async () => {
    const store = new FileSessionStore(path);
    await expect(store.loadSessionFor('mira')).resolves.toBeUndefined();
  });

  it('treats an empty or broken file as an empty collection', async () => {
    await writeFile(path, '', 'utf8');
    const store = new FileSessionStore(path);
    await expect(store.loadSessionFor('mira')).resolves.toBeUndefined();

    await writeFile(path, '{not json', 'utf8');
    await expect(store.loadSessionFor('mira')).resolves.toBeUndefined();

    await store.saveSessionFor('mira', snapshotFor(['Ayla']));
    expect((await store.loadSessionFor('mira'))?.heroes.map((hero) => hero.name)).toEqual(['Ayla']);
  });

  it('keeps other players untouched and writes logins in sorted order', async () => {
    const store = new FileSessionStore(path);
    await store.saveSessionFor('zed', snapshotFor(['Cato']));
    await store.saveSessionFor('amy', snapshotFor(['Ayla', 'Bron']));

    const written: Record<string, unknown> = JSON.parse(await readFile(path, 'utf8'));
    expect(Object.keys(written)).toEqual(['amy', 'zed']);
    expect((await store.loadSessionFor('zed'))?.heroes.map((hero) => hero.name)).toEqual(['Cato']);
  });

  it('indents the document with four spaces', async () => {
    const store = new FileSessionStore(path);
    await store.saveSessionFor('amy', snapshotFor(['Ayla']));
    const raw = await readFile(path, 'utf8');
    expect(raw.split('\n')[1]).toBe('    "amy": {');
  });

  it('treats an unreadable save path as an empty collection', async () => {
    await mkdir(path);
    const store = new FileSessionStore(path);
    await expect(store.loadSessionFor('mira')).resolves.toBeUndefined();
  });

  it('ignores an entry that does not validate as a snapshot', async () => {
    await writeFile(path, JSON.stringify({ mira: { round: 'one' } }), 'utf8');
    const store = new FileSessionStore(path);
    await expect(store.loadSessionFor('mira')).resolves.toBeUndefined();
  });

  it('deletes only the requested login', async () => {
    const store = new FileSessionStore(path);
    await store.saveSessionFor('amy', snapshotFor(['Ayla']));
    await store.saveSessionFor('zed', snapshotFor(['Cato']));

    await store.deleteSessionFor('amy');
    await store.deleteSessionFor('ghost');

    await expect(store.loadSessionFor('amy')).resolves.toBeUndefined();
    expect(await store.loadSessionFor('zed')).toBeDefined();
  });

  it('round-trips a snapshot exactly', async () => {
    const store = new FileSessionStore(path);
    const snapshot = snapshotFor(['Ayla', 'Bron']);
    await store.saveSessionFor('amy', snapshot);
    await expect(store.loadSessionFor('amy')).resolves.toEqual(snapshot);
  });
});

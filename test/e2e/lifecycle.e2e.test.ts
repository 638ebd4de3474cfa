import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { createHash } from 'node:crypto';
import { RunContext } from '../../src/context/RunContext.js';
import { MemoryStatusSink } from '../../src/output/MemoryStatusSink.js';
import { XmlManifestStore } from '../../src/manifest/xml/XmlManifestStore.js';
import { createCollection } from '../../src/actions/init.js';
import { checkAction, updateAction, verifyAction } from '../../src/actions/reconcile.js';
import type { ActionEnv } from '../../src/actions/env.js';
import type { Collection } from '../../src/collection/Collection.js';
import { NodeKind } from '../../src/types/enums.js';
import { cleanupTempDir, createTempDir, writeFile } from './helpers.js';

describe('manifest lifecycle', () => {
  let dir: string;
  let file: string;
  const store = new XmlManifestStore();

  beforeEach(() => {
    dir = createTempDir();
    file = path.join(dir, 'treeledger.xml');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  async function load(): Promise<Collection> {
    const collection = await store.load(file);
    if (!collection) throw new Error('manifest did not load');
    return collection;
  }

  function envFor(collection: Collection, sink: MemoryStatusSink): ActionEnv {
    return { collection, ctx: new RunContext(), sink, cwd: dir };
  }

  it('tracks a file from creation to deletion', async () => {
    // init
    await store.save(createCollection({ manifestDir: dir, manifestName: 'treeledger.xml' }), file);
    expect((await load()).rootNode.children.size).toBe(0);

    // update records size and checksum
    const bytes = 'known bytes\n';
    const target = writeFile(dir, 'a.txt', bytes);
    let collection = await load();
    let sink = new MemoryStatusSink();
    expect(await updateAction(envFor(collection, sink))).toBe(true);
    expect(sink.lines()).toEqual(['ADDED:/a.txt', 'CHECKSUM:/a.txt']);
    await store.save(collection, file);

    collection = await load();
    expect(Array.from(collection.rootNode.children.keys())).toEqual(['a.txt']);
    expect(collection.rootNode.children.get('a.txt')).toMatchObject({
      kind: NodeKind.FILE,
      size: Buffer.byteLength(bytes),
      checksum: createHash('md5').update(bytes).digest('hex')
    });

    // same size, same mtime, different content
    const before = fs.statSync(target);
    fs.writeFileSync(target, 'KNOWN BYTES\n');
    fs.utimesSync(target, before.atime, before.mtime);

    sink = new MemoryStatusSink();
    expect(await verifyAction(envFor(collection, sink))).toBe(false);
    expect(sink.lines()).toEqual(['CHECKSUM:/a.txt']);

    sink = new MemoryStatusSink();
    expect(await checkAction(envFor(collection, sink))).toBe(true);
    expect(sink.lines()).toEqual([]);

    // deletion
    fs.rmSync(target);
    sink = new MemoryStatusSink();
    expect(await checkAction(envFor(collection, sink))).toBe(false);
    expect(sink.lines()).toEqual(['MISSING:/a.txt']);

    sink = new MemoryStatusSink();
    collection.dirty = false;
    expect(await updateAction(envFor(collection, sink))).toBe(true);
    expect(sink.lines()).toEqual(['DELETED:/a.txt']);
    expect(collection.dirty).toBe(true);
    await store.save(collection, file);

    expect((await load()).rootNode.children.has('a.txt')).toBe(false);
  });
});

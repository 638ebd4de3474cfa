import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Collection } from '../../../src/collection/Collection.js';
import { getMeta } from '../../../src/collection/meta.js';
import { findNode } from '../../../src/collection/lookup.js';
import { RunContext } from '../../../src/context/RunContext.js';
import { MemoryStatusSink } from '../../../src/output/MemoryStatusSink.js';
import { DefaultUpdater } from '../../../src/reconcile/DefaultUpdater.js';
import { checkMetaAction, updateMetaAction } from '../../../src/actions/meta.js';
import type { ActionEnv } from '../../../src/actions/env.js';
import { MetaType } from '../../../src/types/meta.js';
import { cleanupTempDir, createTempDir, writeTree } from '../helpers.js';

const RULES = `[treeledger:meta]
target = .

[pkg-(@).txt]
autoname = pkg
tags = package

[app.bin]
depends = pkg:1.0:2.0, missing
description = The   main   application

[nothing-*.dat]
tags = never
`;

describe('updatemeta and checkmeta on disk', () => {
  let dir: string;
  let env: ActionEnv & { sink: MemoryStatusSink };

  beforeEach(async () => {
    dir = createTempDir();
    writeTree(dir, {
      'pkgs/treemeta.ini': RULES,
      'pkgs/pkg-1.5.txt': 'p',
      'pkgs/app.bin': 'a'
    });
    const collection = new Collection(dir);
    const ctx = new RunContext();
    await new DefaultUpdater(ctx, new MemoryStatusSink()).update(collection.rootNode);
    env = { collection, ctx, sink: new MemoryStatusSink(), cwd: dir };
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  const node = (...pathList: string[]) => {
    const found = findNode(env.collection.rootNode, pathList);
    if (!found) throw new Error(`${pathList.join('/')} is not tracked`);
    return found;
  };

  it('attaches metadata from rule files and reports unused rules', async () => {
    expect(await updateMetaAction(env)).toBe(true);

    expect(getMeta(node('pkgs', 'pkg-1.5.txt'))).toEqual([
      { type: MetaType.PROVIDES, name: 'pkg', version: '1.5' },
      { type: MetaType.TAG, tag: 'package' }
    ]);
    expect(getMeta(node('pkgs', 'app.bin'), MetaType.DESCRIPTION)).toEqual([
      { type: MetaType.DESCRIPTION, description: 'The main application' }
    ]);
    expect(env.sink.events).toEqual([{ code: 'UNUSEDMETA', path: '/pkgs/treemeta.ini', message: 'nothing-*.dat' }]);
    expect(env.collection.dirty).toBe(true);
  });

  it('reports dependencies nothing provides', async () => {
    await updateMetaAction(env);
    env.sink.clear();

    expect(checkMetaAction(env)).toBe(false);
    expect(env.sink.events).toEqual([{ code: 'DEPENDS', path: '/pkgs/app.bin', message: 'missing' }]);
  });

  it('keeps the current metadata when a rule file cannot be used', async () => {
    await updateMetaAction(env);
    writeTree(dir, { 'broken/treemeta.ini': '[loose]\ntags = x\n' });
    await new DefaultUpdater(env.ctx, new MemoryStatusSink()).update(env.collection.rootNode);
    env.sink.clear();

    expect(await updateMetaAction(env)).toBe(false);
    expect(env.sink.errorLines()).toEqual(['NOTMETAINFO:/broken/treemeta.ini']);
    expect(getMeta(node('pkgs', 'pkg-1.5.txt'), MetaType.TAG)).toEqual([{ type: MetaType.TAG, tag: 'package' }]);
  });
});

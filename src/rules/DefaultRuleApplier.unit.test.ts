import { describe, expect, it } from 'vitest';
import type { MetaRule } from '../types/rule.js';
import type { CollectionNode } from '../types/node.js';
import { Collection } from '../collection/Collection.js';
import { createDirectory, createFile, prettyPath } from '../collection/node.js';
import { getMeta } from '../collection/meta.js';
import { RunContext } from '../context/RunContext.js';
import { MemoryStatusSink } from '../output/MemoryStatusSink.js';
import { MetaType, type MetaRecord } from '../types/meta.js';
import { DefaultRuleApplier } from './DefaultRuleApplier.js';
import { findTarget } from './target.js';

function makeRule(source: CollectionNode, pattern: string, extra: Partial<MetaRule> = {}): MetaRule {
  return {
    source,
    name: pattern,
    pattern,
    target: '.',
    autoName: new Set(),
    meta: [{ type: MetaType.TAG, tag: 'matched' }],
    users: [],
    ...extra
  };
}

function fixture() {
  const collection = new Collection('/data');
  const root = collection.rootNode;
  const pkgs = createDirectory(root, 'pkgs');
  const source = createFile(pkgs, 'treemeta.ini');
  createFile(pkgs, 'pkg-1.2.txt');
  createFile(pkgs, 'pkg-abc.txt');
  const lib = createDirectory(pkgs, 'lib-2.0');
  createFile(lib, 'readme.txt');
  createFile(createDirectory(lib, 'nested'), 'deep.txt');
  return { collection, root, pkgs, source, lib };
}

const tags = (node: CollectionNode | undefined) => (node ? getMeta(node, MetaType.TAG).map((r) => r.tag) : []);
const provides = (node: CollectionNode | undefined): MetaRecord[] => (node ? getMeta(node, MetaType.PROVIDES) : []);

describe('findTarget', () => {
  it('starts beside the rule file or at the root', () => {
    const { root, pkgs, source, lib } = fixture();
    expect(findTarget(makeRule(source, '*'))).toBe(pkgs);
    expect(findTarget(makeRule(source, '*', { target: '/' }))).toBe(root);
    expect(findTarget(makeRule(source, '*', { target: '/pkgs/lib-2.0' }))).toBe(lib);
    expect(findTarget(makeRule(source, '*', { target: './lib-2.0/..' }))).toBe(pkgs);
  });

  it('stops at the root when climbing', () => {
    const { root, source } = fixture();
    expect(findTarget(makeRule(source, '*', { target: '../../..' }))).toBe(root);
  });

  it('fails on missing or non-directory segments', () => {
    const { source } = fixture();
    expect(findTarget(makeRule(source, '*', { target: 'nope' }))).toBeNull();
    expect(findTarget(makeRule(source, '*', { target: 'pkg-1.2.txt' }))).toBeNull();
  });
});

describe('DefaultRuleApplier', () => {
  it('registers auto-provides with a captured version only', () => {
    const { pkgs, source } = fixture();
    const rule = makeRule(source, 'pkg-(@).txt', { autoName: new Set(['pkg', 'pkg-compat']) });
    const ok = new DefaultRuleApplier(new RunContext(), new MemoryStatusSink()).apply([rule]);

    expect(ok).toBe(true);
    const versioned = pkgs.children.get('pkg-1.2.txt');
    expect(tags(versioned)).toEqual(['matched']);
    expect(provides(versioned)).toEqual([
      { type: MetaType.PROVIDES, name: 'pkg', version: '1.2' },
      { type: MetaType.PROVIDES, name: 'pkg-compat', version: '1.2' }
    ]);
    const plain = pkgs.children.get('pkg-abc.txt');
    expect(tags(plain)).toEqual(['matched']);
    expect(provides(plain)).toEqual([]);
    expect(rule.users.map(prettyPath)).toEqual(['/pkgs/pkg-1.2.txt', '/pkgs/pkg-abc.txt']);
  });

  it('walks one segment per level and carries a version captured higher up', () => {
    const { lib, source } = fixture();
    const rule = makeRule(source, 'lib-(@)/*.txt', { autoName: new Set(['lib']) });
    new DefaultRuleApplier(new RunContext(), new MemoryStatusSink()).apply([rule]);

    const readme = lib.children.get('readme.txt');
    expect(provides(readme)).toEqual([{ type: MetaType.PROVIDES, name: 'lib', version: '2.0' }]);
    expect(tags(lib)).toEqual([]);
    expect(rule.users.map(prettyPath)).toEqual(['/pkgs/lib-2.0/readme.txt']);
  });

  it('does not let * cross a directory boundary', () => {
    const { source } = fixture();
    const rule = makeRule(source, '*.txt');
    new DefaultRuleApplier(new RunContext(), new MemoryStatusSink()).apply([rule]);
    expect(rule.users.map(prettyPath)).toEqual(['/pkgs/pkg-1.2.txt', '/pkgs/pkg-abc.txt']);
  });

  it('binds to the navigated node when only . and .. remain', () => {
    const { root, pkgs, source } = fixture();
    const up = makeRule(source, '..');
    const here = makeRule(source, '.');
    new DefaultRuleApplier(new RunContext(), new MemoryStatusSink()).apply([up, here]);
    expect(up.users).toHaveLength(1);
    expect(up.users[0]).toBe(root);
    expect(here.users).toHaveLength(1);
    expect(here.users[0]).toBe(pkgs);
    expect(tags(root)).toEqual(['matched']);
  });

  it('matches every comma-separated alternative', () => {
    const { source } = fixture();
    const rule = makeRule(source, 'pkg-abc.txt,lib-2.0/nested/deep.txt');
    new DefaultRuleApplier(new RunContext(), new MemoryStatusSink()).apply([rule]);
    expect(rule.users.map(prettyPath)).toEqual(['/pkgs/pkg-abc.txt', '/pkgs/lib-2.0/nested/deep.txt']);
  });

  it('reports a bad target and continues with the other rules', () => {
    const { source } = fixture();
    const sink = new MemoryStatusSink();
    const bad = makeRule(source, '*', { name: 'broken', target: 'missing' });
    const good = makeRule(source, 'pkg-abc.txt');
    const ok = new DefaultRuleApplier(new RunContext(), sink).apply([bad, good]);

    expect(ok).toBe(false);
    expect(sink.errors).toEqual([{ code: 'BADTARGET', path: '/pkgs/treemeta.ini', message: 'broken: missing' }]);
    expect(good.users).toHaveLength(1);
  });

  it('explains each binding when verbose', () => {
    const { source } = fixture();
    const sink = new MemoryStatusSink();
    new DefaultRuleApplier(new RunContext({ verbose: true }), sink).apply([makeRule(source, 'pkg-abc.txt')]);
    expect(sink.events).toEqual([
      { code: 'META', path: '/pkgs/pkg-abc.txt', message: 'FROM: /pkgs/treemeta.ini:pkg-abc.txt' },
      { code: 'META', path: '/pkgs/pkg-abc.txt', message: '{"type":"tag","tag":"matched"}' }
    ]);
  });
});

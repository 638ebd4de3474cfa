import { describe, expect, it } from 'vitest';
import { Collection } from './Collection.js';
import { createDirectory, createFile, prettyPath } from './node.js';
import { deleteNode, rename, reparent } from './mutate.js';
import { findNearestNode, findNode } from './lookup.js';
import { InvariantError } from '../types/error.js';

function tree() {
  const collection = new Collection('/data');
  const root = collection.rootNode;
  const a = createDirectory(root, 'a');
  const b = createDirectory(a, 'b');
  const deep = createFile(b, 'deep.txt');
  const c = createDirectory(root, 'c');
  const clash = createFile(c, 'b');
  return { collection, root, a, b, deep, c, clash };
}

describe('reparent', () => {
  it('moves a subtree and rewrites every path list', () => {
    const { collection, b, deep, c, clash } = tree();
    rename(clash, 'other');
    collection.dirty = false;

    expect(reparent(b, c)).toBe(true);
    expect(b.parent).toBe(c);
    expect(prettyPath(b)).toBe('/c/b');
    expect(deep.pathList).toEqual(['c', 'b', 'deep.txt']);
    expect(collection.dirty).toBe(true);
  });

  it('refuses to move a node into its own subtree', () => {
    const { collection, a, b } = tree();
    expect(reparent(a, b)).toBe(false);
    expect(reparent(a, a)).toBe(false);
    expect(collection.dirty).toBe(false);
  });

  it('refuses a name collision, a file parent and the root', () => {
    const { root, b, deep, c, a } = tree();
    expect(reparent(b, c)).toBe(false);
    expect(reparent(a, deep)).toBe(false);
    expect(reparent(root, c)).toBe(false);
    expect(b.parent?.name).toBe('a');
  });

  it('throws when the parent belongs to another collection', () => {
    const { b } = tree();
    const other = new Collection('/elsewhere');
    expect(() => reparent(b, other.rootNode)).toThrow(InvariantError);
  });
});

describe('rename', () => {
  it('re-keys the parent and rewrites descendants', () => {
    const { a, b, deep } = tree();
    expect(rename(b, 'renamed')).toBe(true);
    expect(a.children.has('b')).toBe(false);
    expect(a.children.get('renamed')).toBe(b);
    expect(prettyPath(deep)).toBe('/a/renamed/deep.txt');
  });

  it('rejects the root, empty or sibling names', () => {
    const { root, a, c } = tree();
    expect(rename(root, 'x')).toBe(false);
    expect(rename(a, '')).toBe(false);
    expect(rename(a, 'c')).toBe(false);
    expect(rename(a, 'x/y')).toBe(false);
    expect(c.name).toBe('c');
  });
});

describe('deleteNode', () => {
  it('detaches the node', () => {
    const { collection, root, a } = tree();
    expect(deleteNode(a)).toBe(true);
    expect(root.children.has('a')).toBe(false);
    expect(a.parent).toBeNull();
    expect(collection.dirty).toBe(true);
  });

  it('never deletes the root', () => {
    const { collection, root } = tree();
    expect(deleteNode(root)).toBe(false);
    expect(collection.dirty).toBe(false);
  });
});

describe('lookup', () => {
  it('finds exact nodes', () => {
    const { root, deep } = tree();
    expect(findNode(root, ['a', 'b', 'deep.txt'])).toBe(deep);
    expect(findNode(root, [])).toBe(root);
    expect(findNode(root, ['a', 'missing'])).toBeUndefined();
  });

  it('reports the nearest node and the unmatched remainder', () => {
    const { root, b, deep } = tree();
    expect(findNearestNode(root, ['a', 'b', 'x', 'y'])).toEqual({ node: b, remaining: ['x', 'y'] });
    expect(findNearestNode(root, ['a', 'b', 'deep.txt', 'z'])).toEqual({ node: deep, remaining: ['z'] });
  });
});

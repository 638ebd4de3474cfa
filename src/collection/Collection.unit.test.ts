import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { Collection } from './Collection.js';

describe('Collection.normalize', () => {
  const root = path.resolve('/srv/media');
  const collection = new Collection(root);

  it('maps paths relative to the working directory', () => {
    expect(collection.normalize('music/a.mp3', root)).toEqual(['music', 'a.mp3']);
    expect(collection.normalize('a.mp3', path.join(root, 'music'))).toEqual(['music', 'a.mp3']);
    expect(collection.normalize('../video', path.join(root, 'music'))).toEqual(['video']);
  });

  it('maps the root itself to an empty list', () => {
    expect(collection.normalize('.', root)).toEqual([]);
    expect(collection.normalize(root, '/')).toEqual([]);
  });

  it('rejects paths outside the root', () => {
    expect(collection.normalize('..', root)).toBeNull();
    expect(collection.normalize('/srv/other/file', root)).toBeNull();
    expect(collection.normalize('/srv/media-old', root)).toBeNull();
  });
});

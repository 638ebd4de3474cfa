import path from 'node:path';
import { Collection } from '../collection/Collection.js';

export interface InitOptions {
  /** Directory holding the manifest. */
  manifestDir: string;
  manifestName: string;
  /** Root as recorded in the manifest, relative to `manifestDir`. */
  autoRoot?: string;
}

/** A fresh, dirty collection that ignores its own manifest and rotated backups. */
export function createCollection(options: InitOptions): Collection {
  const autoRoot = options.autoRoot ?? '.';
  const collection = new Collection(path.resolve(options.manifestDir, autoRoot));
  collection.autoRoot = autoRoot;
  collection.rootNode.ignorePatterns = [options.manifestName, `${options.manifestName}.*bak`];
  collection.dirty = true;
  return collection;
}

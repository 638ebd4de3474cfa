import type { Collection } from '../collection/Collection.js';

export interface ManifestStore {
  /** Null when the file is missing, unreadable or not a manifest. */
  load(file: string): Promise<Collection | null>;
  save(collection: Collection, file: string): Promise<void>;
}

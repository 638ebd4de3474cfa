import type { CollectionNode } from '../types/node.js';
import { MetaType, type MetaOf, type MetaRecord } from '../types/meta.js';

const KNOWN_TYPES = new Set<string>([
  MetaType.PROVIDES,
  MetaType.DEPENDS,
  MetaType.TAG,
  MetaType.DESCRIPTION,
  MetaType.IGNORE
]);

export function metaTypeName(record: MetaRecord): string {
  return record.type === MetaType.OPAQUE ? record.typeName : record.type;
}

/** Flat attribute form used by the manifest document. Always carries `type`. */
export function metaAttributes(record: MetaRecord): Record<string, string> {
  switch (record.type) {
    case MetaType.PROVIDES:
      return { type: record.type, name: record.name, version: record.version };
    case MetaType.DEPENDS:
      return { type: record.type, name: record.name, minversion: record.minVersion, maxversion: record.maxVersion };
    case MetaType.TAG:
      return { type: record.type, tag: record.tag };
    case MetaType.DESCRIPTION:
      return { type: record.type, description: record.description };
    case MetaType.IGNORE:
      return { type: record.type, pattern: record.pattern };
    case MetaType.OPAQUE:
      return { ...record.attributes, type: record.typeName };
  }
}

export function metaFromAttributes(attributes: Record<string, string>): MetaRecord {
  const typeName = attributes.type ?? '';
  const get = (key: string) => attributes[key] ?? '';
  if (!KNOWN_TYPES.has(typeName)) {
    const rest: Record<string, string> = {};
    for (const [key, value] of Object.entries(attributes)) {
      if (key !== 'type') rest[key] = value;
    }
    return { type: MetaType.OPAQUE, typeName, attributes: rest };
  }
  switch (typeName) {
    case MetaType.PROVIDES:
      return { type: MetaType.PROVIDES, name: get('name'), version: get('version') };
    case MetaType.DEPENDS:
      return { type: MetaType.DEPENDS, name: get('name'), minVersion: get('minversion'), maxVersion: get('maxversion') };
    case MetaType.TAG:
      return { type: MetaType.TAG, tag: get('tag') };
    case MetaType.DESCRIPTION:
      return { type: MetaType.DESCRIPTION, description: get('description') };
    default:
      return { type: MetaType.IGNORE, pattern: get('pattern') };
  }
}

/** Canonical identity of a record; equal records collapse to one entry. */
export function metaKey(record: MetaRecord): string {
  const entries = Object.entries(metaAttributes(record)).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

export function uniqueMeta(records: Iterable<MetaRecord>): MetaRecord[] {
  const seen = new Map<string, MetaRecord>();
  for (const record of records) seen.set(metaKey(record), record);
  return Array.from(seen.values());
}

export function addMeta(node: CollectionNode, record: MetaRecord): void {
  const typeName = metaTypeName(record);
  let records = node.meta.get(typeName);
  if (!records) {
    records = new Map();
    node.meta.set(typeName, records);
  }
  records.set(metaKey(record), record);
}

function isMetaOf<T extends MetaType>(type: T) {
  return (record: MetaRecord): record is MetaOf<T> => record.type === type;
}

/** Records of one type, or all records ordered by type name when no type is given. */
export function getMeta<T extends MetaType>(node: CollectionNode, type: T): MetaOf<T>[];
export function getMeta(node: CollectionNode): MetaRecord[];
export function getMeta(node: CollectionNode, type?: MetaType): MetaRecord[] {
  if (type === MetaType.OPAQUE) {
    // opaque records are filed under their own type names
    return getMeta(node).filter(isMetaOf(type));
  }
  if (type !== undefined) {
    return Array.from(node.meta.get(type)?.values() ?? []).filter(isMetaOf(type));
  }
  const out: MetaRecord[] = [];
  for (const typeName of Array.from(node.meta.keys()).sort()) {
    out.push(...(node.meta.get(typeName)?.values() ?? []));
  }
  return out;
}

export function hasMeta(node: CollectionNode): boolean {
  return node.meta.size > 0;
}

export function clearMeta(node: CollectionNode): void {
  node.meta = new Map();
}

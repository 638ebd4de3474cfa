import fsp from 'node:fs/promises';
import path from 'node:path';
import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import type { ManifestStore } from '../ManifestStore.js';
import type { CollectionNode, DirectoryNode } from '../../types/node.js';
import { NodeKind } from '../../types/enums.js';
import { InvariantError, ManifestError } from '../../types/error.js';
import { Collection } from '../../collection/Collection.js';
import { createDirectory, createFile, createSymlink, sortedChildren } from '../../collection/node.js';
import { addMeta, getMeta, metaAttributes, metaFromAttributes, metaKey } from '../../collection/meta.js';
import { isMissingError } from '../../utils/fs.js';

const ATTR = '@_';
const ROOT_TAG = 'collection';
const CHILD_TAGS = ['directory', 'file', 'symlink'] as const;

type XmlElement = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  parseAttributeValue: false,
  parseTagValue: false,
  // names and targets may start or end with spaces
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && (name === 'meta' || CHILD_TAGS.some((tag) => tag === name))
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR,
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true
});

function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Elements of one tag under `parent`. An element with neither attributes nor children parses to "". */
function elements(parent: XmlElement, tag: string): XmlElement[] {
  const value = parent[tag];
  if (value === undefined) return [];
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.map((item) => (isElement(item) ? item : {}));
}

function attributes(element: XmlElement): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(element)) {
    if (key.startsWith(ATTR) && typeof value === 'string') out[key.slice(ATTR.length)] = value;
  }
  return out;
}

function integerAttr(value: string | undefined): number {
  if (value === undefined) return -1;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? -1 : parsed;
}

function loadMeta(node: CollectionNode, element: XmlElement): void {
  for (const meta of elements(element, 'meta')) addMeta(node, metaFromAttributes(attributes(meta)));
}

function loadDirectory(dir: DirectoryNode, element: XmlElement): void {
  dir.ignorePatterns = (attributes(element).ignore ?? '').split(',').filter((pattern) => pattern !== '');
  loadMeta(dir, element);

  for (const child of elements(element, 'directory')) {
    const node = createDirectory(dir, attributes(child).name ?? '');
    loadDirectory(node, child);
  }
  for (const child of elements(element, 'file')) {
    const attrs = attributes(child);
    const node = createFile(dir, attrs.name ?? '', {
      size: integerAttr(attrs.size),
      timestamp: integerAttr(attrs.timestamp),
      checksum: attrs.checksum ?? ''
    });
    loadMeta(node, child);
  }
  for (const child of elements(element, 'symlink')) {
    const attrs = attributes(child);
    const node = createSymlink(dir, attrs.name ?? '', attrs.target ?? '');
    loadMeta(node, child);
  }
}

function prefixed(attrs: Record<string, string>): XmlElement {
  const out: XmlElement = {};
  for (const [key, value] of Object.entries(attrs)) out[`${ATTR}${key}`] = value;
  return out;
}

/** One element in the builder's ordered form: `{ tag: [children], ':@': attributes }`. */
function ordered(tag: string, attrs: Record<string, string>, children: XmlElement[] = []): XmlElement {
  return { [tag]: children, ':@': prefixed(attrs) };
}

function metaElements(node: CollectionNode): XmlElement[] {
  // getMeta orders by type; within a type order by canonical key
  return getMeta(node)
    .map((record) => ({ key: `${metaAttributes(record).type}\u0000${metaKey(record)}`, record }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(({ record }) => ordered('meta', metaAttributes(record)));
}

function ignoreAttr(dir: DirectoryNode): Record<string, string> {
  return dir.ignorePatterns.length > 0 ? { ignore: dir.ignorePatterns.join(',') } : {};
}

/** Metadata first, then every child in name order whatever its kind. */
function directoryContent(dir: DirectoryNode): XmlElement[] {
  return [...metaElements(dir), ...sortedChildren(dir).map(childElement)];
}

function childElement(child: CollectionNode): XmlElement {
  switch (child.kind) {
    case NodeKind.DIR:
      return ordered('directory', { name: child.name, ...ignoreAttr(child) }, directoryContent(child));
    case NodeKind.FILE:
      return ordered(
        'file',
        { name: child.name, size: String(child.size), timestamp: String(child.timestamp), checksum: child.checksum },
        metaElements(child)
      );
    case NodeKind.SYMLINK:
      return ordered('symlink', { name: child.name, target: child.target }, metaElements(child));
  }
}

/** Build a collection from manifest text. Throws ManifestError when the document is not a manifest. */
export function parseManifest(text: string, file: string): Collection {
  let document: unknown;
  try {
    document = parser.parse(text, true);
  } catch (err) {
    throw new ManifestError(file, err instanceof Error ? err.message : String(err));
  }
  if (!isElement(document) || !(ROOT_TAG in document)) {
    throw new ManifestError(file, `Root element is not <${ROOT_TAG}>`);
  }
  const rootElement = elements(document, ROOT_TAG)[0] ?? {};
  const autoRoot = attributes(rootElement).root || '.';

  const collection = new Collection(path.resolve(path.dirname(file), autoRoot));
  collection.autoRoot = autoRoot;
  try {
    loadDirectory(collection.rootNode, rootElement);
  } catch (err) {
    if (err instanceof InvariantError) throw new ManifestError(file, err.message);
    throw err;
  }
  return collection;
}

export function serializeManifest(collection: Collection): string {
  const root = collection.rootNode;
  const text = builder.build([
    ordered('?xml', { version: '1.0', encoding: 'utf-8' }, [{ '#text': '' }]),
    ordered(ROOT_TAG, { root: collection.autoRoot || '.', ...ignoreAttr(root) }, directoryContent(root))
  ]);
  return `${text}\n`;
}

export class XmlManifestStore implements ManifestStore {
  /** Like `load`, but says why the file is not usable. Missing files yield null. */
  async read(file: string): Promise<Collection | null> {
    let text: string;
    try {
      text = await fsp.readFile(file, 'utf8');
    } catch (err) {
      if (isMissingError(err)) return null;
      throw err;
    }
    return parseManifest(text, file);
  }

  async load(file: string): Promise<Collection | null> {
    try {
      return await this.read(file);
    } catch (err) {
      if (err instanceof ManifestError) return null;
      throw err;
    }
  }

  /** Write beside the target, then rename over it, so a reader never sees a partial manifest. */
  async save(collection: Collection, file: string): Promise<void> {
    const tmp = `${file}.tmp`;
    await fsp.writeFile(tmp, serializeManifest(collection), 'utf8');
    await fsp.rename(tmp, file);
  }
}

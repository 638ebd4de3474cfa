export enum MetaType {
  PROVIDES = 'provides',
  DEPENDS = 'depends',
  TAG = 'tag',
  DESCRIPTION = 'description',
  IGNORE = 'ignore',
  OPAQUE = 'opaque'
}

/** A package offered by a node. An empty `version` is a versionless provide. */
export interface ProvidesMeta {
  type: MetaType.PROVIDES;
  name: string;
  version: string;
}

/** A package required by a node. Empty bounds are unbounded. */
export interface DependsMeta {
  type: MetaType.DEPENDS;
  name: string;
  minVersion: string;
  maxVersion: string;
}

export interface TagMeta {
  type: MetaType.TAG;
  tag: string;
}

export interface DescriptionMeta {
  type: MetaType.DESCRIPTION;
  description: string;
}

export interface IgnoreMeta {
  type: MetaType.IGNORE;
  pattern: string;
}

/** Metadata of a type this version does not know; kept as raw attributes so it survives a save. */
export interface OpaqueMeta {
  type: MetaType.OPAQUE;
  typeName: string;
  attributes: Record<string, string>;
}

export type MetaRecord = ProvidesMeta | DependsMeta | TagMeta | DescriptionMeta | IgnoreMeta | OpaqueMeta;

export type MetaOf<T extends MetaType> = Extract<MetaRecord, { type: T }>;

/** Type name -> canonical record key -> record. */
export type MetaMap = Map<string, Map<string, MetaRecord>>;

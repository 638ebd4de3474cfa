export const DEFAULT_MANIFEST_NAME = 'treeledger.xml';
export const RULE_FILE_NAME = 'treemeta.ini';
export const RULE_FILE_EXTENSION = '.ini';
export const RULE_OPTIONS_SECTION = 'treeledger:meta';
export const VERSION_PLACEHOLDER = '(@)';

// Seconds; absorbs filesystem timestamp granularity and copy jitter.
export const TIMESTAMP_TOLERANCE_SECONDS = 2;
export const CHECKSUM_CHUNK_SIZE = 4_096_000;

export const DEFAULT_BACKUP_COUNT = 5;
export const MAX_BACKUP_COUNT = 9;

export const MD5SUMS_FILE_NAME = 'md5sums.txt';
export const INFO_FILE_NAME = 'info.txt';
export const DESCRIPTION_WRAP_WIDTH = 75;

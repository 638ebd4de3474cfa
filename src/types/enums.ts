export enum NodeKind {
  SYMLINK = 'SYMLINK',
  FILE = 'FILE',
  DIR = 'DIR'
}

export enum StatusCode {
  // drift and reconciliation
  MISSING = 'MISSING',
  NEW = 'NEW',
  SYMLINK = 'SYMLINK',
  TIMESTAMP = 'TIMESTAMP',
  SIZE = 'SIZE',
  CHECKSUM = 'CHECKSUM',
  SHOULDIGNORE = 'SHOULDIGNORE',
  DELETED = 'DELETED',
  IGNORED = 'IGNORED',
  ADDED = 'ADDED',
  PROCESSING = 'PROCESSING',
  SKIPPED = 'SKIPPED',

  // structural operations
  WORKPATH = 'WORKPATH',
  BADPATH = 'BADPATH',
  NONODE = 'NONODE',
  EXISTS = 'EXISTS',
  NOTDIRECTORY = 'NOTDIRECTORY',
  NOTEXIST = 'NOTEXIST',
  NOPARENTS = 'NOPARENTS',
  MOVE = 'MOVE',
  NOMOVE = 'NOMOVE',
  RENAME = 'RENAME',
  NORENAME = 'NORENAME',
  DELETE = 'DELETE',
  NODELETE = 'NODELETE',

  // metadata
  LOADING = 'LOADING',
  LOADERROR = 'LOADERROR',
  NOTMETAINFO = 'NOTMETAINFO',
  BADTARGET = 'BADTARGET',
  META = 'META',
  UNUSEDMETA = 'UNUSEDMETA',
  DEPENDS = 'DEPENDS',

  // queries and export
  FINDTAG = 'FINDTAG',
  FINDDESC = 'FINDDESC',
  FINDPATH = 'FINDPATH',
  BADPATTERN = 'BADPATTERN',
  MISSINGCHECKSUM = 'MISSINGCHECKSUM',
  EXPORT = 'EXPORT',

  // program
  INIT = 'INIT',
  NOFILE = 'NOFILE',
  NOTMANIFEST = 'NOTMANIFEST',
  COLLECTION = 'COLLECTION',
  ROOT = 'ROOT',
  CHDIR = 'CHDIR',
  FATAL = 'FATAL'
}

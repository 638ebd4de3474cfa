import fs from 'node:fs';
import { createHash } from 'node:crypto';
import { CHECKSUM_CHUNK_SIZE } from '../config.js';
import { OperationAbortedError } from '../types/error.js';

export type ChecksumFn = (osPath: string, signal?: AbortSignal) => Promise<string>;

/** Lowercase hex MD5 of a file, read in fixed-size chunks. */
export const md5File: ChecksumFn = async (osPath, signal) => {
  const hash = createHash('md5');
  const stream = fs.createReadStream(osPath, { highWaterMark: CHECKSUM_CHUNK_SIZE });
  try {
    for await (const chunk of stream) {
      if (signal?.aborted) throw new OperationAbortedError();
      if (Buffer.isBuffer(chunk)) hash.update(chunk);
    }
  } finally {
    stream.destroy();
  }
  return hash.digest('hex');
};

import fs from 'node:fs';
import crypto from 'node:crypto';
import { FileHashError, ValidationError } from '../errors';
import type { Hasher, HasherFn } from '../../interfaces/file-walker';

const CHUNK_SIZE = 64 * 1024;

export const DEFAULT_ALGORITHM = 'sha256';

export const defaultHasherFn: HasherFn = () =>
  crypto.createHash(DEFAULT_ALGORITHM);

/**
 * Builds a hasher factory for any algorithm the crypto module supports.
 */
export function createHasherFn(algorithm: string): HasherFn {
  const supported = crypto.getHashes();
  const name = [algorithm, algorithm.toLowerCase()].find((candidate) =>
    supported.includes(candidate),
  );
  if (name === undefined) {
    throw new ValidationError(`Unsupported hash algorithm: ${algorithm}`);
  }
  return () => crypto.createHash(name);
}

/**
 * Streams a file through the hasher and returns the lowercase hex digest.
 * The descriptor is closed before returning or throwing.
 */
export function hashFileSync(
  filePath: string,
  hasher: Hasher = defaultHasherFn(),
): string {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    throw new FileHashError(filePath, error);
  }

  try {
    const buffer = Buffer.alloc(CHUNK_SIZE);
    let bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
    while (bytesRead > 0) {
      hasher.update(buffer.subarray(0, bytesRead));
      bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null);
    }
  } catch (error) {
    throw new FileHashError(filePath, error);
  } finally {
    fs.closeSync(fd);
  }

  return Buffer.from(hasher.digest()).toString('hex');
}

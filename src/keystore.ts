import { readFile } from 'node:fs/promises';
import _sodium from 'libsodium-wrappers-sumo';
import { errorMessage, KeyIOError } from './errors';
import { isMissingFileError, writeFileAtomic } from './utils';

export const MASTER_KEY_BYTES = 32;

export type MasterKey = Uint8Array;

/**
 * Reads the master key from `keyFile`. Returns `null` when the file is absent
 * or does not hold exactly {@link MASTER_KEY_BYTES} bytes; any other read
 * failure raises {@link KeyIOError}.
 */
export const readMasterKey = async (keyFile: string): Promise<MasterKey | null> => {
  let raw: Buffer;
  try {
    raw = await readFile(keyFile);
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    // an existing key that cannot be read right now must not be replaced
    throw new KeyIOError(`Failed to read master key at ${keyFile}: ${errorMessage(error)}`, error);
  }

  if (raw.length !== MASTER_KEY_BYTES) {
    console.warn(`Ignoring master key at ${keyFile}: ${raw.length} bytes, expected ${MASTER_KEY_BYTES}.`);
    return null;
  }

  return new Uint8Array(raw);
};

export const generateMasterKey = async (keyFile: string): Promise<MasterKey> => {
  await _sodium.ready;
  const sodium = _sodium;

  const key = sodium.randombytes_buf(MASTER_KEY_BYTES);
  try {
    await writeFileAtomic(keyFile, key);
  } catch (error) {
    throw new KeyIOError(`Failed to write master key to ${keyFile}: ${errorMessage(error)}`, error);
  }
  return key;
};

/**
 * Loads the master key, or generates and persists a fresh one when the key
 * file is missing or has the wrong length. Records sealed under a replaced key
 * are lost.
 */
export const loadOrGenerate = async (keyFile: string): Promise<MasterKey> => {
  const existing = await readMasterKey(keyFile);
  if (existing) {
    return existing;
  }
  return generateMasterKey(keyFile);
};

import _sodium from 'libsodium-wrappers-sumo';
import { AuthenticationError, FormatError } from './errors';
import { MASTER_KEY_BYTES, type MasterKey } from './keystore';

// ChaCha20-Poly1305, IETF variant
export const NONCE_BYTES = 12;
export const TAG_BYTES = 16;

/** base64(nonce ‖ ciphertext ‖ tag) */
export type EncryptedRecord = string;

const assertKey = (key: MasterKey) => {
  if (key.length !== MASTER_KEY_BYTES) {
    throw new FormatError(`Master key must be ${MASTER_KEY_BYTES} bytes, got ${key.length}`);
  }
};

export const seal = async (
  plaintext: string | Uint8Array,
  key: MasterKey,
  associatedData?: string
): Promise<EncryptedRecord> => {
  assertKey(key);
  await _sodium.ready;
  const sodium = _sodium;

  const message = typeof plaintext === 'string' ? new TextEncoder().encode(plaintext) : plaintext;
  const nonce = sodium.randombytes_buf(NONCE_BYTES);
  const ciphertext = sodium.crypto_aead_chacha20poly1305_ietf_encrypt(
    message,
    associatedData ?? null,
    null,
    nonce,
    key
  );

  const envelope = new Uint8Array(NONCE_BYTES + ciphertext.length);
  envelope.set(nonce, 0);
  envelope.set(ciphertext, NONCE_BYTES);

  return sodium.to_base64(envelope, sodium.base64_variants.ORIGINAL);
};

export const open = async (record: EncryptedRecord, key: MasterKey, associatedData?: string): Promise<Uint8Array> => {
  assertKey(key);
  await _sodium.ready;
  const sodium = _sodium;

  let envelope: Uint8Array;
  try {
    envelope = sodium.from_base64(record.trim(), sodium.base64_variants.ORIGINAL);
  } catch (error) {
    throw new FormatError('Encrypted record is not valid base64', error);
  }

  if (envelope.length < NONCE_BYTES) {
    throw new FormatError(`Encrypted record is ${envelope.length} bytes, too short for a ${NONCE_BYTES}-byte nonce`);
  }

  const nonce = envelope.subarray(0, NONCE_BYTES);
  const ciphertext = envelope.subarray(NONCE_BYTES);

  // no complete tag: nothing to verify against
  if (ciphertext.length < TAG_BYTES) {
    throw new AuthenticationError();
  }

  try {
    return sodium.crypto_aead_chacha20poly1305_ietf_decrypt(null, ciphertext, associatedData ?? null, nonce, key);
  } catch {
    throw new AuthenticationError();
  }
};

export const openText = async (record: EncryptedRecord, key: MasterKey, associatedData?: string): Promise<string> => {
  const opened = await open(record, key, associatedData);
  return Buffer.from(opened).toString('utf-8');
};

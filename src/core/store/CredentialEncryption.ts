// src/core/store/CredentialEncryption.ts

import * as crypto from 'crypto';
import { SDKError } from '../../utils/errors';

const FORMAT_VERSION = 'v1';
const KEY_PATTERN = /^[0-9a-f]{64}$/i;

interface EncryptionKey {
  id: string;
  material: Buffer;
}

/**
 * AES-256-GCM encryption of stored credential values.
 *
 * Ciphertext format: `v1:<keyId>:<iv>:<authTag>:<ciphertext>` (hex parts).
 * The key id is derived from the key itself, so values written under a
 * rotated-out key stay readable while it is listed in `previousKeys`.
 */
export class CredentialEncryption {
  private currentKey: EncryptionKey;
  private keys: Map<string, EncryptionKey> = new Map();

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = this.parseKey(currentKey, 'Encryption key');
    this.keys.set(this.currentKey.id, this.currentKey);

    for (const previous of previousKeys) {
      const key = this.parseKey(previous, 'Previous encryption keys');
      this.keys.set(key.id, key);
    }
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey.material, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return [
      FORMAT_VERSION,
      this.currentKey.id,
      iv.toString('hex'),
      authTag.toString('hex'),
      ciphertext.toString('hex'),
    ].join(':');
  }

  decrypt(encrypted: string): string {
    const parts = encrypted.split(':');
    if (parts.length !== 5 || parts[0] !== FORMAT_VERSION) {
      throw new SDKError('Unrecognized encrypted value format', 'DECRYPTION_FAILED');
    }

    const [, keyId, ivHex, tagHex, ciphertextHex] = parts;
    const key = this.keys.get(keyId);
    if (!key) {
      throw new SDKError('Value was encrypted with an unknown key', 'DECRYPTION_FAILED', { keyId });
    }

    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', key.material, Buffer.from(ivHex, 'hex'));
      decipher.setAuthTag(Buffer.from(tagHex, 'hex'));
      return Buffer.concat([
        decipher.update(Buffer.from(ciphertextHex, 'hex')),
        decipher.final(),
      ]).toString('utf8');
    } catch (error) {
      throw new SDKError('Failed to decrypt stored value', 'DECRYPTION_FAILED', { keyId, cause: error });
    }
  }

  private parseKey(hex: string, label: string): EncryptionKey {
    if (!KEY_PATTERN.test(hex)) {
      throw new SDKError(
        `${label} must be a 32-byte hex string (64 hexadecimal characters)`,
        'ENCRYPTION_CONFIG_ERROR'
      );
    }
    const material = Buffer.from(hex, 'hex');
    const id = crypto.createHash('sha256').update(material).digest('hex').slice(0, 8);
    return { id, material };
  }
}

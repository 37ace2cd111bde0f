import { describe, it, expect } from 'vitest';
import { CredentialEncryption } from '../../src/core/store/CredentialEncryption';
import { SDKError } from '../../src/utils/errors';

const KEY_A = 'a'.repeat(64);
const KEY_B = 'b'.repeat(64);

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof SDKError ? error.code : undefined;
  }
  return undefined;
}

describe('CredentialEncryption', () => {
  it('should round-trip a value', () => {
    const encryption = new CredentialEncryption(KEY_A);
    const encrypted = encryption.encrypt('{"accessToken":"test-access-token"}');

    expect(encryption.decrypt(encrypted)).toBe('{"accessToken":"test-access-token"}');
  });

  it('should write the versioned five-part format', () => {
    const encrypted = new CredentialEncryption(KEY_A).encrypt('value');
    const parts = encrypted.split(':');

    expect(parts).toHaveLength(5);
    expect(parts[0]).toBe('v1');
    expect(parts[1]).toMatch(/^[0-9a-f]{8}$/);
    expect(parts[2]).toHaveLength(24); // 12-byte IV
  });

  it('should use a fresh IV for every encryption', () => {
    const encryption = new CredentialEncryption(KEY_A);

    expect(encryption.encrypt('same')).not.toBe(encryption.encrypt('same'));
  });

  it('should reject keys that are not 32-byte hex', () => {
    expect(() => new CredentialEncryption('short')).toThrow('must be a 32-byte hex string');
    expect(codeOf(() => new CredentialEncryption('z'.repeat(64)))).toBe('ENCRYPTION_CONFIG_ERROR');
    expect(codeOf(() => new CredentialEncryption(KEY_A, ['nope']))).toBe('ENCRYPTION_CONFIG_ERROR');
  });

  it('should decrypt values written under a previous key', () => {
    const encrypted = new CredentialEncryption(KEY_A).encrypt('rotated');
    const rotated = new CredentialEncryption(KEY_B, [KEY_A]);

    expect(rotated.decrypt(encrypted)).toBe('rotated');
  });

  it('should refuse values from an unknown key', () => {
    const encrypted = new CredentialEncryption(KEY_A).encrypt('secret');

    expect(codeOf(() => new CredentialEncryption(KEY_B).decrypt(encrypted))).toBe('DECRYPTION_FAILED');
  });

  it('should detect tampering', () => {
    const encryption = new CredentialEncryption(KEY_A);
    const parts = encryption.encrypt('secret').split(':');
    parts[4] = parts[4].startsWith('0') ? `1${parts[4].slice(1)}` : `0${parts[4].slice(1)}`;

    expect(codeOf(() => encryption.decrypt(parts.join(':')))).toBe('DECRYPTION_FAILED');
  });

  it('should refuse unrecognized formats', () => {
    expect(codeOf(() => new CredentialEncryption(KEY_A).decrypt('plain-json'))).toBe('DECRYPTION_FAILED');
  });
});

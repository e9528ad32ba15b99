import { randomBytes, createCipheriv, createDecipheriv, scryptSync } from 'crypto';
import { GitAuthSchema, type GitAuth, type GitAuthType } from '@dockhand/shared';
import { getOrCreateSetting, type Db } from '../db/index.js';
import { DecryptionError, ValidationError } from '../lib/errors.js';
import { vaultLogger } from '../lib/logger.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;
const TAG_LENGTH = 16;
const SALT_LENGTH = 32;
const ENCRYPTION_SALT_KEY = 'encryption_salt';

const AUTH_TYPES: readonly GitAuthType[] = ['http', 'ssh'];

export interface KeyValidationResult {
  valid: boolean;
  format: 'base64' | 'hex' | 'raw' | 'invalid';
  warning?: string;
  error?: string;
}

export interface EncryptedGitAuth {
  authType: GitAuthType;
  ciphertext: string;
}

/**
 * Validate the format of an encryption key.
 * Accepts:
 * - Base64 format: 44 characters that decode to 32 bytes
 * - Hex format: 64 hex characters (32 bytes)
 * - Raw string: 32+ characters (with warning about entropy)
 */
export function validateKeyFormat(key: string): KeyValidationResult {
  if (key.length === 0) {
    return { valid: false, format: 'invalid', error: 'Key is empty' };
  }

  if (key.length === 44 && /^[A-Za-z0-9+/]+=*$/.test(key) && Buffer.from(key, 'base64').length === 32) {
    return { valid: true, format: 'base64' };
  }

  if (key.length === 64 && /^[0-9a-fA-F]+$/.test(key)) {
    return { valid: true, format: 'hex' };
  }

  if (key.length >= 32) {
    const charTypes = [/[a-z]/, /[A-Z]/, /[0-9]/, /[^a-zA-Z0-9]/].filter((pattern) => pattern.test(key)).length;
    if (charTypes < 3) {
      return {
        valid: true,
        format: 'raw',
        warning: 'Encryption key has low entropy. Consider using: openssl rand -base64 32',
      };
    }
    return { valid: true, format: 'raw' };
  }

  return {
    valid: false,
    format: 'invalid',
    error:
      `Encryption key must be at least 32 characters. Got ${key.length} characters. ` +
      'Generate one with: openssl rand -base64 32',
  };
}

function isAuthType(value: string): value is GitAuthType {
  return AUTH_TYPES.some((type) => type === value);
}

function payloadOf(auth: GitAuth): Record<string, string> {
  return auth.type === 'http'
    ? { username: auth.username, password: auth.password }
    : { privateKey: auth.privateKey, user: auth.user };
}

/**
 * Encrypts Git credentials at rest with AES-256-GCM.
 *
 * Tokens are `iv:tag:ciphertext`, base64 throughout. The primary key is
 * always used to encrypt; previous keys are only tried on decrypt so that
 * stored credentials keep loading during a key rotation.
 */
export class CredentialVault {
  private keys: Buffer[];

  constructor(secrets: { primary: string; previous?: string[] }, salt: Buffer) {
    const all = [secrets.primary, ...(secrets.previous ?? [])];
    this.keys = all.map((secret, index) => {
      const validation = validateKeyFormat(secret);
      if (!validation.valid) {
        const label = index === 0 ? 'Encryption key' : `Previous encryption key #${index}`;
        throw new ValidationError(`${label} is invalid: ${validation.error}`);
      }
      if (validation.warning) {
        vaultLogger.warn({ keyIndex: index }, validation.warning);
      }
      return scryptSync(secret, salt, 32);
    });
    vaultLogger.info({ keys: this.keys.length }, 'Credential vault ready');
  }

  /**
   * Build a vault whose salt is stored in the database, generating the
   * salt on first start of an installation.
   */
  static fromDatabase(db: Db, secrets: { primary: string; previous?: string[] }): CredentialVault {
    const saltB64 = getOrCreateSetting(db, ENCRYPTION_SALT_KEY, () => randomBytes(SALT_LENGTH).toString('base64'));
    return new CredentialVault(secrets, Buffer.from(saltB64, 'base64'));
  }

  private primaryKey(): Buffer {
    const [primary] = this.keys;
    if (!primary) {
      throw new DecryptionError('Credential vault keys have been cleared');
    }
    return primary;
  }

  encryptString(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.primaryKey(), iv, { authTagLength: TAG_LENGTH });
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return `${iv.toString('base64')}:${tag.toString('base64')}:${encrypted.toString('base64')}`;
  }

  /**
   * Returns the plaintext and the index of the key that opened it.
   */
  private open(token: string): { plaintext: string; keyIndex: number } {
    const parts = token.split(':');
    if (parts.length !== 3) {
      throw new DecryptionError('Invalid encrypted data format');
    }
    const [ivB64, tagB64, dataB64] = parts;
    const iv = Buffer.from(ivB64, 'base64');
    const tag = Buffer.from(tagB64, 'base64');
    if (iv.length !== IV_LENGTH || tag.length !== TAG_LENGTH) {
      throw new DecryptionError('Invalid encrypted data format');
    }
    const encrypted = Buffer.from(dataB64, 'base64');

    if (this.keys.length === 0) {
      throw new DecryptionError('Credential vault keys have been cleared');
    }

    for (const [keyIndex, key] of this.keys.entries()) {
      try {
        const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
        decipher.setAuthTag(tag);
        const decrypted = Buffer.concat([decipher.update(encrypted), decipher.final()]);
        try {
          return { plaintext: decrypted.toString('utf8'), keyIndex };
        } finally {
          decrypted.fill(0);
        }
      } catch (err) {
        vaultLogger.trace({ keyIndex, err }, 'Key did not authenticate token');
      }
    }

    throw new DecryptionError('Encrypted data could not be authenticated with any configured key');
  }

  decryptString(token: string): string {
    return this.open(token).plaintext;
  }

  encrypt(auth: GitAuth | null): EncryptedGitAuth | null {
    if (!auth) {
      return null;
    }
    return { authType: auth.type, ciphertext: this.encryptString(JSON.stringify(payloadOf(auth))) };
  }

  /**
   * @throws DecryptionError for an unknown type, a malformed or unauthenticated
   * token, or a payload that does not match the declared type
   */
  decrypt(authType: string, ciphertext: string): GitAuth {
    if (!isAuthType(authType)) {
      throw new DecryptionError(`Unknown git auth type: ${authType}`);
    }

    const plaintext = this.decryptString(ciphertext);
    let payload: unknown;
    try {
      payload = JSON.parse(plaintext);
    } catch (err) {
      throw new DecryptionError('Decrypted credentials are not valid JSON', { cause: err });
    }
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new DecryptionError(`Decrypted credentials do not match auth type ${authType}`);
    }

    const result = GitAuthSchema.safeParse({ ...payload, type: authType });
    if (!result.success) {
      throw new DecryptionError(`Decrypted credentials do not match auth type ${authType}`);
    }
    return result.data;
  }

  /** True when the token opens only with a previous key. */
  needsRotation(token: string): boolean {
    return this.open(token).keyIndex > 0;
  }

  /** Re-encrypt a token under the primary key. */
  rotate(token: string): string {
    return this.encryptString(this.decryptString(token));
  }

  /**
   * Zero the derived keys. Called during graceful shutdown.
   */
  clearKeys(): void {
    for (const key of this.keys) {
      key.fill(0);
    }
    this.keys = [];
    vaultLogger.debug('Encryption keys cleared from memory');
  }
}

import crypto from 'node:crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const VERSION_PREFIX = 'v1:';

/**
 * AES-256-GCM envelope for secrets kept at rest (TOTP seeds). Output is
 * `v1:` followed by base64 of iv | tag | ciphertext.
 */
export class SecretBox {
  private readonly key: Buffer;

  constructor(keyBase64: string) {
    const key = Buffer.from(keyBase64, 'base64');
    if (key.length !== 32) {
      throw new Error('TOTP_ENCRYPTION_KEY must decode to 32 bytes');
    }
    this.key = key;
  }

  seal(plainText: string) {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plainText, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();
    return VERSION_PREFIX + Buffer.concat([iv, authTag, encrypted]).toString('base64');
  }

  open(payload: string) {
    if (!payload.startsWith(VERSION_PREFIX)) {
      throw new Error('Unsupported encrypted payload version');
    }

    const buffer = Buffer.from(payload.slice(VERSION_PREFIX.length), 'base64');
    if (buffer.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new Error('Encrypted payload is too short');
    }

    const iv = buffer.subarray(0, IV_LENGTH);
    const authTag = buffer.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const ciphertext = buffer.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    const decipher = crypto.createDecipheriv(ALGORITHM, this.key, iv);
    decipher.setAuthTag(authTag);

    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  }
}

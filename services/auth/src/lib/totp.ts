import crypto from 'node:crypto';

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
const TOTP_PATTERN = /^[0-9]{6}$/;

export const TOTP_STEP_SECONDS = 30;
export const TOTP_DIGITS = 6;
export const TOTP_SKEW_STEPS = 1;
export const BACKUP_CODE_COUNT = 10;

export interface TotpOptions {
  stepSeconds?: number;
  digits?: number;
  window?: number;
  timestamp?: number;
}

/** 160-bit secret, the size RFC 4226 recommends for HMAC-SHA1. */
export function createTotpSecret(sizeBytes = 20) {
  return base32Encode(crypto.randomBytes(Math.max(10, sizeBytes)));
}

export function buildProvisioningUri(secret: string, accountName: string, issuer: string) {
  const label = encodeURIComponent(`${issuer}:${accountName}`);
  const params = new URLSearchParams({
    secret,
    issuer,
    algorithm: 'SHA1',
    digits: String(TOTP_DIGITS),
    period: String(TOTP_STEP_SECONDS),
  });
  return `otpauth://totp/${label}?${params.toString()}`;
}

export function looksLikeTotp(code: string) {
  return TOTP_PATTERN.test(code);
}

export function verifyTotp(secret: string, token: string, options: TotpOptions = {}) {
  const digits = options.digits ?? TOTP_DIGITS;
  const stepSeconds = options.stepSeconds ?? TOTP_STEP_SECONDS;
  const window = options.window ?? TOTP_SKEW_STEPS;
  const timestamp = options.timestamp ?? Date.now();

  if (!looksLikeTotp(token)) {
    return false;
  }

  const key = base32Decode(secret);
  const counter = Math.floor(timestamp / (stepSeconds * 1000));
  const candidate = Buffer.from(token);

  let matched = false;
  for (let offset = -window; offset <= window; offset += 1) {
    if (counter + offset < 0) {
      continue;
    }
    const expected = Buffer.from(hotp(key, counter + offset, digits));
    // keep scanning every step so timing does not reveal which offset matched
    if (crypto.timingSafeEqual(expected, candidate)) {
      matched = true;
    }
  }

  return matched;
}

export function generateTotp(secret: string, options: TotpOptions = {}) {
  const digits = options.digits ?? TOTP_DIGITS;
  const stepSeconds = options.stepSeconds ?? TOTP_STEP_SECONDS;
  const timestamp = options.timestamp ?? Date.now();
  const counter = Math.floor(timestamp / (stepSeconds * 1000));
  return hotp(base32Decode(secret), counter, digits);
}

export function generateBackupCodes(count = BACKUP_CODE_COUNT) {
  return Array.from({ length: count }, () => crypto.randomBytes(4).toString('hex').toUpperCase());
}

export function normalizeBackupCode(code: string) {
  return code.replace(/[\s-]/g, '').toUpperCase();
}

/** RFC 4226 dynamic truncation over HMAC-SHA1 of the big-endian step counter. */
function hotp(key: Buffer, counter: number, digits: number) {
  const message = Buffer.alloc(8);
  message.writeBigUInt64BE(BigInt(counter));

  const digest = crypto.createHmac('sha1', key).update(message).digest();
  const start = digest[digest.length - 1] & 0x0f;
  const truncated = digest.readUInt32BE(start) & 0x7fffffff;

  return String(truncated % 10 ** digits).padStart(digits, '0');
}

function base32Encode(buffer: Buffer) {
  const bitString = Array.from(buffer, (byte) => byte.toString(2).padStart(8, '0')).join('');
  const groups = bitString.match(/.{1,5}/g) ?? [];

  return groups.map((group) => BASE32_ALPHABET[parseInt(group.padEnd(5, '0'), 2)]).join('');
}

function base32Decode(input: string) {
  const symbols = input.toUpperCase().replace(/[\s=]/g, '');

  const bitString = Array.from(symbols, (symbol) => {
    const index = BASE32_ALPHABET.indexOf(symbol);
    if (index < 0) {
      throw new Error('Invalid base32 character');
    }
    return index.toString(2).padStart(5, '0');
  }).join('');

  // trailing bits short of a full byte are padding
  const octets = bitString.match(/.{8}/g) ?? [];
  return Buffer.from(octets.map((octet) => parseInt(octet, 2)));
}

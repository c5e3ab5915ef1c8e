import argon2, { type Options } from 'argon2';

const ARGON2_OPTIONS: Options = {
  type: argon2.argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

/** argon2id hash used for passwords, backup codes and API keys alike. */
export function hashSecret(value: string) {
  return argon2.hash(value, ARGON2_OPTIONS);
}

export function verifySecret(hash: string, value: string) {
  return argon2.verify(hash, value);
}

import { describe, expect, it } from 'vitest';

import { generateTotp } from '../src/lib/totp';
import { TEST_PASSWORD, createAuthHarness, registerUser } from './helpers';

const CONTEXT = { ipAddress: '127.0.0.1', userAgent: 'vitest' };

async function setupUser() {
  const harness = createAuthHarness();
  const user = await registerUser(harness);
  return { ...harness, user };
}

async function enrolledUser() {
  const context = await setupUser();
  const setup = await context.totp.setup(context.user, 'Pixel', CONTEXT);
  if (!setup.ok) {
    throw new Error('setup failed');
  }
  const enabled = await context.totp.enable(context.user, generateTotp(setup.value.secret), CONTEXT);
  expect(enabled.ok).toBe(true);
  return { ...context, setup: setup.value };
}

describe('TotpService', () => {
  it('returns a secret, provisioning uri, QR image and backup codes on setup', async () => {
    const { totp, user, repository } = await setupUser();

    const result = await totp.setup(user, 'Pixel', CONTEXT);

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.secret).toMatch(/^[A-Z2-7]{32}$/);
    expect(result.value.provisioningUri).toContain('otpauth://totp/');
    expect(result.value.provisioningUri).toContain(`secret=${result.value.secret}`);
    expect(result.value.qrCode.startsWith('data:image/png;base64,')).toBe(true);
    expect(result.value.backupCodes).toHaveLength(10);

    const stored = await repository.getTotpConfiguration(user.id);
    expect(stored?.isEnabled).toBe(false);
    expect(stored?.secretEncrypted).not.toContain(result.value.secret);
    expect(stored?.backupCodeHashes).toHaveLength(10);
    expect(stored?.backupCodeHashes).not.toContain(result.value.backupCodes[0]);
  });

  it('keeps the secret pending until a valid code enables it', async () => {
    const { totp, user } = await setupUser();
    const setup = await totp.setup(user, null, CONTEXT);
    if (!setup.ok) throw new Error('setup failed');

    expect(await totp.enable(user, '000000', CONTEXT)).toEqual({
      ok: false,
      error: { kind: 'invalid_mfa_code' },
    });
    expect(await totp.isEnabled(user.id)).toBe(false);

    const enabled = await totp.enable(user, generateTotp(setup.value.secret), CONTEXT);
    expect(enabled.ok).toBe(true);
    expect(await totp.isEnabled(user.id)).toBe(true);
  });

  it('refuses to enable without a pending setup', async () => {
    const { totp, user } = await setupUser();

    expect(await totp.enable(user, '123456', CONTEXT)).toEqual({
      ok: false,
      error: { kind: 'not_enabled' },
    });
  });

  it('refuses a second setup once enabled', async () => {
    const { totp, user } = await enrolledUser();

    expect(await totp.setup(user, null, CONTEXT)).toEqual({
      ok: false,
      error: { kind: 'already_enabled' },
    });
  });

  it('verifies current TOTP codes', async () => {
    const { totp, user, setup } = await enrolledUser();

    expect(await totp.verify(user.id, generateTotp(setup.secret))).toBe(true);
    expect(await totp.verify(user.id, 'ABCDEF')).toBe(false);
  });

  it('accepts each backup code exactly once', async () => {
    const { totp, user, setup, repository } = await enrolledUser();
    const [code] = setup.backupCodes;

    expect(await totp.verify(user.id, code.toLowerCase())).toBe(true);
    expect(await totp.verify(user.id, code)).toBe(false);

    const status = await totp.status(user.id);
    expect(status.backupCodesRemaining).toBe(9);
    expect(repository.auditActions()).toContain('auth.totp.backup_code.used');
  });

  it('reports status for enrolled and unenrolled users', async () => {
    const { totp, user } = await enrolledUser();

    const status = await totp.status(user.id);
    expect(status.enabled).toBe(true);
    expect(status.deviceName).toBe('Pixel');
    expect(status.enabledAt).toBeInstanceOf(Date);
    expect(status.backupCodesRemaining).toBe(10);

    expect(await totp.status('someone-else')).toEqual({
      enabled: false,
      deviceName: null,
      enabledAt: null,
      backupCodesRemaining: 0,
    });
  });

  it('disables TOTP only with the account password', async () => {
    const { totp, user } = await enrolledUser();

    expect(await totp.disable(user, 'wrong-password', CONTEXT)).toEqual({
      ok: false,
      error: { kind: 'invalid_credentials', reason: 'password_mismatch' },
    });
    expect(await totp.isEnabled(user.id)).toBe(true);

    expect(await totp.disable(user, TEST_PASSWORD, CONTEXT)).toEqual({ ok: true, value: true });
    expect(await totp.isEnabled(user.id)).toBe(false);
    expect(await totp.disable(user, TEST_PASSWORD, CONTEXT)).toEqual({
      ok: false,
      error: { kind: 'not_enabled' },
    });
  });

  it('replaces the whole backup code set on regeneration', async () => {
    const { totp, user, setup } = await enrolledUser();

    const regenerated = await totp.regenerateBackupCodes(user, TEST_PASSWORD, CONTEXT);
    expect(regenerated.ok).toBe(true);
    if (!regenerated.ok) return;

    expect(regenerated.value).toHaveLength(10);
    expect(await totp.verify(user.id, setup.backupCodes[0])).toBe(false);
    expect(await totp.verify(user.id, regenerated.value[0])).toBe(true);
  });

  it('audits a wrong password on disable and on backup code regeneration', async () => {
    const { totp, user, repository } = await enrolledUser();
    const before = repository.auditEvents.length;

    await totp.disable(user, 'Wrong-Passw0rd!', CONTEXT);
    await totp.regenerateBackupCodes(user, 'Wrong-Passw0rd!', CONTEXT);

    expect(repository.auditEvents.slice(before)).toMatchObject([
      {
        action: 'auth.totp.reauth_failed',
        userId: user.id,
        ipAddress: '127.0.0.1',
        metadata: { operation: 'disable', reason: 'password_mismatch' },
      },
      {
        action: 'auth.totp.reauth_failed',
        userId: user.id,
        metadata: { operation: 'regenerate_backup_codes', reason: 'password_mismatch' },
      },
    ]);
    expect(await totp.isEnabled(user.id)).toBe(true);
  });

  it('audits a rejected code from check but not from verify', async () => {
    const { totp, user, setup, repository } = await enrolledUser();
    const before = repository.auditEvents.length;

    expect(await totp.verify(user.id, '000000')).toBe(false);
    expect(repository.auditEvents).toHaveLength(before);

    expect(await totp.check(user.id, '000000', CONTEXT)).toBe(false);
    expect(await totp.check(user.id, generateTotp(setup.secret), CONTEXT)).toBe(true);
    expect(repository.auditActions().slice(before)).toEqual(['auth.totp.verify.failed']);
  });

  it('audits a wrong code during enrollment', async () => {
    const { totp, user, repository } = await setupUser();
    await totp.setup(user, null, CONTEXT);

    await totp.enable(user, '000000', CONTEXT);

    expect(repository.auditActions().at(-1)).toBe('auth.totp.enable.failed');
  });
});

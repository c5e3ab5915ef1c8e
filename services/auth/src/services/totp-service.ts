import QRCode from 'qrcode';

import { fail, ok, type AuthFailure, type Result } from '../domain/failures';
import type { AuthUser, RequestContext, TotpConfiguration } from '../domain/models';
import type { Env } from '../env';
import { SecretBox } from '../lib/encryption';
import { hashSecret, verifySecret } from '../lib/passwords';
import {
  BACKUP_CODE_COUNT,
  buildProvisioningUri,
  createTotpSecret,
  generateBackupCodes,
  looksLikeTotp,
  normalizeBackupCode,
  verifyTotp,
} from '../lib/totp';
import type { AuthRepository } from '../repositories/auth-repository';

export interface TotpSetupResult {
  secret: string;
  provisioningUri: string;
  qrCode: string;
  backupCodes: string[];
}

export interface TotpStatus {
  enabled: boolean;
  deviceName: string | null;
  enabledAt: Date | null;
  backupCodesRemaining: number;
}

export interface TotpServiceDependencies {
  repository: AuthRepository;
  env: Pick<Env, 'TOTP_ENCRYPTION_KEY' | 'TOTP_ISSUER'>;
}

async function hashBackupCodes(codes: string[]) {
  return Promise.all(codes.map((code) => hashSecret(code)));
}

export class TotpService {
  private readonly repository: AuthRepository;

  private readonly secretBox: SecretBox;

  private readonly issuer: string;

  constructor(dependencies: TotpServiceDependencies) {
    this.repository = dependencies.repository;
    this.secretBox = new SecretBox(dependencies.env.TOTP_ENCRYPTION_KEY);
    this.issuer = dependencies.env.TOTP_ISSUER;
  }

  /**
   * Starts enrollment. The secret stays pending until `enable` sees a valid
   * code for it; a new setup replaces any pending secret.
   */
  async setup(
    user: AuthUser,
    deviceName: string | null,
    context: RequestContext,
  ): Promise<Result<TotpSetupResult>> {
    const existing = await this.repository.getTotpConfiguration(user.id);
    if (existing?.isEnabled) {
      return fail({ kind: 'already_enabled' });
    }

    const secret = createTotpSecret();
    const provisioningUri = buildProvisioningUri(secret, user.email, this.issuer);
    const backupCodes = generateBackupCodes(BACKUP_CODE_COUNT);

    await this.repository.saveTotpConfiguration({
      userId: user.id,
      secretEncrypted: this.secretBox.seal(secret),
      backupCodeHashes: await hashBackupCodes(backupCodes),
      isEnabled: false,
      deviceName,
    });

    await this.repository.createAuditEvent({
      action: 'auth.totp.setup.started',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata: { deviceName },
    });

    return ok({
      secret,
      provisioningUri,
      qrCode: await QRCode.toDataURL(provisioningUri),
      backupCodes,
    });
  }

  async enable(
    user: AuthUser,
    token: string,
    context: RequestContext,
  ): Promise<Result<{ enabledAt: Date }>> {
    const config = await this.repository.getTotpConfiguration(user.id);

    if (!config) {
      return fail({ kind: 'not_enabled' });
    }
    if (config.isEnabled) {
      return fail({ kind: 'already_enabled' });
    }

    if (!verifyTotp(this.secretBox.open(config.secretEncrypted), token)) {
      await this.recordFailure(user.id, 'auth.totp.enable.failed', {}, context);
      return fail({ kind: 'invalid_mfa_code' });
    }

    const enabledAt = new Date();
    await this.repository.updateTotpConfiguration(user.id, {
      isEnabled: true,
      enabledAt,
      lastUsedAt: enabledAt,
    });

    await this.repository.createAuditEvent({
      action: 'auth.totp.enabled',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return ok({ enabledAt });
  }

  /**
   * Accepts a current TOTP code (one step of drift either way) or an unused
   * backup code. A matched backup code is removed and cannot verify again.
   */
  async verify(userId: string, code: string, context: RequestContext = {}): Promise<boolean> {
    const config = await this.repository.getTotpConfiguration(userId);
    if (!config?.isEnabled) {
      return false;
    }

    const candidate = code.trim();

    if (looksLikeTotp(candidate)) {
      if (!verifyTotp(this.secretBox.open(config.secretEncrypted), candidate)) {
        return false;
      }
      await this.repository.updateTotpConfiguration(userId, { lastUsedAt: new Date() });
      return true;
    }

    return this.consumeBackupCode(config, normalizeBackupCode(candidate), context);
  }

  /** `verify` for callers outside the login flow: a rejected code is audited. */
  async check(userId: string, code: string, context: RequestContext): Promise<boolean> {
    const valid = await this.verify(userId, code, context);
    if (!valid) {
      await this.recordFailure(userId, 'auth.totp.verify.failed', {}, context);
    }
    return valid;
  }

  async disable(
    user: AuthUser,
    password: string,
    context: RequestContext,
  ): Promise<Result<true>> {
    const passwordCheck = await this.checkPassword(user.id, password, 'disable', context);
    if (!passwordCheck.ok) {
      return passwordCheck;
    }

    const config = await this.repository.getTotpConfiguration(user.id);
    if (!config?.isEnabled) {
      return fail({ kind: 'not_enabled' });
    }

    await this.repository.deleteTotpConfiguration(user.id);
    await this.repository.createAuditEvent({
      action: 'auth.totp.disabled',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return ok(true);
  }

  async regenerateBackupCodes(
    user: AuthUser,
    password: string,
    context: RequestContext,
  ): Promise<Result<string[]>> {
    const passwordCheck = await this.checkPassword(
      user.id,
      password,
      'regenerate_backup_codes',
      context,
    );
    if (!passwordCheck.ok) {
      return passwordCheck;
    }

    const config = await this.repository.getTotpConfiguration(user.id);
    if (!config?.isEnabled) {
      return fail({ kind: 'not_enabled' });
    }

    const backupCodes = generateBackupCodes(BACKUP_CODE_COUNT);
    await this.repository.updateTotpConfiguration(user.id, {
      backupCodeHashes: await hashBackupCodes(backupCodes),
    });

    await this.repository.createAuditEvent({
      action: 'auth.totp.backup_codes.regenerated',
      actor: user.id,
      userId: user.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return ok(backupCodes);
  }

  async status(userId: string): Promise<TotpStatus> {
    const config = await this.repository.getTotpConfiguration(userId);
    if (!config?.isEnabled) {
      return { enabled: false, deviceName: null, enabledAt: null, backupCodesRemaining: 0 };
    }

    return {
      enabled: true,
      deviceName: config.deviceName,
      enabledAt: config.enabledAt,
      backupCodesRemaining: config.backupCodeHashes.length,
    };
  }

  async isEnabled(userId: string) {
    const config = await this.repository.getTotpConfiguration(userId);
    return Boolean(config?.isEnabled);
  }

  private async consumeBackupCode(
    config: TotpConfiguration,
    code: string,
    context: RequestContext,
  ): Promise<boolean> {
    for (const codeHash of config.backupCodeHashes) {
      if (!(await verifySecret(codeHash, code))) {
        continue;
      }

      const removed = await this.repository.removeBackupCode(config.userId, codeHash, new Date());
      if (removed) {
        await this.repository.createAuditEvent({
          action: 'auth.totp.backup_code.used',
          actor: config.userId,
          userId: config.userId,
          ipAddress: context.ipAddress,
          userAgent: context.userAgent,
          metadata: { remaining: config.backupCodeHashes.length - 1 },
        });
      }
      return removed;
    }

    return false;
  }

  /** Re-authenticates before a destructive change. Every refusal is audited. */
  private async checkPassword(
    userId: string,
    password: string,
    operation: string,
    context: RequestContext,
  ): Promise<Result<true>> {
    const record = await this.repository.findUserById(userId);

    let failure: AuthFailure | null = null;
    if (!record) {
      failure = { kind: 'not_found', resource: 'user' };
    } else if (!record.passwordHash) {
      failure = { kind: 'invalid_credentials', reason: 'password_not_set' };
    } else if (!(await verifySecret(record.passwordHash, password))) {
      failure = { kind: 'invalid_credentials', reason: 'password_mismatch' };
    }

    if (failure) {
      const reason = failure.kind === 'invalid_credentials' ? failure.reason : failure.kind;
      await this.recordFailure(userId, 'auth.totp.reauth_failed', { operation, reason }, context);
      return fail(failure);
    }

    return ok(true);
  }

  private async recordFailure(
    userId: string,
    action: string,
    metadata: Record<string, unknown>,
    context: RequestContext,
  ) {
    await this.repository.createAuditEvent({
      action,
      actor: userId,
      userId,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      metadata,
    });
  }
}

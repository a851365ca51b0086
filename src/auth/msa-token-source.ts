/**
 * MSA Token Source
 *
 * Primary-identity token: cached access token, then silent refresh, then
 * the interactive device-code flow.
 */

import { STAGE } from '../types.js';
import { type AuthResult, fail, ok } from '../utils/errors.js';
import type { CredentialCache } from './credential-cache.js';
import { isFresh } from './credential-cache.js';
import type { IdentityProvider, PrimaryTokenSource, TokenSet } from './types.js';

export type MsaTokenSourceOptions = {
  cache: CredentialCache;
  identity: IdentityProvider;
  /** Lifetime applied when the server declares none */
  defaultTokenLifetimeMs: number;
  /** Allow the device-code prompt. Default: true */
  interactive?: boolean;
  /** Shows the device-code instruction to the user */
  present?: (message: string) => void;
  log?: (msg: string) => void;
  verbose?: boolean;
  now?: () => number;
};

function presentToStderr(message: string): void {
  console.error(`\n${'*'.repeat(70)}\n${message}\n${'*'.repeat(70)}\n`);
}

export class MsaTokenSource implements PrimaryTokenSource {
  private readonly cache: CredentialCache;
  private readonly identity: IdentityProvider;
  private readonly defaultTokenLifetimeMs: number;
  private readonly interactive: boolean;
  private readonly present: (message: string) => void;
  private readonly log: (msg: string) => void;
  private readonly verbose: boolean;
  private readonly now: () => number;

  constructor(options: MsaTokenSourceOptions) {
    this.cache = options.cache;
    this.identity = options.identity;
    this.defaultTokenLifetimeMs = options.defaultTokenLifetimeMs;
    this.interactive = options.interactive ?? true;
    this.present = options.present ?? presentToStderr;
    this.log = options.log ?? (() => {});
    this.verbose = options.verbose ?? false;
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<AuthResult<string>> {
    const cached = this.cache.get(STAGE.MSA_ACCESS);
    if (isFresh(cached, this.now())) {
      if (this.verbose) this.log('[MSA] Using cached access token');
      return ok(cached.secret);
    }

    const refreshRecord = this.cache.get(STAGE.MSA_REFRESH);
    if (refreshRecord) {
      if (this.verbose) this.log('[MSA] Attempting silent token refresh');
      const refreshed = await this.identity.refresh(refreshRecord.secret);
      if (refreshed.success) {
        if (this.verbose) this.log('[MSA] Token refreshed');
        return ok(await this.store(refreshed.value));
      }
      this.log(`[MSA] Silent refresh failed (${refreshed.error.message}), starting device code flow`);
    }

    if (!this.interactive) {
      return fail('AuthRequired', 'No valid Microsoft account session and interactive sign-in is disabled');
    }

    return this.deviceCodeFlow();
  }

  private async deviceCodeFlow(): Promise<AuthResult<string>> {
    this.log('[MSA] Starting device code authentication flow');
    const started = await this.identity.startDeviceFlow();
    if (!started.success) return started;

    this.present(started.value.message);

    const completed = await this.identity.completeDeviceFlow(started.value);
    if (!completed.success) return completed;

    this.log('[MSA] Authentication successful');
    return ok(await this.store(completed.value));
  }

  private async store(tokens: TokenSet): Promise<string> {
    const lifetimeMs = tokens.expiresIn !== undefined ? tokens.expiresIn * 1000 : this.defaultTokenLifetimeMs;
    await this.cache.put(STAGE.MSA_ACCESS, {
      secret: tokens.accessToken,
      expiresAt: this.now() + lifetimeMs,
    });
    if (tokens.refreshToken) {
      await this.cache.put(STAGE.MSA_REFRESH, { secret: tokens.refreshToken, expiresAt: null });
    }
    return tokens.accessToken;
  }
}

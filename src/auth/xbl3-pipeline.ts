/**
 * XBL3.0 Credential Pipeline
 *
 * Composes the token source and the two Xbox Live exchanges into the
 * final `XBL3.0 x=<uhs>;<token>` credential, short-circuiting on a cached
 * credential. Any stage failure aborts the run and nothing is cached for
 * the final stage.
 */

import { STAGE } from '../types.js';
import { type AuthResult, ok } from '../utils/errors.js';
import type { CredentialCache } from './credential-cache.js';
import { isFresh } from './credential-cache.js';
import type { DelegatedTokenExchanger, PrimaryTokenSource } from './types.js';

export type Xbl3PipelineOptions = {
  cache: CredentialCache;
  tokenSource: PrimaryTokenSource;
  exchanger: DelegatedTokenExchanger;
  scheme: string;
  /** Validity window of a freshly built credential */
  compositeLifetimeMs: number;
  log?: (msg: string) => void;
  now?: () => number;
};

export function formatCompositeCredential(scheme: string, userHash: string, secret: string): string {
  return `${scheme} x=${userHash};${secret}`;
}

export class Xbl3Pipeline {
  private readonly cache: CredentialCache;
  private readonly tokenSource: PrimaryTokenSource;
  private readonly exchanger: DelegatedTokenExchanger;
  private readonly scheme: string;
  private readonly compositeLifetimeMs: number;
  private readonly log: (msg: string) => void;
  private readonly now: () => number;

  constructor(options: Xbl3PipelineOptions) {
    this.cache = options.cache;
    this.tokenSource = options.tokenSource;
    this.exchanger = options.exchanger;
    this.scheme = options.scheme;
    this.compositeLifetimeMs = options.compositeLifetimeMs;
    this.log = options.log ?? (() => {});
    this.now = options.now ?? Date.now;
  }

  async getCompositeCredential(): Promise<AuthResult<string>> {
    const cached = this.cache.get(STAGE.XBL3);
    if (isFresh(cached, this.now())) {
      this.log('[Pipeline] Using cached XBL3.0 token');
      return ok(cached.secret);
    }

    this.log('[Pipeline] Fetching new XBL3.0 token...');

    const primary = await this.tokenSource.getToken();
    if (!primary.success) {
      this.log(`[Pipeline] Failed to get MSA token: ${primary.error.message}`);
      return primary;
    }

    const userToken = await this.exchanger.exchangePrimaryToIntermediate(primary.value);
    if (!userToken.success) {
      this.log(`[Pipeline] Failed to get XBL token: ${userToken.error.message}`);
      return userToken;
    }

    const xsts = await this.exchanger.exchangeIntermediateToFinal(userToken.value.token);
    if (!xsts.success) {
      this.log(`[Pipeline] Failed to get XSTS token: ${xsts.error.message}`);
      return xsts;
    }

    // The XSTS user hash is authoritative; the user-token hash is discarded
    const credential = formatCompositeCredential(this.scheme, xsts.value.userHash, xsts.value.token);

    const now = this.now();
    let expiresAt = now + this.compositeLifetimeMs;
    if (xsts.value.notAfter !== null && xsts.value.notAfter < expiresAt) {
      expiresAt = xsts.value.notAfter;
    }
    await this.cache.put(STAGE.XBL3, { secret: credential, expiresAt });

    this.log(`[Pipeline] XBL3.0 token generated (UHS: ${xsts.value.userHash})`);
    return ok(credential);
  }
}

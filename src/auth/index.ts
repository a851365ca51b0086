/**
 * Credential Pipeline Public API
 *
 * Factory wiring the cache, identity provider, token source and exchanger
 * from configuration. Each call builds its own instances.
 */

import os from 'node:os';
import { config } from '../config.js';
import { env } from '../env.js';
import { REPO_ROOT, resolveCacheLocation } from '../paths.js';
import type { AppConfig } from '../types.js';
import { CredentialCache } from './credential-cache.js';
import { OpenIdIdentityProvider } from './device-code.js';
import { MsaTokenSource } from './msa-token-source.js';
import type { IdentityProvider } from './types.js';
import { XboxTokenExchanger } from './xbox-exchange.js';
import { Xbl3Pipeline } from './xbl3-pipeline.js';

export type {
  DelegatedTokenExchanger,
  DeviceFlow,
  IdentityProvider,
  PrimaryTokenSource,
  TokenSet,
} from './types.js';
export { CredentialCache, isFresh } from './credential-cache.js';
export { OpenIdIdentityProvider, mapOAuthError } from './device-code.js';
export { MsaTokenSource } from './msa-token-source.js';
export { XboxTokenExchanger, parseDelegatedToken } from './xbox-exchange.js';
export { Xbl3Pipeline, formatCompositeCredential } from './xbl3-pipeline.js';

export type CreatePipelineOptions = {
  appConfig?: AppConfig;
  /** Cache file; undefined resolves the default location, null forces memory-only */
  cacheFile?: string | null;
  interactive?: boolean;
  verbose?: boolean;
  log?: (msg: string) => void;
  present?: (message: string) => void;
  identity?: IdentityProvider;
  fetchImpl?: typeof fetch;
};

export function defaultCacheFile(): string | null {
  return resolveCacheLocation({
    override: env.XBL_CACHE_FILE,
    runtimeDir: env.XDG_RUNTIME_DIR,
    appDir: REPO_ROOT,
    tempDir: os.tmpdir(),
  });
}

export async function createXbl3Pipeline(options: CreatePipelineOptions = {}): Promise<Xbl3Pipeline> {
  const appConfig = options.appConfig ?? config;
  const verbose = options.verbose ?? env.AUTH_VERBOSE;
  const log = options.log ?? (() => {});
  const filePath = options.cacheFile === undefined ? defaultCacheFile() : options.cacheFile;

  log(`[Cache] Token cache location: ${filePath ?? 'in-memory only (no persistence)'}`);
  const cache = await CredentialCache.open({ filePath, log });

  const identity = options.identity ?? new OpenIdIdentityProvider({ msa: appConfig.msa, log });

  const tokenSource = new MsaTokenSource({
    cache,
    identity,
    defaultTokenLifetimeMs: appConfig.msa.defaultTokenLifetimeMs,
    interactive: options.interactive ?? !env.XBL_NON_INTERACTIVE,
    present: options.present,
    log,
    verbose,
  });

  const exchanger = new XboxTokenExchanger({
    xbox: appConfig.xbox,
    fetchImpl: options.fetchImpl,
    log,
    verbose,
  });

  return new Xbl3Pipeline({
    cache,
    tokenSource,
    exchanger,
    scheme: appConfig.xbox.scheme,
    compositeLifetimeMs: appConfig.xbox.compositeLifetimeMs,
    log,
  });
}

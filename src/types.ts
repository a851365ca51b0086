/**
 * Shared Types
 */

// ============================================
// Configuration
// ============================================

export interface MsaConfig {
  clientId: string;
  issuer: string;
  deviceAuthorizationEndpoint: string;
  tokenEndpoint: string;
  scopes: readonly string[];
  /** Used when the token response carries no expires_in */
  defaultTokenLifetimeMs: number;
}

export interface XboxConfig {
  userAuthenticateUrl: string;
  xstsAuthorizeUrl: string;
  userRelyingParty: string;
  xstsRelyingParty: string;
  siteName: string;
  sandboxId: string;
  /** Prefix of the composite credential, e.g. XBL3.0 */
  scheme: string;
  compositeLifetimeMs: number;
  timeoutMs: number;
}

export interface RelayConfig {
  url: string;
  maxReconnectAttempts: number;
  reconnectDelayMs: number;
  connectGraceMs: number;
}

export interface AppConfig {
  msa: MsaConfig;
  xbox: XboxConfig;
  relay: RelayConfig;
}

// ============================================
// Credential cache
// ============================================

/** Well-known cache keys */
export const STAGE = {
  MSA_ACCESS: 'msa',
  MSA_REFRESH: 'msa_refresh',
  XBL3: 'xbl3',
} as const;

export type CredentialRecord = {
  stageId: string;
  secret: string;
  /** Unix timestamp ms; null means the record does not expire */
  expiresAt: number | null;
};

/** On-disk snapshot of the whole cache */
export type CacheDocument = {
  version: 1;
  records: Record<string, CredentialRecord>;
};

// ============================================
// Delegated exchanges
// ============================================

export type DelegatedToken = {
  token: string;
  /** User hash (uhs) from DisplayClaims.xui[0] */
  userHash: string;
  /** Server-declared NotAfter as Unix timestamp ms, when present */
  notAfter: number | null;
};

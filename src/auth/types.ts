/**
 * Authentication Types
 *
 * Type definitions for the credential pipeline.
 */

import type { AuthResult } from '../utils/errors.js';
import type { DelegatedToken } from '../types.js';

/** Tokens returned by the identity provider */
export type TokenSet = {
  accessToken: string;
  /** Rotated refresh token, when the provider issued one */
  refreshToken?: string;
  /** Lifetime in seconds as declared by the server */
  expiresIn?: number;
};

/** A started device-code flow */
export type DeviceFlow = {
  userCode: string;
  verificationUri: string;
  /** Human-readable instruction for the user */
  message: string;
  /** Seconds until the code expires */
  expiresIn: number;
};

/** Remote identity provider, treated as opaque request/response calls */
export interface IdentityProvider {
  /** Silent refresh using a cached refresh token */
  refresh(refreshToken: string): Promise<AuthResult<TokenSet>>;

  /** Request a device code and verification URL */
  startDeviceFlow(): Promise<AuthResult<DeviceFlow>>;

  /** Block until the user completes verification or the code expires */
  completeDeviceFlow(flow: DeviceFlow): Promise<AuthResult<TokenSet>>;
}

/** First-stage token source */
export interface PrimaryTokenSource {
  getToken(): Promise<AuthResult<string>>;
}

/** The two delegated exchanges */
export interface DelegatedTokenExchanger {
  exchangePrimaryToIntermediate(primaryToken: string): Promise<AuthResult<DelegatedToken>>;
  exchangeIntermediateToFinal(intermediateToken: string): Promise<AuthResult<DelegatedToken>>;
}

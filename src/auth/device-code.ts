/**
 * Microsoft Account Identity Provider
 *
 * RFC 8628 device authorization grant and refresh-token grant against the
 * Microsoft consumers tenant, via openid-client.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8628
 */

import * as client from 'openid-client';
import type { MsaConfig } from '../types.js';
import { type AuthResult, fail, ok, toErrorMessage } from '../utils/errors.js';
import type { DeviceFlow, IdentityProvider, TokenSet } from './types.js';

/** OAuth error codes meaning the user did not finish the prompt in time */
const DECLINED_ERRORS = new Set(['expired_token', 'access_denied', 'authorization_declined', 'bad_verification_code']);

export type OpenIdIdentityProviderOptions = {
  msa: MsaConfig;
  log?: (msg: string) => void;
  /** Cancels a pending device-code poll */
  signal?: AbortSignal;
};

export class OpenIdIdentityProvider implements IdentityProvider {
  private readonly configuration: client.Configuration;
  private readonly scope: string;
  private readonly deviceAuthorizationEndpoint: string;
  private readonly log: (msg: string) => void;
  private readonly signal: AbortSignal | undefined;
  private readonly pending = new WeakMap<DeviceFlow, client.DeviceAuthorizationResponse>();

  constructor(options: OpenIdIdentityProviderOptions) {
    const { msa } = options;
    const serverMetadata: client.ServerMetadata = {
      issuer: msa.issuer,
      device_authorization_endpoint: msa.deviceAuthorizationEndpoint,
      token_endpoint: msa.tokenEndpoint,
    };

    this.configuration = new client.Configuration(serverMetadata, msa.clientId, undefined, client.None());
    this.scope = msa.scopes.join(' ');
    this.deviceAuthorizationEndpoint = msa.deviceAuthorizationEndpoint;
    this.log = options.log ?? (() => {});
    this.signal = options.signal;
  }

  async refresh(refreshToken: string): Promise<AuthResult<TokenSet>> {
    try {
      const response = await client.refreshTokenGrant(this.configuration, refreshToken, { scope: this.scope });
      return ok(toTokenSet(response));
    } catch (err) {
      return mapOAuthError(err, 'Token refresh failed');
    }
  }

  async startDeviceFlow(): Promise<AuthResult<DeviceFlow>> {
    let response: client.DeviceAuthorizationResponse;
    try {
      this.log(`[MSA] Device code request to ${this.deviceAuthorizationEndpoint}`);
      response = await client.initiateDeviceAuthorization(this.configuration, { scope: this.scope });
    } catch (err) {
      return mapOAuthError(err, 'Failed to initiate device flow');
    }

    const message =
      typeof response.message === 'string'
        ? response.message
        : `To sign in, open ${response.verification_uri} and enter the code ${response.user_code}`;

    const flow: DeviceFlow = {
      userCode: response.user_code,
      verificationUri: response.verification_uri,
      message,
      expiresIn: response.expires_in,
    };
    this.pending.set(flow, response);
    return ok(flow);
  }

  async completeDeviceFlow(flow: DeviceFlow): Promise<AuthResult<TokenSet>> {
    const response = this.pending.get(flow);
    if (!response) {
      return fail('ProtocolError', 'Device flow was not started by this provider');
    }

    try {
      // openid-client handles authorization_pending and slow_down internally
      const tokens = await client.pollDeviceAuthorizationGrant(this.configuration, response, undefined, {
        signal: this.signal,
      });
      return ok(toTokenSet(tokens));
    } catch (err) {
      return mapOAuthError(err, 'Authentication failed');
    } finally {
      this.pending.delete(flow);
    }
  }
}

function toTokenSet(response: client.TokenEndpointResponse): TokenSet {
  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token,
    expiresIn: response.expires_in,
  };
}

/**
 * Translate an openid-client failure into the bridge error taxonomy.
 */
export function mapOAuthError<T>(err: unknown, context: string): AuthResult<T> {
  if (err instanceof client.ResponseBodyError) {
    const detail = err.error_description ?? err.error;
    if (DECLINED_ERRORS.has(err.error)) {
      return fail('AuthDeclinedOrExpired', `${context}: ${detail}`, { status: err.status, cause: err });
    }
    return fail('ProtocolError', `${context}: ${detail}`, { status: err.status, cause: err });
  }

  if (err instanceof client.ClientError) {
    return fail('ProtocolError', `${context}: ${err.message}`, { cause: err });
  }

  return fail('NetworkFailure', `${context}: ${toErrorMessage(err)}`, { cause: err });
}

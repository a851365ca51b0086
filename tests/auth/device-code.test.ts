import { beforeEach, describe, expect, it, vi } from 'vitest';
import { mapOAuthError, OpenIdIdentityProvider } from '../../src/auth/device-code.js';
import type { MsaConfig } from '../../src/types.js';

const oidc = vi.hoisted(() => {
  class ResponseBodyError extends Error {
    constructor(
      readonly error: string,
      readonly error_description: string | undefined,
      readonly status: number
    ) {
      super(error_description ?? error);
    }
  }
  class ClientError extends Error {}
  class Configuration {
    constructor(
      readonly metadata: unknown,
      readonly clientId: string
    ) {}
  }
  return {
    ResponseBodyError,
    ClientError,
    Configuration,
    None: vi.fn(() => 'none'),
    initiateDeviceAuthorization: vi.fn(),
    pollDeviceAuthorizationGrant: vi.fn(),
    refreshTokenGrant: vi.fn(),
  };
});

vi.mock('openid-client', () => oidc);

const msa: MsaConfig = {
  clientId: 'test-client',
  issuer: 'https://login.example.test/consumers/v2.0',
  deviceAuthorizationEndpoint: 'https://login.example.test/consumers/oauth2/v2.0/devicecode',
  tokenEndpoint: 'https://login.example.test/consumers/oauth2/v2.0/token',
  scopes: ['XboxLive.signin', 'XboxLive.offline_access'],
  defaultTokenLifetimeMs: 3600 * 1000,
};

const deviceResponse = {
  device_code: 'device-123',
  user_code: 'WXYZ-1234',
  verification_uri: 'https://login.example.test/link',
  expires_in: 900,
  interval: 5,
};

describe('OpenIdIdentityProvider', () => {
  beforeEach(() => {
    oidc.initiateDeviceAuthorization.mockReset();
    oidc.pollDeviceAuthorizationGrant.mockReset();
    oidc.refreshTokenGrant.mockReset();
  });

  it('refreshes with the configured scopes', async () => {
    oidc.refreshTokenGrant.mockResolvedValue({ access_token: 'new-access', refresh_token: 'rotated', expires_in: 3600 });
    const provider = new OpenIdIdentityProvider({ msa });

    const result = await provider.refresh('refresh-1');

    expect(result).toEqual({
      success: true,
      value: { accessToken: 'new-access', refreshToken: 'rotated', expiresIn: 3600 },
    });
    expect(oidc.refreshTokenGrant).toHaveBeenCalledWith(expect.any(oidc.Configuration), 'refresh-1', {
      scope: 'XboxLive.signin XboxLive.offline_access',
    });
  });

  it('reports a rejected refresh token as a protocol error', async () => {
    oidc.refreshTokenGrant.mockRejectedValue(new oidc.ResponseBodyError('invalid_grant', 'token revoked', 400));
    const provider = new OpenIdIdentityProvider({ msa });

    const result = await provider.refresh('revoked');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('ProtocolError');
      expect(result.error.message).toBe('Token refresh failed: token revoked');
      expect(result.error.status).toBe(400);
    }
  });

  it('builds a prompt message when the server sends none', async () => {
    oidc.initiateDeviceAuthorization.mockResolvedValue(deviceResponse);
    const log = vi.fn();
    const provider = new OpenIdIdentityProvider({ msa, log });

    const result = await provider.startDeviceFlow();

    expect(result).toEqual({
      success: true,
      value: {
        userCode: 'WXYZ-1234',
        verificationUri: 'https://login.example.test/link',
        message: 'To sign in, open https://login.example.test/link and enter the code WXYZ-1234',
        expiresIn: 900,
      },
    });
    expect(log).toHaveBeenCalledWith(`[MSA] Device code request to ${msa.deviceAuthorizationEndpoint}`);
  });

  it('passes through the server prompt message', async () => {
    oidc.initiateDeviceAuthorization.mockResolvedValue({ ...deviceResponse, message: 'Enter WXYZ-1234 at the link' });
    const provider = new OpenIdIdentityProvider({ msa });

    const result = await provider.startDeviceFlow();

    expect(result.success && result.value.message).toBe('Enter WXYZ-1234 at the link');
  });

  it('polls with the response from the started flow', async () => {
    oidc.initiateDeviceAuthorization.mockResolvedValue(deviceResponse);
    oidc.pollDeviceAuthorizationGrant.mockResolvedValue({ access_token: 'device-access', expires_in: 1800 });
    const provider = new OpenIdIdentityProvider({ msa });

    const started = await provider.startDeviceFlow();
    if (!started.success) throw started.error;
    const result = await provider.completeDeviceFlow(started.value);

    expect(result).toEqual({
      success: true,
      value: { accessToken: 'device-access', refreshToken: undefined, expiresIn: 1800 },
    });
    expect(oidc.pollDeviceAuthorizationGrant).toHaveBeenCalledWith(
      expect.any(oidc.Configuration),
      deviceResponse,
      undefined,
      { signal: undefined }
    );
  });

  it('maps an expired device code to AuthDeclinedOrExpired', async () => {
    oidc.initiateDeviceAuthorization.mockResolvedValue(deviceResponse);
    oidc.pollDeviceAuthorizationGrant.mockRejectedValue(new oidc.ResponseBodyError('expired_token', undefined, 400));
    const provider = new OpenIdIdentityProvider({ msa });

    const started = await provider.startDeviceFlow();
    if (!started.success) throw started.error;
    const result = await provider.completeDeviceFlow(started.value);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('AuthDeclinedOrExpired');
      expect(result.error.message).toBe('Authentication failed: expired_token');
    }
  });

  it('refuses to complete a flow it did not start', async () => {
    const provider = new OpenIdIdentityProvider({ msa });

    const result = await provider.completeDeviceFlow({
      userCode: 'X',
      verificationUri: 'https://login.example.test/link',
      message: 'm',
      expiresIn: 1,
    });

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe('ProtocolError');
    expect(oidc.pollDeviceAuthorizationGrant).not.toHaveBeenCalled();
  });

  it('maps transport failures when starting the flow to NetworkFailure', async () => {
    oidc.initiateDeviceAuthorization.mockRejectedValue(new TypeError('fetch failed'));
    const provider = new OpenIdIdentityProvider({ msa });

    const result = await provider.startDeviceFlow();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('NetworkFailure');
      expect(result.error.message).toBe('Failed to initiate device flow: fetch failed');
    }
  });
});

describe('mapOAuthError', () => {
  it.each(['access_denied', 'authorization_declined', 'bad_verification_code'])(
    'treats %s as declined',
    (code) => {
      const result = mapOAuthError(new oidc.ResponseBodyError(code, undefined, 400), 'Authentication failed');
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.kind).toBe('AuthDeclinedOrExpired');
    }
  );

  it('maps client errors to ProtocolError', () => {
    const result = mapOAuthError(new oidc.ClientError('unexpected response content-type'), 'Token refresh failed');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('ProtocolError');
      expect(result.error.message).toBe('Token refresh failed: unexpected response content-type');
    }
  });
});

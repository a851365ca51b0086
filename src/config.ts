/**
 * Application Configuration
 *
 * Centralized configuration with typed defaults.
 */

import type { AppConfig } from './types.js';

export const config: AppConfig = {
  // Microsoft account (consumers tenant) used for the primary token
  msa: {
    clientId: '93819583-abf7-4a5e-8b53-9526cf7e7ba9',
    issuer: 'https://login.microsoftonline.com/9188040d-6c67-4c5b-b112-36a304b66dad/v2.0',
    deviceAuthorizationEndpoint: 'https://login.microsoftonline.com/consumers/oauth2/v2.0/devicecode',
    tokenEndpoint: 'https://login.microsoftonline.com/consumers/oauth2/v2.0/token',
    scopes: ['XboxLive.signin', 'XboxLive.offline_access'],
    defaultTokenLifetimeMs: 3600 * 1000,
  },

  // Delegated Xbox Live exchanges
  xbox: {
    userAuthenticateUrl: 'https://user.auth.xboxlive.com/user/authenticate',
    xstsAuthorizeUrl: 'https://xsts.auth.xboxlive.com/xsts/authorize',
    userRelyingParty: 'http://auth.xboxlive.com',
    xstsRelyingParty: 'rp://api.minecraftservices.com/',
    siteName: 'user.auth.xboxlive.com',
    sandboxId: 'RETAIL',
    scheme: 'XBL3.0',
    compositeLifetimeMs: 23 * 60 * 60 * 1000,
    timeoutMs: 30_000,
  },

  // Local chat relay
  relay: {
    url: 'ws://localhost:8080/chat',
    maxReconnectAttempts: 5,
    reconnectDelayMs: 2_000,
    connectGraceMs: 1_000,
  },
};

// Freeze config to prevent accidental mutation
Object.freeze(config);
Object.freeze(config.msa);
Object.freeze(config.msa.scopes);
Object.freeze(config.xbox);
Object.freeze(config.relay);

/**
 * Xbox Live Token Exchange
 *
 * MSA access token -> Xbox Live user token -> XSTS token.
 * Each call is a single POST; caching and retry belong to the caller.
 */

import type { DelegatedToken, XboxConfig } from '../types.js';
import { type AuthResult, fail, ok, toErrorMessage } from '../utils/errors.js';
import type { DelegatedTokenExchanger } from './types.js';

export type XboxTokenExchangerOptions = {
  xbox: XboxConfig;
  fetchImpl?: typeof fetch;
  log?: (msg: string) => void;
  verbose?: boolean;
};

type UserAuthenticateRequest = {
  Properties: { AuthMethod: 'RPS'; SiteName: string; RpsTicket: string };
  RelyingParty: string;
  TokenType: 'JWT';
};

type XstsAuthorizeRequest = {
  Properties: { SandboxId: string; UserTokens: string[] };
  RelyingParty: string;
  TokenType: 'JWT';
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate `{ Token, NotAfter?, DisplayClaims: { xui: [{ uhs }] } }`.
 */
export function parseDelegatedToken(data: unknown): DelegatedToken | null {
  if (!isRecord(data)) return null;
  if (typeof data.Token !== 'string' || !data.Token) return null;

  const claims = data.DisplayClaims;
  if (!isRecord(claims)) return null;
  const xui = claims.xui;
  if (!Array.isArray(xui) || xui.length === 0) return null;
  const first: unknown = xui[0];
  if (!isRecord(first)) return null;
  const uhs = first.uhs;
  if (typeof uhs !== 'string' || !uhs) return null;

  let notAfter: number | null = null;
  if (typeof data.NotAfter === 'string') {
    const parsed = Date.parse(data.NotAfter);
    notAfter = Number.isNaN(parsed) ? null : parsed;
  }

  return { token: data.Token, userHash: uhs, notAfter };
}

export class XboxTokenExchanger implements DelegatedTokenExchanger {
  private readonly xbox: XboxConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly log: (msg: string) => void;
  private readonly verbose: boolean;

  constructor(options: XboxTokenExchangerOptions) {
    this.xbox = options.xbox;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.log ?? (() => {});
    this.verbose = options.verbose ?? false;
  }

  async exchangePrimaryToIntermediate(primaryToken: string): Promise<AuthResult<DelegatedToken>> {
    const body: UserAuthenticateRequest = {
      Properties: {
        AuthMethod: 'RPS',
        SiteName: this.xbox.siteName,
        RpsTicket: `d=${primaryToken}`,
      },
      RelyingParty: this.xbox.userRelyingParty,
      TokenType: 'JWT',
    };
    return this.post(this.xbox.userAuthenticateUrl, body, 'XBL user token');
  }

  async exchangeIntermediateToFinal(intermediateToken: string): Promise<AuthResult<DelegatedToken>> {
    const body: XstsAuthorizeRequest = {
      Properties: {
        SandboxId: this.xbox.sandboxId,
        UserTokens: [intermediateToken],
      },
      RelyingParty: this.xbox.xstsRelyingParty,
      TokenType: 'JWT',
    };
    return this.post(this.xbox.xstsAuthorizeUrl, body, 'XSTS token');
  }

  private async post(url: string, body: unknown, label: string): Promise<AuthResult<DelegatedToken>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error('Request timed out')), this.xbox.timeoutMs);

    // The timer covers the body read as well as the headers
    try {
      return await this.request(url, body, label, controller.signal);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async request(
    url: string,
    body: unknown,
    label: string,
    signal: AbortSignal
  ): Promise<AuthResult<DelegatedToken>> {
    let response: Response;
    try {
      if (this.verbose) this.log(`[XboxLive] Requesting ${label} from ${url}`);
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'x-xbl-contract-version': '1',
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      return fail('NetworkFailure', `${label} request failed: ${toErrorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      // XSTS reports account problems (no Xbox profile, child account) as XErr
      const xerr = await readXErr(response);
      const suffix = xerr ? ` (XErr ${xerr})` : '';
      return fail('NetworkFailure', `${label} request failed: HTTP ${response.status}${suffix}`, {
        status: response.status,
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      if (signal.aborted) {
        return fail('NetworkFailure', `${label} request failed: ${toErrorMessage(signal.reason)}`, { cause: err });
      }
      return fail('ProtocolError', `${label} response is not JSON: ${toErrorMessage(err)}`, { cause: err });
    }

    const parsed = parseDelegatedToken(data);
    if (!parsed) {
      const keys = data && typeof data === 'object' ? Object.keys(data).join(', ') : typeof data;
      return fail('ProtocolError', `Unexpected ${label} response format (fields: ${keys})`);
    }

    if (this.verbose) this.log(`[XboxLive] Obtained ${label}`);
    return ok(parsed);
  }
}

async function readXErr(response: Response): Promise<string | null> {
  try {
    const data: unknown = await response.json();
    if (data && typeof data === 'object' && 'XErr' in data) {
      const xerr = data.XErr;
      if (typeof xerr === 'number' || typeof xerr === 'string') return String(xerr);
    }
    return null;
  } catch {
    return null;
  }
}

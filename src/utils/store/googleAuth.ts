import jwt from 'jsonwebtoken';
import { ConnectionError } from '../errors/errors';

export const TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

// Refresh this long before Google says the token expires
const EXPIRY_MARGIN_MS = 60_000;

type TokenResponse = {
  access_token: string;
  expires_in: number;
};

function isTokenResponse(value: unknown): value is TokenResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    'expires_in' in value &&
    typeof value.expires_in === 'number'
  );
}

/**
 * Response body for error messages; empty when the body cannot be read.
 */
export async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return '';
  }
}

/**
 * OAuth access tokens for a Google service account.
 *
 * Signs a short-lived RS256 assertion with the account's private key, exchanges it
 * at the token endpoint and reuses the access token until shortly before it expires.
 */
export class ServiceAccountAuth {
  private token: { value: string; expiresAt: number } | null = null;
  private clientEmail: string;
  private privateKey: string;
  private scope: string;

  constructor(clientEmail: string, privateKey: string, scope: string = SHEETS_SCOPE) {
    this.clientEmail = clientEmail;
    this.privateKey = privateKey;
    this.scope = scope;
  }

  /**
   * @throws ConnectionError when the assertion cannot be signed or the exchange fails
   */
  async getAccessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt - EXPIRY_MARGIN_MS) {
      return this.token.value;
    }

    let assertion: string;
    try {
      assertion = jwt.sign({ scope: this.scope }, this.privateKey, {
        algorithm: 'RS256',
        issuer: this.clientEmail,
        audience: TOKEN_URL,
        expiresIn: '1h',
      });
    } catch (error) {
      throw new ConnectionError('Could not sign the service account assertion; check GOOGLE_PRIVATE_KEY', {
        cause: error,
      });
    }

    let res: Response;
    try {
      res = await fetch(TOKEN_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
          assertion,
        }).toString(),
      });
    } catch (error) {
      throw new ConnectionError('Could not reach the Google token endpoint', { cause: error });
    }

    if (!res.ok) {
      const body = await safeText(res);
      throw new ConnectionError(`Google rejected the service account credentials: ${res.status} ${body}`);
    }
    const json: unknown = await res.json();
    if (!isTokenResponse(json)) {
      throw new ConnectionError('Google token endpoint returned an unexpected response');
    }

    this.token = { value: json.access_token, expiresAt: Date.now() + json.expires_in * 1000 };
    return this.token.value;
  }
}

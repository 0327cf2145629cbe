import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { ServiceAccountAuth, TOKEN_URL, safeText } from './googleAuth';
import { ConnectionError } from '../errors/errors';

vi.mock('jsonwebtoken', () => ({
  default: { sign: vi.fn() },
}));

const fetchMock = vi.fn();

function tokenResponse(token: string, expiresIn = 3600): Response {
  return new Response(JSON.stringify({ access_token: token, expires_in: expiresIn }), { status: 200 });
}

describe('ServiceAccountAuth', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
    fetchMock.mockReset();
    vi.mocked(jwt.sign).mockReset();
    vi.mocked(jwt.sign).mockImplementation(() => 'signed-assertion');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('should exchange a signed assertion for an access token', async () => {
    fetchMock.mockResolvedValue(tokenResponse('token-1'));
    const auth = new ServiceAccountAuth('tracker@example.com', 'test-key');

    const token = await auth.getAccessToken();

    expect(token).toBe('token-1');
    expect(jwt.sign).toHaveBeenCalledWith(
      { scope: 'https://www.googleapis.com/auth/spreadsheets' },
      'test-key',
      { algorithm: 'RS256', issuer: 'tracker@example.com', audience: TOKEN_URL, expiresIn: '1h' },
    );
    expect(fetchMock).toHaveBeenCalledWith(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'grant_type=urn%3Aietf%3Aparams%3Aoauth%3Agrant-type%3Ajwt-bearer&assertion=signed-assertion',
    });
  });

  it('should reuse the token until shortly before it expires', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00Z'));
    fetchMock.mockResolvedValueOnce(tokenResponse('token-1')).mockResolvedValueOnce(tokenResponse('token-2'));
    const auth = new ServiceAccountAuth('tracker@example.com', 'test-key');

    expect(await auth.getAccessToken()).toBe('token-1');
    vi.setSystemTime(new Date('2024-03-01T12:58:00Z'));
    expect(await auth.getAccessToken()).toBe('token-1');
    vi.setSystemTime(new Date('2024-03-01T12:59:30Z'));
    expect(await auth.getAccessToken()).toBe('token-2');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should report a key that cannot sign as a connection error', async () => {
    vi.mocked(jwt.sign).mockImplementation(() => {
      throw new Error('secretOrPrivateKey must be an asymmetric key');
    });
    const auth = new ServiceAccountAuth('tracker@example.com', 'not-a-key');

    await expect(auth.getAccessToken()).rejects.toThrow(
      'Could not sign the service account assertion; check GOOGLE_PRIVATE_KEY',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should report an unreachable token endpoint as a connection error', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const auth = new ServiceAccountAuth('tracker@example.com', 'test-key');

    await expect(auth.getAccessToken()).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should include the status and body when credentials are rejected', async () => {
    fetchMock.mockResolvedValue(new Response('invalid_grant', { status: 400 }));
    const auth = new ServiceAccountAuth('tracker@example.com', 'test-key');

    await expect(auth.getAccessToken()).rejects.toThrow(
      'Google rejected the service account credentials: 400 invalid_grant',
    );
  });

  it('should reject a token response without an access token', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ error: 'nope' }), { status: 200 }));
    const auth = new ServiceAccountAuth('tracker@example.com', 'test-key');

    await expect(auth.getAccessToken()).rejects.toThrow('Google token endpoint returned an unexpected response');
  });
});

describe('safeText', () => {
  it('should return the body text', async () => {
    expect(await safeText(new Response('quota exceeded'))).toBe('quota exceeded');
  });

  it('should return an empty string when the body was already read', async () => {
    const res = new Response('once');
    await res.text();

    expect(await safeText(res)).toBe('');
  });
});

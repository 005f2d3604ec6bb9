import { describe, it, expect, vi } from 'vitest';
import { ApiError, AuthError, NetworkError, NotFoundError, RateLimited } from '../../errors.js';
import { inspectDeezerBody } from '../deezer.js';
import { ApiClient, withSearchParams, type ApiClientOptions, type ApiRequest } from '../http-client.js';
import { recordingSleep, respond, scriptedSender } from '../../__tests__/fakes/scripted-sender.js';

const bearer = (request: ApiRequest, accessToken: string): ApiRequest => ({
  ...request,
  headers: { ...request.headers, Authorization: `Bearer ${accessToken}` }
});

function tokenSource(tokens: string[] = ['test-token']) {
  let index = 0;
  const source = {
    getValidToken: async (): Promise<string> => tokens[Math.min(index, tokens.length - 1)] ?? 'test-token',
    invalidate: vi.fn(() => {
      index++;
    })
  };
  return source;
}

function createClient(send: ApiClientOptions['send'], overrides: Partial<ApiClientOptions> = {}) {
  const { sleep, delays } = recordingSleep();
  const tokens = tokenSource();
  const client = new ApiClient({
    platform: 'spotify',
    tokens,
    authorize: bearer,
    send,
    sleep,
    now: () => 0,
    requestDelayMs: 0,
    ...overrides
  });
  return { client, delays, tokens };
}

describe('ApiClient', () => {
  it('returns the decoded JSON body', async () => {
    const { send } = scriptedSender([respond(200, { id: 'abc' })]);
    const { client } = createClient(send);

    await expect(client.get('https://api.example.test/thing', undefined, { auth: false })).resolves.toEqual({ id: 'abc' });
  });

  it('waits for Retry-After seconds after HTTP 429', async () => {
    const { send, requests } = scriptedSender([respond(429, '', { 'retry-after': '2' }), respond(200, { ok: true })]);
    const { client, delays } = createClient(send);

    const result = await client.get('https://api.example.test/thing', undefined, { auth: false });

    expect(result).toEqual({ ok: true });
    expect(requests).toHaveLength(2);
    expect(delays).toEqual([2000]);
  });

  it('backs off exponentially when Retry-After is missing', async () => {
    const { send } = scriptedSender([respond(429, ''), respond(429, ''), respond(200, { ok: true })]);
    const { client, delays } = createClient(send);

    await client.get('https://api.example.test/thing', undefined, { auth: false });

    expect(delays).toEqual([1000, 2000]);
  });

  it('gives up with RateLimited after the configured number of retries', async () => {
    const { send, requests } = scriptedSender([respond(429, '')]);
    const { client, delays } = createClient(send, { maxRateLimitRetries: 3 });

    const error = await client.get('https://api.example.test/thing', undefined, { auth: false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimited);
    expect(error).toMatchObject({ platform: 'spotify', attempts: 4 });
    expect(requests).toHaveLength(4);
    expect(delays).toEqual([1000, 2000, 4000]);
  });

  it('retries server errors, then fails with NetworkError', async () => {
    const { send, requests } = scriptedSender([respond(503, 'unavailable')]);
    const { client, delays } = createClient(send, { maxNetworkRetries: 2 });

    const error = await client.get('https://api.example.test/thing', undefined, { auth: false }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(requests).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('recovers from a transport failure', async () => {
    const { send } = scriptedSender([new Error('socket hang up'), respond(200, [1, 2])]);
    const { client, delays } = createClient(send);

    await expect(client.get('https://api.example.test/thing', undefined, { auth: false })).resolves.toEqual([1, 2]);
    expect(delays).toEqual([1000]);
  });

  it('refreshes the token once after HTTP 401', async () => {
    const { send, requests } = scriptedSender([respond(401, { error: 'expired' }), respond(200, { ok: true })]);
    const { sleep } = recordingSleep();
    const tokens = tokenSource(['old-token', 'new-token']);
    const client = new ApiClient({ platform: 'spotify', tokens, authorize: bearer, send, sleep, requestDelayMs: 0 });

    await client.get('https://api.example.test/me', undefined, { auth: true });

    expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    expect(requests.map(request => request.headers?.Authorization)).toEqual(['Bearer old-token', 'Bearer new-token']);
  });

  it('fails with AuthError when the refreshed token is rejected too', async () => {
    const { send, requests } = scriptedSender([respond(401, { error: 'expired' })]);
    const { client, tokens } = createClient(send);

    await expect(client.get('https://api.example.test/me', undefined, { auth: true })).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(2);
    expect(tokens.invalidate).toHaveBeenCalledTimes(1);
  });

  it('does not refresh for a public request', async () => {
    const { send, requests } = scriptedSender([respond(401, '')]);
    const { client, tokens } = createClient(send);

    await expect(client.get('https://api.example.test/public', undefined, { auth: false })).rejects.toBeInstanceOf(AuthError);
    expect(requests).toHaveLength(1);
    expect(tokens.invalidate).not.toHaveBeenCalled();
  });

  it('maps 404 to NotFoundError and other 4xx to ApiError', async () => {
    const missing = createClient(scriptedSender([respond(404, { error: 'missing' })]).send).client;
    const invalid = createClient(scriptedSender([respond(400, { error: 'bad request' })]).send).client;

    await expect(missing.get('https://api.example.test/x', undefined, { auth: false })).rejects.toBeInstanceOf(NotFoundError);
    await expect(invalid.get('https://api.example.test/x', undefined, { auth: false })).rejects.toBeInstanceOf(ApiError);
  });

  it('rejects a body that is not JSON', async () => {
    const { client } = createClient(scriptedSender([respond(200, '<html>')]).send);

    await expect(client.get('https://api.example.test/x', undefined, { auth: false })).rejects.toBeInstanceOf(ApiError);
  });

  it('waits between consecutive requests', async () => {
    let clock = 0;
    const delays: number[] = [];
    const { send } = scriptedSender([respond(200, {})]);
    const client = new ApiClient({
      platform: 'deezer',
      tokens: tokenSource(),
      authorize: bearer,
      send,
      now: () => clock,
      sleep: async ms => {
        delays.push(ms);
        clock += ms;
      },
      requestDelayMs: 100
    });

    await client.get('https://api.example.test/a', undefined, { auth: false });
    await client.get('https://api.example.test/b', undefined, { auth: false });
    clock += 250;
    await client.get('https://api.example.test/c', undefined, { auth: false });

    expect(delays).toEqual([100]);
  });

  describe('with Deezer body inspection', () => {
    it('treats quota errors in a 200 body as rate limiting', async () => {
      const { send } = scriptedSender([
        respond(200, { error: { type: 'Exception', message: 'Quota limit exceeded', code: 4 } }),
        respond(200, { data: [] })
      ]);
      const { client, delays } = createClient(send, { platform: 'deezer', inspectBody: inspectDeezerBody });

      await expect(client.get('https://api.example.test/search', undefined, { auth: false })).resolves.toEqual({ data: [] });
      expect(delays).toEqual([1000]);
    });

    it('treats DataException as not found', async () => {
      const { send } = scriptedSender([
        respond(200, { error: { type: 'DataException', message: 'no data', code: 800 } })
      ]);
      const { client } = createClient(send, { platform: 'deezer', inspectBody: inspectDeezerBody });

      await expect(client.get('https://api.example.test/playlist/1', undefined, { auth: false })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});

describe('inspectDeezerBody', () => {
  it('classifies Deezer error bodies', () => {
    expect(inspectDeezerBody({ error: { code: 4 } })).toEqual({ kind: 'rate_limited' });
    expect(inspectDeezerBody({ error: { type: 'OAuthException', message: 'Invalid OAuth access token.', code: 300 } })).toEqual({
      kind: 'unauthorized'
    });
    expect(inspectDeezerBody({ error: { type: 'DataException', message: 'no data', code: 800 } })).toEqual({
      kind: 'not_found',
      message: 'no data'
    });
    expect(inspectDeezerBody({ error: { type: 'ParameterException', message: 'Wrong parameter', code: 500 } })).toEqual({
      kind: 'error',
      message: 'ParameterException: Wrong parameter'
    });
  });

  it('accepts regular payloads', () => {
    expect(inspectDeezerBody({ data: [] })).toBeNull();
    expect(inspectDeezerBody(true)).toBeNull();
  });
});

describe('withSearchParams', () => {
  it('keeps the query of a next-page link', () => {
    expect(
      withSearchParams('https://api.deezer.com/playlist/1/tracks?index=100&limit=100', { access_token: 'test-token' })
    ).toBe('https://api.deezer.com/playlist/1/tracks?index=100&limit=100&access_token=test-token');
  });

  it('returns the URL untouched without parameters', () => {
    expect(withSearchParams('https://api.deezer.com/user/me', undefined)).toBe('https://api.deezer.com/user/me');
  });
});

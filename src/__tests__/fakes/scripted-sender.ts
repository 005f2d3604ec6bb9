import type { ApiRequest, ApiResponse, RequestSender } from '../../platforms/http-client.js';

export const respond = (
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {}
): ApiResponse => ({
  statusCode,
  headers,
  body: typeof body === 'string' ? body : JSON.stringify(body),
  url: 'https://api.example.test/'
});

/**
 * Sender answering from a script; the last entry repeats once the others are used
 * An Error entry is thrown as a transport failure
 */
export function scriptedSender(script: Array<ApiResponse | Error>): { send: RequestSender; requests: ApiRequest[] } {
  const requests: ApiRequest[] = [];
  const remaining = [...script];

  const send: RequestSender = async request => {
    requests.push(request);
    const next = remaining.length > 1 ? remaining.shift() : remaining[0];
    if (!next) {
      throw new Error('no scripted response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };

  return { send, requests };
}

/**
 * Sender routing by URL path, for clients that issue several kinds of request
 */
export function routedSender(routes: Record<string, (request: ApiRequest) => ApiResponse>): {
  send: RequestSender;
  requests: ApiRequest[];
} {
  const requests: ApiRequest[] = [];
  const send: RequestSender = async request => {
    requests.push(request);
    const route = routes[`${request.method} ${new URL(request.url).pathname}`];
    return route ? route(request) : respond(404, { error: 'no route' });
  };
  return { send, requests };
}

export const recordingSleep = (): { sleep: (ms: number) => Promise<void>; delays: number[] } => {
  const delays: number[] = [];
  return {
    delays,
    sleep: async ms => {
      delays.push(ms);
    }
  };
};

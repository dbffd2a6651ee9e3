import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { AuthTimeoutError } from '../errors.js';
import type { CallbackParams } from '../../types/index.js';

export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60_000;

export interface CallbackServer {
  port: number;
  waitForCallback(): Promise<CallbackParams>;
  close(): Promise<void>;
}

export interface CallbackServerOptions {
  timeoutMs?: number;
  listenPort?: number; // overrides the redirect URI's port, 0 picks a free one
}

export function parseCallbackUrl(input: string): CallbackParams {
  const url = new URL(input.trim(), 'http://localhost');
  return readParams(url.searchParams);
}

function readParams(search: URLSearchParams): CallbackParams {
  const params: CallbackParams = {};
  const code = search.get('code');
  const state = search.get('state');
  const error = search.get('error');
  if (code) params.code = code;
  if (state) params.state = state;
  if (error) params.error = error;
  return params;
}

function send(res: ServerResponse, status: number, body: string): void {
  res.statusCode = status;
  res.setHeader('content-type', 'text/plain; charset=utf-8');
  res.end(body);
}

/**
 * Listens on the redirect URI's loopback address for exactly one OAuth2
 * redirect. Other paths get a 404 and keep the server waiting.
 */
export async function startCallbackServer(
  redirectUri: string,
  options: CallbackServerOptions = {}
): Promise<CallbackServer> {
  const target = new URL(redirectUri);
  const timeoutMs = options.timeoutMs ?? DEFAULT_CALLBACK_TIMEOUT_MS;
  const host = target.hostname.replace(/^\[|\]$/g, '');
  const port = options.listenPort ?? (target.port ? Number(target.port) : 80);

  let received: CallbackParams | undefined;
  let notify: ((params: CallbackParams) => void) | undefined;
  let timer: NodeJS.Timeout | undefined;

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== target.pathname || received) {
      send(res, 404, 'Not found');
      return;
    }

    received = readParams(url.searchParams);
    send(
      res,
      200,
      received.error
        ? `Authorization failed: ${received.error}. You can close this window.`
        : 'Authorization received. You can close this window and return to the terminal.'
    );
    notify?.(received);
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const waitForCallback = () =>
    new Promise<CallbackParams>((resolve, reject) => {
      if (received) {
        resolve(received);
        return;
      }
      timer = setTimeout(() => reject(new AuthTimeoutError(timeoutMs)), timeoutMs);
      notify = (params) => {
        clearTimeout(timer);
        resolve(params);
      };
    });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      clearTimeout(timer);
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    await close();
    throw new Error(`Callback server is not listening on a TCP port (${address ?? 'no address'})`);
  }

  return {
    port: address.port,
    waitForCallback,
    close,
  };
}

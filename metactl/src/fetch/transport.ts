import { Agent, fetch, type Dispatcher } from "undici";

/** Delay before the first TCP keepalive packet on pooled connections. */
export const KEEPALIVE_MS = 10_000;

export type HttpRequest = {
  headers: Record<string, string>;
  signal: AbortSignal;
};

export interface HttpResponse {
  readonly status: number;
  /** Reads the whole body. May reject independently of the request. */
  bytes(): Promise<Uint8Array>;
}

/**
 * One GET per call. Implementations reject only for transport failures; a
 * response of any status resolves. `signal` must be honoured for both the
 * request and the body read.
 */
export interface HttpTransport {
  get(url: string, req: HttpRequest): Promise<HttpResponse>;
}

/** Transport over undici's fetch with a keepalive-enabled connection pool. */
export class UndiciTransport implements HttpTransport {
  private readonly agent: Dispatcher;

  /** `dispatcher` replaces the keepalive agent, e.g. with undici's `MockAgent`. */
  constructor(opts: { keepAliveMs?: number; dispatcher?: Dispatcher } = {}) {
    this.agent =
      opts.dispatcher ??
      new Agent({
        connect: { keepAlive: true, keepAliveInitialDelay: opts.keepAliveMs ?? KEEPALIVE_MS },
      });
  }

  async get(url: string, req: HttpRequest): Promise<HttpResponse> {
    const res = await fetch(url, {
      method: "GET",
      headers: req.headers,
      signal: req.signal,
      dispatcher: this.agent,
    });

    return {
      status: res.status,
      bytes: async () => new Uint8Array(await res.arrayBuffer()),
    };
  }

  close(): Promise<void> {
    return this.agent.close();
  }
}

let shared: UndiciTransport | undefined;

export function sharedTransport(): UndiciTransport {
  if (!shared) shared = new UndiciTransport();
  return shared;
}

export async function closeSharedTransport(): Promise<void> {
  const transport = shared;
  shared = undefined;
  if (transport) await transport.close();
}

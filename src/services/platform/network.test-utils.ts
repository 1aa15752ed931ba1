/**
 * Behavioral mock for HttpClient.
 *
 * Provides:
 * - Request history tracking via `mock.$.requests`
 * - Response configuration per URL (single response or a sequence)
 * - Network error simulation
 *
 * Also provides a local test server for boundary tests.
 */

import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";
import { Response } from "undici";
import type { HttpClient, HttpRequestOptions } from "./network.js";

// =============================================================================
// Mock HttpClient
// =============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions | undefined;
}

/**
 * Response configuration - stores DATA, not Response objects.
 * A fresh Response is constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  readonly body?: string | Uint8Array;
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  readonly error?: Error; // Throw this instead of returning response
}

/** Mock state - pure data. */
export interface HttpClientMockState {
  readonly requests: readonly HttpRequestRecord[];
  /** Requests made to a URL, in order. */
  requestsTo(url: string): readonly HttpRequestRecord[];
}

/** Mock type with state access and setup methods. */
export interface MockHttpClient extends HttpClient {
  readonly $: HttpClientMockState;
  /** Always answer `url` with `config`. */
  setResponse(url: string, config: ConfiguredResponse): void;
  /**
   * Answer successive requests to `url` with successive configs.
   * The last entry repeats once the sequence is used up.
   */
  setResponseSequence(url: string, configs: readonly ConfiguredResponse[]): void;
  simulateNetworkDown(): void;
  simulateNetworkUp(): void;
}

/** Factory options. */
export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404, body: "" } */
  defaultResponse?: ConfiguredResponse;
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Configure responses per URL
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://api.github.com/repos/owner/tool/releases/latest": { body: '{"tag_name":"v1.0.0"}' },
 *   },
 * });
 *
 * @example Fail twice, then succeed
 * httpClient.setResponseSequence(url, [{ status: 500 }, { status: 502 }, { body: '{"tag_name":"v2"}' }]);
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const sequences = new Map<string, ConfiguredResponse[]>();
  let networkError: Error | null = null;

  for (const [url, config] of Object.entries(options?.responses ?? {})) {
    sequences.set(url, [config]);
  }

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404, body: "" };

  function nextConfig(url: string): ConfiguredResponse {
    const sequence = sequences.get(url);
    if (!sequence || sequence.length === 0) {
      return defaultResponse;
    }
    if (sequence.length === 1) {
      return sequence[0] ?? defaultResponse;
    }
    return sequence.shift() ?? defaultResponse;
  }

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    requestsTo(url: string): readonly HttpRequestRecord[] {
      return requests.filter((r) => r.url === url);
    },
  };

  return {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      requests.push({ url, options: fetchOptions });

      if (networkError) {
        throw networkError;
      }

      if (fetchOptions?.signal?.aborted) {
        throw Object.assign(new Error("The operation was aborted."), { name: "AbortError" });
      }

      const config = nextConfig(url);
      if (config.error) {
        throw config.error;
      }

      return new Response(config.body ?? null, {
        status: config.status ?? 200,
        ...(config.headers !== undefined && { headers: config.headers }),
      });
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      sequences.set(url, [config]);
    },

    setResponseSequence(url: string, configs: readonly ConfiguredResponse[]): void {
      sequences.set(url, [...configs]);
    },

    simulateNetworkDown(): void {
      networkError = new TypeError("fetch failed");
    },

    simulateNetworkUp(): void {
      networkError = null;
    },
  };
}

// =============================================================================
// Test Server for Boundary Tests
// =============================================================================

/**
 * Route handler for test server.
 */
export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Test HTTP server for boundary tests.
 */
export interface TestServer {
  /** Start the server on 127.0.0.1 with an OS-assigned port. */
  start(): Promise<void>;
  /** Stop the server. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Build URL for a given path. */
  url(path: string): string;
  /** Paths requested so far, in order. */
  readonly requestedPaths: readonly string[];
}

/**
 * Create a test HTTP server with the given routes. Unknown paths answer 404.
 *
 * @example
 * const server = createTestServer({
 *   "/asset.bin": (_req, res) => {
 *     res.writeHead(200);
 *     res.end("payload");
 *   },
 * });
 * await server.start();
 */
export function createTestServer(routes: Record<string, RouteHandler>): TestServer {
  let server: Server | null = null;
  let port: number | null = null;
  const requestedPaths: string[] = [];

  return {
    requestedPaths,

    async start(): Promise<void> {
      if (server) return;

      const created = createHttpServer((req, res) => {
        const path = req.url ?? "";
        requestedPaths.push(path);
        const handler = routes[path];
        if (handler) {
          handler(req, res);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      server = created;

      await new Promise<void>((resolve, reject) => {
        created.once("error", reject);
        created.listen(0, "127.0.0.1", () => {
          const address: AddressInfo | string | null = created.address();
          if (address && typeof address === "object") {
            port = address.port;
          }
          resolve();
        });
      });
    },

    async stop(): Promise<void> {
      const current = server;
      if (!current) return;
      server = null;
      port = null;
      await new Promise<void>((resolve, reject) => {
        current.close((error) => (error ? reject(error) : resolve()));
        current.closeAllConnections();
      });
    },

    url(path: string): string {
      if (port === null) {
        throw new Error("Server not started - call start() first");
      }
      return `http://127.0.0.1:${port}${path}`;
    },
  };
}

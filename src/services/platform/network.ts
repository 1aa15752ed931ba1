/**
 * Network layer interface and implementation.
 *
 * HttpClient performs GET requests with timeout, abort and proxy support.
 * Requests go through undici so a proxy can be applied per request.
 */

import { fetch, ProxyAgent, type Dispatcher, type Response } from "undici";
import type { Logger } from "../logging/index.js";

export type { Response };

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds. Default: 30000 */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Request headers */
  readonly headers?: Readonly<Record<string, string>>;
  /** HTTP(S) proxy URL; direct connection when omitted */
  readonly proxy?: string;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * The timeout and the external signal cover the request until response headers arrive.
   *
   * @returns Response object
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch("https://api.github.com/repos/owner/tool/releases/latest", {
   *   headers: { Accept: "application/vnd.github+json" },
   *   proxy: "http://proxy.internal:3128",
   * });
   * if (response.ok) {
   *   const release = await response.json();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 30000 */
  readonly defaultTimeout?: number;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default implementation of HttpClient.
 * Proxy agents are created once per proxy URL and reused.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;
  private readonly proxyAgents = new Map<string, ProxyAgent>();

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 30000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET", proxy: options?.proxy ?? null });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort);
      }
    }

    const dispatcher = options?.proxy ? this.getProxyAgent(options.proxy) : undefined;

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        ...(options?.headers && { headers: { ...options.headers } }),
        ...(dispatcher && { dispatcher }),
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, error: errorMessage });
      throw error;
    } finally {
      clearTimeout(timeoutId);
      if (externalSignal) {
        externalSignal.removeEventListener("abort", onExternalAbort);
      }
    }
  }

  /**
   * Close all proxy agents. The layer can still be used afterwards.
   */
  async dispose(): Promise<void> {
    const agents = [...this.proxyAgents.values()];
    this.proxyAgents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private getProxyAgent(proxy: string): Dispatcher {
    const existing = this.proxyAgents.get(proxy);
    if (existing) {
      return existing;
    }
    const agent = new ProxyAgent(proxy);
    this.proxyAgents.set(proxy, agent);
    return agent;
  }
}

/**
 * RemoteAgentConnection - JSON-RPC 2.0 over HTTP POST to a remote agent.
 *
 * Expects the remote to:
 *   - accept POST to baseUrl with body { jsonrpc, id, method, params }
 *   - answer "initialize", "session/new" and "session/close" requests
 *   - accept a "session/cancel" notification (no id, no response body needed)
 *
 * The connection itself holds no per-run state beyond a request counter, so
 * one instance can serve concurrent runs; each run opens its own session.
 */

import { z } from "zod";
import { Logger, createLogger } from "../logging/logger";
import { toErrorMessage } from "../errors/layer-errors";
import { armTimer } from "../utils/timers";

export const DEFAULT_REMOTE_TIMEOUT_MS = 30000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RemoteAgentConnectionConfig {
  baseUrl: string;
  displayName?: string;
  /** Per-request timeout unless a call passes its own */
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * - unreachable: network failure or non-2xx status
 * - remote_error: the remote answered with a JSON-RPC error object
 * - timeout: no answer within the timeout
 * - aborted: the caller's signal fired
 * - invalid_response: the body is not a JSON-RPC response
 */
export type RemoteCallErrorKind =
  | "unreachable"
  | "remote_error"
  | "timeout"
  | "aborted"
  | "invalid_response";

export class RemoteCallError extends Error {
  constructor(
    public readonly kind: RemoteCallErrorKind,
    message: string,
    public readonly code?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = "RemoteCallError";
  }
}

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const SessionSchema = z.object({ sessionId: z.string().min(1) });

export class RemoteAgentConnection {
  readonly baseUrl: string;
  readonly displayName: string;

  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private requestId = 0;
  private initializing?: Promise<unknown>;

  constructor(config: RemoteAgentConnectionConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.displayName = config.displayName ?? this.baseUrl;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.headers = { ...(config.headers ?? {}) };
    this.fetchImpl = config.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = config.logger ?? createLogger(`RemoteAgentConnection:${this.displayName}`);
  }

  /**
   * Initialize the protocol with the remote. Sent once per connection;
   * a failed attempt is retried on the next call.
   */
  initialize(options: CallOptions = {}): Promise<unknown> {
    if (!this.initializing) {
      this.initializing = this.sendRequest("initialize", { protocolVersion: 1 }, options).then(
        (result) => {
          this.logger.info("Initialized", { result });
          return result;
        },
        (error: unknown) => {
          this.initializing = undefined;
          throw error;
        }
      );
    }
    return this.initializing;
  }

  /**
   * Create a session on the remote. Returns the remote's session ID.
   */
  async openSession(params: Record<string, unknown> = {}, options: CallOptions = {}): Promise<string> {
    const result = await this.sendRequest("session/new", params, options);
    const parsed = SessionSchema.safeParse(result);
    if (!parsed.success) {
      throw new RemoteCallError(
        "invalid_response",
        `${this.displayName} returned no session id for session/new`,
        undefined,
        result
      );
    }
    this.logger.debug(`Session opened: ${parsed.data.sessionId}`);
    return parsed.data.sessionId;
  }

  async closeSession(sessionId: string): Promise<void> {
    await this.sendRequest("session/close", { sessionId });
    this.logger.debug(`Session closed: ${sessionId}`);
  }

  /**
   * Call an agent method within a session.
   */
  invoke(
    sessionId: string,
    method: string,
    params: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<unknown> {
    return this.sendRequest(method, { ...params, sessionId }, options);
  }

  /**
   * Ask the remote to stop work in progress on a session.
   */
  async cancel(sessionId: string): Promise<void> {
    await this.sendNotification("session/cancel", { sessionId });
  }

  private async sendRequest(
    method: string,
    params: Record<string, unknown>,
    options: CallOptions = {}
  ): Promise<unknown> {
    const id = ++this.requestId;
    const body = await this.exchange({ jsonrpc: "2.0", id, method, params }, method, options, true);

    const parsed = JsonRpcResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteCallError(
        "invalid_response",
        `${this.displayName} sent a malformed JSON-RPC response to ${method}`,
        undefined,
        body
      );
    }

    const { error, result } = parsed.data;
    if (error) {
      throw new RemoteCallError(
        "remote_error",
        `Remote error [${error.code}] from ${method}: ${error.message}`,
        error.code,
        error.data
      );
    }
    return result;
  }

  private async sendNotification(method: string, params: Record<string, unknown>): Promise<void> {
    await this.exchange({ jsonrpc: "2.0", method, params }, method, {}, false);
  }

  /**
   * POST one message and, when a body is expected, read it as JSON. The
   * timeout and the caller's signal cover the body as well as the headers.
   */
  private async exchange(
    message: Record<string, unknown>,
    method: string,
    options: CallOptions,
    expectBody: boolean
  ): Promise<unknown> {
    if (options.signal?.aborted) {
      throw new RemoteCallError("aborted", `${method} was aborted before it was sent`);
    }

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const state = { timedOut: false };
    const timer = armTimer(timeoutMs, () => {
      state.timedOut = true;
      controller.abort();
    });
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    const interruption = (): RemoteCallError =>
      state.timedOut
        ? new RemoteCallError("timeout", `${method} timed out after ${timeoutMs} ms`)
        : new RemoteCallError("aborted", `${method} was aborted`);
    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(interruption()), { once: true });
    });

    try {
      let response: Response;
      try {
        response = await Promise.race([
          this.fetchImpl(this.baseUrl, {
            method: "POST",
            headers: { "Content-Type": "application/json", ...this.headers },
            body: JSON.stringify(message),
            signal: controller.signal,
          }),
          interrupted,
        ]);
      } catch (error) {
        if (controller.signal.aborted) {
          throw interruption();
        }
        throw new RemoteCallError(
          "unreachable",
          `${this.displayName} is unreachable: ${toErrorMessage(error)}`
        );
      }

      if (!response.ok) {
        await this.discardBody(response);
        throw new RemoteCallError(
          "unreachable",
          `${this.displayName} answered ${method} with HTTP ${response.status}`,
          response.status
        );
      }
      if (!expectBody) {
        await this.discardBody(response);
        return undefined;
      }

      try {
        return await Promise.race([response.json(), interrupted]);
      } catch (error) {
        if (controller.signal.aborted) {
          throw interruption();
        }
        throw new RemoteCallError(
          "invalid_response",
          `${this.displayName} sent a non-JSON response to ${method}: ${toErrorMessage(error)}`
        );
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug("Could not discard response body", { error: toErrorMessage(error) });
    }
  }
}

/**
 * AgentTranslation - maps a layer's payload onto a remote agent call and the
 * agent's answer back onto the layer's output.
 */

import { LayerRunContext } from "../layer/layer";

export interface AgentTranslation<TIn, TOut> {
  /** JSON-RPC method invoked on the remote session */
  method: string;
  toParams(payload: Readonly<TIn>, context: LayerRunContext): Record<string, unknown>;
  /** Throw to signal an answer that cannot be mapped */
  fromResult(result: unknown): TOut;
}

export const DEFAULT_AGENT_METHOD = "agent/invoke";

/**
 * Sends the payload as `input` and hands the result back unchanged; the
 * layer's output schema decides whether it is usable.
 */
export function rawTranslation(method: string = DEFAULT_AGENT_METHOD): AgentTranslation<unknown, unknown> {
  return {
    method,
    toParams: (payload, context) => ({ input: payload, correlationId: context.correlationId }),
    fromResult: (result) => result,
  };
}

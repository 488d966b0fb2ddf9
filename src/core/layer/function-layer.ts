/**
 * defineLayer - build a local layer from plain functions.
 *
 * ```typescript
 * const extractor = defineLayer<Request, ClaimSet>(LayerRole.LEADING, {
 *   name: "claim-extractor",
 *   expectation: { outputSchema: { claim_count: "integer" } },
 *   execute: async (request) => extractClaims(request),
 * });
 * ```
 */

import { LayerRole } from "../models/layer-role";
import { BaseLayerOptions, LayerExpectationInput } from "./base-layer";
import { CandidateRequirements, Layer, LayerRunContext } from "./layer";
import { LeadingLayer } from "./leading-layer";
import { IntermediateLayer, QualityGateMode } from "./intermediate-layer";
import { Finalizer, TerminalLayer } from "./terminal-layer";

export interface LayerFunctions<TIn, TOut> extends BaseLayerOptions {
  expectation: LayerExpectationInput;
  execute: (input: Readonly<TIn>, context: LayerRunContext) => TOut | Promise<TOut>;
  /** Replaces the capability-based pre-flight check */
  validateRequirements?: (candidate: CandidateRequirements) => boolean | Promise<boolean>;
  /** Replaces the default quality signal extraction */
  reportQuality?: (output: TOut) => Record<string, number>;
  /** Intermediate layers only */
  qualityGates?: Readonly<Record<string, number>>;
  qualityGateMode?: QualityGateMode;
  /** Terminal layers only */
  finalizers?: readonly Finalizer<TIn>[];
}

class FunctionLeadingLayer<TIn, TOut> extends LeadingLayer<TIn, TOut> {
  constructor(private readonly fns: LayerFunctions<TIn, TOut>) {
    super(fns.expectation, fns);
  }

  protected async execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.fns.execute(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return this.fns.validateRequirements?.(candidate) ?? super.validateRequirements(candidate);
  }

  override reportQuality(output: TOut): Record<string, number> {
    return this.fns.reportQuality?.(output) ?? super.reportQuality(output);
  }
}

class FunctionIntermediateLayer<TIn, TOut> extends IntermediateLayer<TIn, TOut> {
  constructor(private readonly fns: LayerFunctions<TIn, TOut>) {
    super(fns.expectation, fns);
  }

  protected async execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.fns.execute(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return this.fns.validateRequirements?.(candidate) ?? super.validateRequirements(candidate);
  }

  override reportQuality(output: TOut): Record<string, number> {
    return this.fns.reportQuality?.(output) ?? super.reportQuality(output);
  }
}

class FunctionTerminalLayer<TIn, TOut> extends TerminalLayer<TIn, TOut> {
  constructor(private readonly fns: LayerFunctions<TIn, TOut>) {
    super(fns.expectation, fns);
  }

  protected async execute(input: Readonly<TIn>, context: LayerRunContext): Promise<TOut> {
    return this.fns.execute(input, context);
  }

  override validateRequirements(candidate: CandidateRequirements): boolean | Promise<boolean> {
    return this.fns.validateRequirements?.(candidate) ?? super.validateRequirements(candidate);
  }

  override reportQuality(output: TOut): Record<string, number> {
    return this.fns.reportQuality?.(output) ?? super.reportQuality(output);
  }
}

export function defineLayer<TIn = unknown, TOut = unknown>(
  role: LayerRole,
  fns: LayerFunctions<TIn, TOut>
): Layer<TIn, TOut> {
  switch (role) {
    case LayerRole.LEADING:
      return new FunctionLeadingLayer(fns);
    case LayerRole.INTERMEDIATE:
      return new FunctionIntermediateLayer(fns);
    case LayerRole.TERMINAL:
      return new FunctionTerminalLayer(fns);
  }
}

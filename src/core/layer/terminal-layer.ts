/**
 * TerminalLayer - produces the run's final output. Nothing runs after it.
 */

import { LayerRole } from "../models/layer-role";
import { ContractViolationError } from "../errors/layer-errors";
import { BaseLayer, BaseLayerOptions, LayerExpectationInput } from "./base-layer";

/** Applied to the input, in order, before the layer executes */
export type Finalizer<T> = (input: Readonly<T>) => Readonly<T>;

export interface TerminalLayerOptions<TIn> extends BaseLayerOptions {
  finalizers?: readonly Finalizer<TIn>[];
}

export abstract class TerminalLayer<TIn = unknown, TOut = unknown> extends BaseLayer<TIn, TOut> {
  private readonly finalizers: readonly Finalizer<TIn>[];

  constructor(expectation: LayerExpectationInput, options: TerminalLayerOptions<TIn> = {}) {
    super(LayerRole.TERMINAL, expectation, options);
    this.finalizers = [...(options.finalizers ?? [])];
  }

  protected override prepareInput(input: Readonly<TIn>): Readonly<TIn> {
    return this.finalizers.reduce((current, finalize) => finalize(current), input);
  }

  override emitOutput(targetRole: LayerRole): never {
    throw new ContractViolationError(
      `${this.name} is the terminal layer and cannot delegate to ${targetRole}`,
      { sourceRole: LayerRole.TERMINAL, targetRole }
    );
  }
}

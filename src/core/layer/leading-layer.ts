/**
 * LeadingLayer - turns the raw external request into the first payload.
 */

import { LayerRole } from "../models/layer-role";
import { DirectionBuffer } from "../buffer/direction-buffer";
import { ContractViolationError } from "../errors/layer-errors";
import { BaseLayer, BaseLayerOptions, LayerExpectationInput } from "./base-layer";

export abstract class LeadingLayer<TIn = unknown, TOut = unknown> extends BaseLayer<TIn, TOut> {
  protected override readonly requiresBoundInput: boolean = false;

  constructor(expectation: LayerExpectationInput, options: BaseLayerOptions = {}) {
    super(LayerRole.LEADING, expectation, options);
  }

  /**
   * The leading layer reads the initial request directly; it has no predecessor.
   */
  override bindInput(buffer: DirectionBuffer<TIn>): never {
    throw new ContractViolationError(
      `${this.name} is the leading layer and accepts no input buffer (got one from ${buffer.sourceRole})`,
      { sourceRole: buffer.sourceRole, targetRole: LayerRole.LEADING }
    );
  }
}

import { describe, it, expect } from "@jest/globals";
import { LayerRole } from "../../models/layer-role";
import { ValidationRecord } from "../../buffer/validation-record";
import {
  AdapterTranslationError,
  ContractViolationError,
  PreconditionFailureError,
  StageFailureError,
  isStageFailure,
  toErrorMessage,
} from "../layer-errors";

function record(ruleName: string, passed: boolean, detail: string): ValidationRecord {
  return {
    ruleName,
    kind: "rule",
    passed,
    fatal: false,
    detail,
    timestamp: "2026-01-01T00:00:00.000Z",
    attempt: 1,
    targetRole: LayerRole.TERMINAL,
  };
}

describe("layer errors", () => {
  it("formats only the failed validation records", () => {
    const error = new ContractViolationError("Hand-off rejected", {
      sourceRole: LayerRole.INTERMEDIATE,
      targetRole: LayerRole.TERMINAL,
      validationResults: [
        record("input_schema", true, "payload matches schema (1 declared field)"),
        record("score >= 0.8", false, "score = 0.5, expected >= 0.8"),
      ],
    });

    expect(error.code).toBe("contract_violation");
    expect(error.format()).toBe("Hand-off rejected\n  - score >= 0.8: score = 0.5, expected >= 0.8");
  });

  it("serializes role and reason", () => {
    const error = new StageFailureError(LayerRole.INTERMEDIATE, "timeout", "too slow");

    expect(error.toJSON()).toEqual({
      name: "StageFailureError",
      code: "stage_failure",
      message: "too slow",
      role: LayerRole.INTERMEDIATE,
      reason: "timeout",
    });
  });

  it("treats translation errors as stage failures", () => {
    const error = new AdapterTranslationError(LayerRole.TERMINAL, "bad answer", { raw: true });

    expect(isStageFailure(error)).toBe(true);
    expect(error.reason).toBe("translation_failed");
    expect(error.rawResponse).toEqual({ raw: true });
    expect(isStageFailure(new PreconditionFailureError(LayerRole.LEADING, {}))).toBe(false);
  });

  it("gives precondition failures a default message", () => {
    expect(new PreconditionFailureError(LayerRole.LEADING, {}).message).toBe(
      "Layer LEADING cannot satisfy the requested requirements"
    );
  });

  it("extracts messages from anything thrown", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
  });
});

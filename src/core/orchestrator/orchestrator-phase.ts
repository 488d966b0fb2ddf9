/**
 * OrchestratorPhase - the run state machine.
 *
 * IDLE → RUNNING_LEADING → VALIDATING_TO_INTERMEDIATE → RUNNING_INTERMEDIATE
 *      → VALIDATING_TO_TERMINAL → RUNNING_TERMINAL → COMPLETED
 *
 * ABORTED is reachable from IDLE (failed pre-flight) and from every
 * running or validating phase.
 */

import { LayerRole } from "../models/layer-role";

export enum OrchestratorPhase {
  IDLE = "IDLE",
  RUNNING_LEADING = "RUNNING_LEADING",
  VALIDATING_TO_INTERMEDIATE = "VALIDATING_TO_INTERMEDIATE",
  RUNNING_INTERMEDIATE = "RUNNING_INTERMEDIATE",
  VALIDATING_TO_TERMINAL = "VALIDATING_TO_TERMINAL",
  RUNNING_TERMINAL = "RUNNING_TERMINAL",
  COMPLETED = "COMPLETED",
  ABORTED = "ABORTED",
}

const TRANSITIONS: Record<OrchestratorPhase, readonly OrchestratorPhase[]> = {
  [OrchestratorPhase.IDLE]: [OrchestratorPhase.RUNNING_LEADING, OrchestratorPhase.ABORTED],
  [OrchestratorPhase.RUNNING_LEADING]: [
    OrchestratorPhase.VALIDATING_TO_INTERMEDIATE,
    OrchestratorPhase.ABORTED,
  ],
  [OrchestratorPhase.VALIDATING_TO_INTERMEDIATE]: [
    OrchestratorPhase.RUNNING_INTERMEDIATE,
    OrchestratorPhase.ABORTED,
  ],
  [OrchestratorPhase.RUNNING_INTERMEDIATE]: [
    OrchestratorPhase.VALIDATING_TO_TERMINAL,
    OrchestratorPhase.ABORTED,
  ],
  [OrchestratorPhase.VALIDATING_TO_TERMINAL]: [
    OrchestratorPhase.RUNNING_TERMINAL,
    OrchestratorPhase.ABORTED,
  ],
  [OrchestratorPhase.RUNNING_TERMINAL]: [OrchestratorPhase.COMPLETED, OrchestratorPhase.ABORTED],
  [OrchestratorPhase.COMPLETED]: [],
  [OrchestratorPhase.ABORTED]: [],
};

export function canTransition(from: OrchestratorPhase, to: OrchestratorPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalPhase(phase: OrchestratorPhase): boolean {
  return phase === OrchestratorPhase.COMPLETED || phase === OrchestratorPhase.ABORTED;
}

/** Phase in which a role's layer runs */
export function runningPhaseFor(role: LayerRole): OrchestratorPhase {
  switch (role) {
    case LayerRole.LEADING:
      return OrchestratorPhase.RUNNING_LEADING;
    case LayerRole.INTERMEDIATE:
      return OrchestratorPhase.RUNNING_INTERMEDIATE;
    case LayerRole.TERMINAL:
      return OrchestratorPhase.RUNNING_TERMINAL;
  }
}

/** Phase in which a buffer addressed to a role is validated */
export function validatingPhaseFor(target: LayerRole): OrchestratorPhase {
  return target === LayerRole.INTERMEDIATE
    ? OrchestratorPhase.VALIDATING_TO_INTERMEDIATE
    : OrchestratorPhase.VALIDATING_TO_TERMINAL;
}

/**
 * Tracks the current phase of one run and rejects illegal moves.
 */
export class PhaseTracker {
  private current: OrchestratorPhase = OrchestratorPhase.IDLE;
  private readonly visited: OrchestratorPhase[] = [OrchestratorPhase.IDLE];

  get phase(): OrchestratorPhase {
    return this.current;
  }

  get history(): readonly OrchestratorPhase[] {
    return [...this.visited];
  }

  /**
   * @returns the phase that was left
   * @throws Error on a transition not in the table
   */
  transition(to: OrchestratorPhase): OrchestratorPhase {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal orchestrator transition ${from} → ${to}`);
    }
    this.current = to;
    this.visited.push(to);
    return from;
  }
}

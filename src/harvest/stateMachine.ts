import { IllegalTransitionError } from "../core/errors";

export type HarvestPhase = "init" | "resuming" | "paginating" | "finalizing" | "complete";

const TRANSITIONS: Record<HarvestPhase, readonly HarvestPhase[]> = {
  init: ["paginating", "resuming"],
  resuming: ["paginating"],
  paginating: ["finalizing"],
  finalizing: ["complete"],
  complete: [],
};

export class HarvestStateMachine {
  private current: HarvestPhase = "init";

  get phase(): HarvestPhase {
    return this.current;
  }

  canTransition(to: HarvestPhase): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: HarvestPhase): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
  }
}

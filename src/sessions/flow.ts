// ============================================================================
// STEP SEQUENCES
// ============================================================================
// A guided flow is a fixed, ordered list of named steps. Moves only go forward.

export class StepSequence<S extends string> {
  private readonly order: Map<S, number>;

  constructor(readonly steps: readonly S[]) {
    if (steps.length === 0) {
      throw new Error("A step sequence needs at least one step");
    }
    this.order = new Map(steps.map((step, index) => [step, index]));
    if (this.order.size !== steps.length) {
      throw new Error("Step names must be unique");
    }
  }

  get first(): S {
    return this.steps[0];
  }

  get last(): S {
    return this.steps[this.steps.length - 1];
  }

  indexOf(step: S): number {
    const index = this.order.get(step);
    if (index === undefined) {
      throw new Error(`Unknown step: ${step}`);
    }
    return index;
  }

  /**
   * The step after `step`, or null at the end
   */
  next(step: S): S | null {
    const index = this.indexOf(step);
    return index + 1 < this.steps.length ? this.steps[index + 1] : null;
  }

  /**
   * Whether moving from `from` to `to` goes forward
   */
  canAdvance(from: S, to: S): boolean {
    return this.indexOf(to) > this.indexOf(from);
  }

  /**
   * Move from `from` to `to`; throws on a backward or same-step move
   */
  advance(from: S, to: S): S {
    if (!this.canAdvance(from, to)) {
      throw new Error(`Cannot move from ${from} back to ${to}`);
    }
    return to;
  }

  isLast(step: S): boolean {
    return this.indexOf(step) === this.steps.length - 1;
  }
}

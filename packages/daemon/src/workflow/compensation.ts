/**
 * CompensationStack - undo log for a multi-step settlement call.
 *
 * Each completed local effect pushes its inverse. On failure, unwind() runs
 * the inverses newest-first. An inverse that fails is logged and the rest
 * still run; the original error is what the caller rethrows.
 */

export interface CompensationFailure {
  label: string;
  error: unknown;
}

export class CompensationStack {
  private readonly steps: Array<{ label: string; undo: () => Promise<void> }> = [];

  get size(): number {
    return this.steps.length;
  }

  push(label: string, undo: () => Promise<void>): void {
    this.steps.push({ label, undo });
  }

  /** Forget all steps once the call has committed. */
  clear(): void {
    this.steps.length = 0;
  }

  async unwind(): Promise<CompensationFailure[]> {
    const failures: CompensationFailure[] = [];
    for (let step = this.steps.pop(); step; step = this.steps.pop()) {
      try {
        await step.undo();
      } catch (error) {
        console.error(`CompensationStack: undo '${step.label}' failed:`, error);
        failures.push({ label: step.label, error });
      }
    }
    return failures;
  }
}

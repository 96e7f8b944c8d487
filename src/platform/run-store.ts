import { RunSummary } from "../pipeline/pipeline.types";

/**
 * In-memory record of runs started through the API, newest last.
 */
export class RunStore {
  private readonly runs = new Map<string, RunSummary>();
  private active: Promise<RunSummary> | undefined;

  get isRunning(): boolean {
    return this.active !== undefined;
  }

  /** Runs `start` unless another run is in flight; returns undefined if one is. */
  async runExclusive(start: () => Promise<RunSummary>): Promise<RunSummary | undefined> {
    if (this.active) return undefined;

    this.active = start();
    try {
      const summary = await this.active;
      this.runs.set(summary.executionId, summary);
      return summary;
    } finally {
      this.active = undefined;
    }
  }

  get(id: string): RunSummary | undefined {
    return this.runs.get(id);
  }

  list(): RunSummary[] {
    return [...this.runs.values()];
  }
}

import { logger } from "@tradewire/core";

export interface StageTiming {
  readonly stage: string;
  readonly ms: number;
}

/** Splits one operation into named stages and logs how long each took. */
export class StageTimer {
  private readonly timings: StageTiming[] = [];
  private current: string;
  private started: number;
  private finished = false;

  constructor(
    private readonly label: string,
    firstStage: string,
    private readonly now: () => number = () => performance.now(),
  ) {
    this.current = firstStage;
    this.started = this.now();
  }

  stage(next: string): void {
    this.record();
    this.current = next;
  }

  /** Closes the current stage; later calls return the same timings. */
  finish(): StageTiming[] {
    if (!this.finished) {
      this.record();
      this.finished = true;
      logger.scope("trade").log("timings", {
        label: this.label,
        stages: Object.fromEntries(this.timings.map((t) => [t.stage, t.ms])),
      });
    }
    return [...this.timings];
  }

  private record(): void {
    const t = this.now();
    this.timings.push({ stage: this.current, ms: Math.round((t - this.started) * 1000) / 1000 });
    this.started = t;
  }
}

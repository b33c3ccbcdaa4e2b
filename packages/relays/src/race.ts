import { AllRelaysFailed, NetworkError, ValidationError, toError, type RelayFailure } from "@tradewire/core";

export interface RaceTask<T> {
  readonly name: string;
  readonly timeoutMs: number;
  run(signal: AbortSignal): Promise<T>;
}

export interface RaceWinner<T> {
  readonly name: string;
  readonly index: number;
  readonly value: T;
  readonly elapsedMs: number;
}

/**
 * Runs every task at once, each under its own timeout and abort signal. Resolves with the
 * first success and aborts the others; rejects with AllRelaysFailed, failures in task order,
 * once every task has failed. Results arriving after the race is decided are ignored.
 */
export function firstSuccess<T>(tasks: readonly RaceTask<T>[]): Promise<RaceWinner<T>> {
  if (!tasks.length) return Promise.reject(new ValidationError("relays", "no relays selected"));
  const started = performance.now();
  return new Promise<RaceWinner<T>>((resolve, reject) => {
    const controllers = tasks.map(() => new AbortController());
    const timers: Array<ReturnType<typeof setTimeout> | undefined> = tasks.map(() => undefined);
    const failures: Array<RelayFailure | undefined> = tasks.map(() => undefined);
    let pending = tasks.length;
    let settled = false;

    const clearAll = (): void => {
      for (const t of timers) if (t !== undefined) clearTimeout(t);
    };

    tasks.forEach((task, i) => {
      const ctrl = controllers[i];
      const fail = (error: Error): void => {
        if (settled || failures[i]) return;
        failures[i] = { relay: task.name, error };
        clearTimeout(timers[i]);
        ctrl.abort(error);
        if (--pending === 0) {
          settled = true;
          reject(new AllRelaysFailed(failures.flatMap((f) => (f ? [f] : []))));
        }
      };

      timers[i] = setTimeout(
        () => fail(new NetworkError(`${task.name} timed out after ${task.timeoutMs}ms`)),
        task.timeoutMs,
      );

      let run: Promise<T>;
      try {
        run = task.run(ctrl.signal);
      } catch (e) {
        run = Promise.reject(e);
      }
      run.then(
        (value) => {
          if (settled || failures[i]) return;
          settled = true;
          clearAll();
          controllers.forEach((c, j) => {
            if (j !== i) c.abort(new NetworkError(`superseded by ${task.name}`));
          });
          resolve({ name: task.name, index: i, value, elapsedMs: Math.round(performance.now() - started) });
        },
        (e: unknown) => fail(toError(e)),
      );
    });
  });
}

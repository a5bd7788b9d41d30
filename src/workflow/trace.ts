import { AsyncChannel } from './async-channel.js';
import type { ExecutionStep, StepKind, StepOf } from './types.js';

export type StepListener = (step: ExecutionStep) => void;

/**
 * Append-only record of build and run steps. Entries are frozen on the way in
 * and listeners see them in the order they were recorded.
 */
export class ExecutionTrace {
  private entries: ExecutionStep[] = [];
  private listeners: StepListener[] = [];

  record(step: ExecutionStep): ExecutionStep {
    const entry: ExecutionStep = Object.freeze({ ...step });
    this.entries.push(entry);
    for (const listener of this.listeners) {
      listener(entry);
    }
    return entry;
  }

  subscribe(listener: StepListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  get steps(): readonly ExecutionStep[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  ofKind<K extends StepKind>(kind: K): StepOf<K>[] {
    return this.entries.filter((entry): entry is StepOf<K> => entry.step === kind);
  }

  /**
   * Runs `task` and yields every step recorded while it is in flight. The
   * generator's return value is the task's result; a task failure is rethrown
   * once the recorded steps have been drained.
   */
  async *follow<T>(task: () => Promise<T>): AsyncGenerator<ExecutionStep, T, undefined> {
    const channel = new AsyncChannel<ExecutionStep>();
    const unsubscribe = this.subscribe(step => channel.push(step));

    const outcome = task()
      .then(
        (value) => ({ ok: true as const, value }),
        (error: unknown) => ({ ok: false as const, error }),
      )
      .finally(() => {
        unsubscribe();
        channel.close();
      });

    try {
      for await (const step of channel) {
        yield step;
      }
    } finally {
      unsubscribe();
    }

    const result = await outcome;
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }
}

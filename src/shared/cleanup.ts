// Collects teardown steps. Steps run newest-first, each at most once, and a
// failing step is logged and recorded but never rethrown.
import { componentLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = componentLogger('cleanup');

export interface CleanupFailure {
  label: string;
  error: string;
}

export class CleanupSink {
  private steps: Array<{ label: string; fn: () => Promise<void> | void }> = [];
  private failures: CleanupFailure[] = [];

  add(label: string, fn: () => Promise<void> | void): void {
    this.steps.push({ label, fn });
  }

  get pending(): number {
    return this.steps.length;
  }

  async run(): Promise<CleanupFailure[]> {
    const steps = this.steps.reverse();
    this.steps = [];
    for (const step of steps) {
      try {
        await step.fn();
      } catch (err) {
        const failure = { label: step.label, error: errorMessage(err) };
        this.failures.push(failure);
        log.warn(failure, 'cleanup step failed');
      }
    }
    return [...this.failures];
  }
}

// Soft assertions: every mismatch in a test is recorded rather than stopping at
// the first one, so a single run reports all of them. Feed `errors` into
// writeSummary(), then call assertAll() to fail the test.
import { isPlainObject } from '../shared/objects.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import type { HttpResult, RequestLog } from './client.js';

export class AssertionFailure extends Error {
  readonly failures: readonly string[];

  constructor(failures: readonly string[]) {
    super(`${failures.length} assertion(s) failed:\n${failures.map(f => `  - ${f}`).join('\n')}`);
    this.name = 'AssertionFailure';
    this.failures = failures;
  }
}

export class SoftAssertions {
  private readonly failures: string[] = [];

  constructor(private readonly requestLog?: RequestLog) {}

  get errors(): string[] {
    return [...this.failures];
  }

  get passed(): boolean {
    return this.failures.length === 0;
  }

  fail(message: string): void {
    this.failures.push(message);
    this.requestLog?.log('ASSERTION FAILED: %s', message);
  }

  isTrue(condition: boolean, message: string): boolean {
    if (!condition) this.fail(message);
    return condition;
  }

  equals<T>(actual: T, expected: T, label: string): boolean {
    return this.isTrue(Object.is(actual, expected), `${label}: expected ${String(expected)}, got ${String(actual)}`);
  }

  statusIs(result: HttpResult | undefined, expected: number): boolean {
    if (!result) {
      this.fail(`Expected status ${expected}, but there was no response`);
      return false;
    }
    return this.isTrue(result.status === expected, `Expected status ${expected}, got ${result.status}`);
  }

  contains(haystack: string, needle: string, label = 'output'): boolean {
    return this.isTrue(haystack.includes(needle), `Expected ${label} to contain ${JSON.stringify(needle)}`);
  }

  notContains(haystack: string, needle: string, label = 'output'): boolean {
    return this.isTrue(!haystack.includes(needle), `Expected ${label} not to contain ${JSON.stringify(needle)}`);
  }

  /** Parses a JSON object body; records a failure and returns undefined otherwise. */
  jsonObject(result: HttpResult): Record<string, unknown> | undefined {
    const parsed = this.tryJson(result);
    if (isPlainObject(parsed)) return parsed;
    if (parsed !== undefined) this.fail(`Expected a JSON object, got: ${result.text.slice(0, 200)}`);
    return undefined;
  }

  jsonArray(result: HttpResult): unknown[] | undefined {
    const parsed = this.tryJson(result);
    if (Array.isArray(parsed)) return parsed;
    if (parsed !== undefined) this.fail(`Expected a JSON array, got: ${result.text.slice(0, 200)}`);
    return undefined;
  }

  assertAll(): void {
    if (this.failures.length > 0) throw new AssertionFailure(this.errors);
  }

  private tryJson(result: HttpResult): unknown {
    try {
      return result.json();
    } catch (err) {
      if (err instanceof HarnessError && err.code === HarnessErrorCode.PROTOCOL_VIOLATION) {
        this.fail(`Failed to parse JSON: ${result.text.slice(0, 200)}`);
        return undefined;
      }
      throw err;
    }
  }
}

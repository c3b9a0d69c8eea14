/**
 * Result of a best-effort browser step.
 *
 * `skipped` means the thing the step acts on was not there (no cookie banner, no
 * matching button); `failed` means it was there but acting on it threw.
 */
export type StepOutcome<T = undefined> =
  | { status: 'succeeded'; value: T }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string };

export function succeeded<T>(value: T): StepOutcome<T> {
  return { status: 'succeeded', value };
}

export function skipped(reason: string): { status: 'skipped'; reason: string } {
  return { status: 'skipped', reason };
}

export function failed(error: unknown): { status: 'failed'; error: string } {
  return { status: 'failed', error: error instanceof Error ? error.message : String(error) };
}

export function describeOutcome<T>(outcome: StepOutcome<T>): string {
  switch (outcome.status) {
    case 'succeeded':
      return 'succeeded';
    case 'skipped':
      return `skipped (${outcome.reason})`;
    case 'failed':
      return `failed (${outcome.error})`;
  }
}

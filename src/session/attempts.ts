// In-memory log of the scripts submitted during one session, in order.
// Not persisted: only the accepted script leaves the session.
import type { ValidationOutcome } from '../validation/types.js';
import type { Attempt } from './types.js';

export class AttemptTracker {
  private attempts: Attempt[] = [];

  record(attempt: Attempt): void {
    this.attempts.push(attempt);
  }

  getAll(): Attempt[] {
    return [...this.attempts];
  }

  getLatest(): Attempt | undefined {
    return this.attempts[this.attempts.length - 1];
  }

  count(): number {
    return this.attempts.length;
  }

  getScreeningRejections(): Attempt[] {
    return this.attempts.filter(a => !a.screening.accepted);
  }

  countByOutcome(): Partial<Record<ValidationOutcome, number>> {
    const counts: Partial<Record<ValidationOutcome, number>> = {};
    for (const attempt of this.attempts) {
      if (!attempt.verdict) continue;
      const outcome = attempt.verdict.outcome;
      counts[outcome] = (counts[outcome] ?? 0) + 1;
    }
    return counts;
  }
}

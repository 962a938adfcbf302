/**
 * Run-scoped registry of claimed note titles
 *
 * Every title handed out during one export run is recorded here so no two
 * notes end up with the same file. A registry belongs to exactly one run and
 * is not shared between concurrent claimers.
 */

import { formatTimestamp } from '../../utils/dates.js';

export const MAX_NAME_ATTEMPTS = 100;

/**
 * Reports whether a candidate title is already taken outside the registry,
 * typically by a file on disk
 */
export type TitleTakenCheck = (title: string) => boolean;

export class NamingExhaustedError extends Error {
  constructor(
    readonly title: string,
    readonly attempts: number
  ) {
    super(`Could not find a free name for "${title}" after ${attempts} attempts`);
    this.name = 'NamingExhaustedError';
  }
}

/**
 * Candidate titles in the order they are tried:
 * "Title", "Title YYMMDDHHMMSS", "Title YYMMDDHHMMSS 2", "Title YYMMDDHHMMSS 3", ...
 */
export function* candidateTitles(title: string, created: Date): Generator<string> {
  yield title;

  const stamped = title ? `${title} ${formatTimestamp(created)}` : formatTimestamp(created);
  yield stamped;

  for (let counter = 2; ; counter++) {
    yield `${stamped} ${counter}`;
  }
}

export class NameRegistry {
  private readonly claimed = new Set<string>();

  /**
   * Claim the first free candidate for a title.
   * A candidate is free when no earlier claim used it and isTaken rejects it;
   * the check and the claim happen in one synchronous step.
   *
   * @throws NamingExhaustedError after MAX_NAME_ATTEMPTS candidates
   */
  claim(title: string, created: Date, isTaken: TitleTakenCheck = () => false): string {
    let attempts = 0;

    for (const candidate of candidateTitles(title, created)) {
      if (attempts >= MAX_NAME_ATTEMPTS) {
        break;
      }
      attempts++;

      if (!this.claimed.has(candidate) && !isTaken(candidate)) {
        this.claimed.add(candidate);
        return candidate;
      }
    }

    throw new NamingExhaustedError(title, attempts);
  }

  has(title: string): boolean {
    return this.claimed.has(title);
  }

  get size(): number {
    return this.claimed.size;
  }

  titles(): string[] {
    return Array.from(this.claimed);
  }
}

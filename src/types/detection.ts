/**
 * Location Detection Types
 */

export type DetectionOutcome =
  | { status: 'found'; path: string }
  | { status: 'not_found' }
  | { status: 'error'; reason: string };

/**
 * Diagnostic record of one strategy run. Never persisted.
 */
export interface DetectionAttempt {
  strategy: string;
  elapsedMs: number;
  outcome: DetectionOutcome;
}

/**
 * One independent way of guessing the directory the user is looking at.
 * Implementations report internal failures as null instead of throwing.
 */
export interface LocationStrategy {
  readonly name: string;
  detect(): Promise<string | null>;
}

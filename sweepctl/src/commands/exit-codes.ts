import type { OutcomeKind } from "../types/run.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  COMPLETED: 0,
  FAILED: 1,
  ABORTED: 2,
  INVALID_CONFIG: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(kind: OutcomeKind): ExitCode {
  switch (kind) {
    case "completed":
      return EXIT.COMPLETED;
    case "aborted":
      return EXIT.ABORTED;
    case "failed":
      return EXIT.FAILED;
  }
}

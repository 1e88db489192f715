/**
 * Finite state machine for an extraction run.
 *
 * Valid transitions:
 * - `CREATED` → `PROCESSING`
 * - `PROCESSING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const ExtractionStatus = {
  CREATED: 'CREATED',
  PROCESSING: 'PROCESSING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type ExtractionStatus = (typeof ExtractionStatus)[keyof typeof ExtractionStatus];

const VALID_TRANSITIONS: Record<ExtractionStatus, readonly ExtractionStatus[]> = {
  [ExtractionStatus.CREATED]: [ExtractionStatus.PROCESSING],
  [ExtractionStatus.PROCESSING]: [ExtractionStatus.COMPLETED, ExtractionStatus.ABORTED, ExtractionStatus.FAILED],
  [ExtractionStatus.COMPLETED]: [],
  [ExtractionStatus.ABORTED]: [],
  [ExtractionStatus.FAILED]: [],
};

/** Check whether a status transition is allowed. */
export function canTransition(from: ExtractionStatus, to: ExtractionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

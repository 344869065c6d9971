export const ValidationStatus = {
  CREATED: 'CREATED',
  VALIDATING: 'VALIDATING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type ValidationStatus = (typeof ValidationStatus)[keyof typeof ValidationStatus];

const VALID_TRANSITIONS: Record<ValidationStatus, readonly ValidationStatus[]> = {
  [ValidationStatus.CREATED]: [ValidationStatus.VALIDATING],
  [ValidationStatus.VALIDATING]: [ValidationStatus.COMPLETED, ValidationStatus.ABORTED, ValidationStatus.FAILED],
  [ValidationStatus.COMPLETED]: [],
  [ValidationStatus.ABORTED]: [],
  [ValidationStatus.FAILED]: [],
};

export function canTransition(from: ValidationStatus, to: ValidationStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: ValidationStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

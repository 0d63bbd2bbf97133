export const ValidatorStatus = {
  UNINITIALIZED: 'UNINITIALIZED',
  HEADER_CHECKED: 'HEADER_CHECKED',
  STREAMING: 'STREAMING',
  DONE: 'DONE',
  FAILED: 'FAILED',
} as const;

export type ValidatorStatus = (typeof ValidatorStatus)[keyof typeof ValidatorStatus];

const VALID_TRANSITIONS: Record<ValidatorStatus, readonly ValidatorStatus[]> = {
  [ValidatorStatus.UNINITIALIZED]: [ValidatorStatus.HEADER_CHECKED, ValidatorStatus.FAILED],
  [ValidatorStatus.HEADER_CHECKED]: [ValidatorStatus.STREAMING, ValidatorStatus.DONE, ValidatorStatus.FAILED],
  [ValidatorStatus.STREAMING]: [ValidatorStatus.DONE, ValidatorStatus.FAILED],
  [ValidatorStatus.DONE]: [],
  [ValidatorStatus.FAILED]: [],
};

export function canTransition(from: ValidatorStatus, to: ValidatorStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export const CaseStatus = {
  PASSED: 'passed',
  FAILED: 'failed',
  ERRORED: 'errored',
  SKIPPED: 'skipped',
} as const;

export type CaseStatusType = (typeof CaseStatus)[keyof typeof CaseStatus];

export const CaseKind = {
  RESOLVED: 'resolved',
  UNRESOLVED: 'unresolved',
} as const;

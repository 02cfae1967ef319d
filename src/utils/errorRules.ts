import { FailureKind } from './errors';

export interface ErrorRule {
  /** Case-sensitive substring of the booking API's error message. */
  pattern: string;
  kind: FailureKind;
}

/** Evaluated top to bottom; first hit wins. */
export const CREATE_BOOKING_ERROR_RULES: readonly ErrorRule[] = [
  { pattern: 'Invalid event length', kind: 'INVALID_DURATION' },
  { pattern: 'Attempting to book a meeting in the past', kind: 'PAST_INSTANT' },
  { pattern: 'invalid_type', kind: 'MISSING_REQUIRED_FIELD' },
];

export function classifyErrorMessage(
  message: string,
  rules: readonly ErrorRule[] = CREATE_BOOKING_ERROR_RULES,
  fallback: FailureKind = 'EXTERNAL_SERVICE'
): FailureKind {
  const rule = rules.find((r) => message.includes(r.pattern));
  return rule ? rule.kind : fallback;
}

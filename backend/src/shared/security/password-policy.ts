/**
 * src/shared/security/password-policy.ts
 *
 * WHY:
 * - One strength policy for every place a password is set (reset, change, seed).
 * - Every missing character class is reported, not just the first.
 *
 * RULES:
 * - Pure function; no I/O.
 */

export type PasswordPolicy = {
  minLength: number;
};

export type PasswordViolation =
  | 'too_short'
  | 'missing_uppercase'
  | 'missing_lowercase'
  | 'missing_digit'
  | 'missing_symbol';

export type PasswordValidationResult =
  | { ok: true }
  | { ok: false; violations: PasswordViolation[] };

const CLASS_CHECKS: ReadonlyArray<[PasswordViolation, RegExp]> = [
  ['missing_uppercase', /\p{Lu}/u],
  ['missing_lowercase', /\p{Ll}/u],
  ['missing_digit', /\p{Nd}/u],
  ['missing_symbol', /[^\p{L}\p{Nd}\s]/u],
];

const VIOLATION_MESSAGES: Record<PasswordViolation, string> = {
  too_short: 'is too short',
  missing_uppercase: 'needs an uppercase letter',
  missing_lowercase: 'needs a lowercase letter',
  missing_digit: 'needs a digit',
  missing_symbol: 'needs a symbol',
};

export function validatePassword(password: string, policy: PasswordPolicy): PasswordValidationResult {
  const violations: PasswordViolation[] = [];

  if ([...password].length < policy.minLength) violations.push('too_short');

  for (const [violation, pattern] of CLASS_CHECKS) {
    if (!pattern.test(password)) violations.push(violation);
  }

  return violations.length === 0 ? { ok: true } : { ok: false, violations };
}

export function describeViolations(violations: readonly PasswordViolation[]): string {
  return `Password ${violations.map((v) => VIOLATION_MESSAGES[v]).join(', ')}.`;
}

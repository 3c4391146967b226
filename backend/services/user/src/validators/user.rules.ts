// backend/services/user/src/validators/user.rules.ts

/**
 * Pure field rules. They never mutate their input and never throw.
 */

export type RuleResult = { ok: true } | { ok: false; message: string };

export const MSG_REQUIRED = "Name and Email are required";
export const MSG_EMAIL_FORMAT = "Invalid email format";

/**
 * local@domain.tld: domain has at least one dot, TLD is 2 to 4 chars.
 * Word characters are Unicode (letters, marks, digits, connectors), so
 * `josé@example.com` and `user@bücher.de` pass.
 */
export const EMAIL_PATTERN =
  /^[\p{L}\p{Mn}\p{Nd}\p{Pc}.-]+@([\p{L}\p{Mn}\p{Nd}\p{Pc}-]+\.)+[\p{L}\p{Mn}\p{Nd}\p{Pc}-]{2,4}$/u;

const PASS: RuleResult = { ok: true };

/** Both fields present and non-empty (whitespace counts as present). */
export function requiredFields(user: {
  name?: string | null;
  email?: string | null;
}): RuleResult {
  if (!user.name || !user.email) return { ok: false, message: MSG_REQUIRED };
  return PASS;
}

export function emailFormat(email: string): RuleResult {
  return EMAIL_PATTERN.test(email)
    ? PASS
    : { ok: false, message: MSG_EMAIL_FORMAT };
}

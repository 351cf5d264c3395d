/**
 * Hide most of the local part of an address, e.g. `alice@x.com` -> `a***e@x.com`.
 */
export function maskEmailAddress(email: string): string {
  const index = email.indexOf('@');
  if (index < 1) {
    throw new Error('Please provide a valid email address.');
  }
  if (index === 1) {
    return `*${email.slice(index)}`;
  }
  return `${email[0]}${'*'.repeat(index - 2)}${email.slice(index - 1)}`;
}

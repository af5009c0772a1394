/**
 * Hides all but the first `visibleChars` characters of a secret.
 * Values no longer than the visible prefix are hidden entirely.
 */
export function maskString(value: string, visibleChars: number = 3): string {
  if (!value || value.length <= visibleChars) {
    return '***';
  }
  return `${value.slice(0, visibleChars)}***`;
}

/** Mask a secret for logs, keeping only its last four characters. */
export function redactSecret(value: string): string {
  if (value.length <= 4) return '****';
  return `****${value.slice(-4)}`;
}

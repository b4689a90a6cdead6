const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a single argument for a POSIX shell. Plain words are left bare so the
 * logged command stays readable.
 */
export function quoteShellArg(value: string): string {
  if (SAFE_ARG.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

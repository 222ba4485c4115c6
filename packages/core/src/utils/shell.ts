/**
 * Shell helpers for building remote command lines
 */

const SAFE_ARGUMENT = /^[A-Za-z0-9_./~=+:,@%-]+$/;

/**
 * Quote an argument for a POSIX shell, leaving plain words untouched
 */
export function shellQuote(argument: string): string {
  if (argument.length > 0 && SAFE_ARGUMENT.test(argument)) {
    return argument;
  }
  return `'${argument.replace(/'/g, `'\\''`)}'`;
}

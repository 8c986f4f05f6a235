/**
 * POSIX shell quoting for command arguments
 */

const SAFE_ARGUMENT = /^[A-Za-z0-9_\-.,:/@+=%]+$/;

/**
 * Quote a single argument for `sh`
 *
 * Arguments made only of safe characters are returned unchanged so that
 * logged command lines stay readable.
 *
 * @example
 * ```typescript
 * shellQuote('master');        // master
 * shellQuote('Alice Smith');   // 'Alice Smith'
 * shellQuote("it's");          // 'it'\''s'
 * ```
 */
export function shellQuote(value: string): string {
  if (SAFE_ARGUMENT.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Build a command line from a program and its arguments
 */
export function shellJoin(args: readonly string[]): string {
  return args.map(shellQuote).join(" ");
}

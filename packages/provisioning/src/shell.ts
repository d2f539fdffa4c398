const SAFE_WORD = /^[\w@%+=:,./-]+$/;

/** POSIX single-quoting; words made only of safe characters pass through. */
export function shellQuote(value: string): string {
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** ` --<flag>=<value>` with the value quoted for the remote shell. */
export function shellOption(flag: string, value: string | number): string {
  return ` --${flag}=${shellQuote(String(value))}`;
}

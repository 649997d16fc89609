/** Single-quotes a value for POSIX sh. */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_./:@%+=-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function joinLines(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}

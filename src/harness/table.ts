/** Rows rendered as left-aligned columns separated by two spaces, without a header. */
export function formatTable(rows: readonly Record<string, string>[], cols: readonly string[]): string[] {
  const widths = cols.map((col) => rows.reduce((max, row) => Math.max(max, (row[col] ?? '').length), 0));
  return rows.map((row) => cols
    .map((col, i) => (row[col] ?? '').padEnd(widths[i]))
    .join('  ')
    .trimEnd());
}

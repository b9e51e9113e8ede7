/**
 * Shared formatting utilities for CLI output.
 */

/**
 * Format a markdown table with aligned columns.
 */
export const formatTable = (
  headers: readonly string[],
  rows: readonly (readonly string[])[]
): string => {
  const widths = headers.map((h, i) => {
    const cellWidths = rows.map((row) => (row[i] ?? '').length);
    return Math.max(h.length, ...cellWidths);
  });

  const pad = (text: string, colIndex: number): string => text.padEnd(widths[colIndex] ?? text.length);

  const headerRow = '| ' + headers.map((h, i) => pad(h, i)).join(' | ') + ' |';
  const separator = '|' + widths.map((w) => '-'.repeat(w + 2)).join('|') + '|';
  const dataRows = rows.map((row) => '| ' + headers.map((_, i) => pad(row[i] ?? '', i)).join(' | ') + ' |');

  return [headerRow, separator, ...dataRows].join('\n');
};

/** `Home -> Menu -> Settings`, or a note when there is no route. */
export const formatRoute = (path: readonly string[]): string =>
  path.length === 0 ? '(no route)' : path.join(' -> ');

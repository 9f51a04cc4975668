/**
 * Bordered text table. Cells may span several lines; columns size to their
 * widest line and are never truncated.
 */
export function renderTable(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const columnCount = header.length;
  const splitRow = (cells: readonly string[]): string[][] =>
    Array.from({ length: columnCount }, (_, i) => (cells[i] ?? "").split("\n"));

  const headerCells = splitRow(header);
  const bodyCells = rows.map(splitRow);

  const widths = header.map((_, column) =>
    Math.max(...[headerCells, ...bodyCells].flatMap(row => row[column].map(line => line.length)))
  );

  const border = (fill: string) => `+${widths.map(w => fill.repeat(w + 2)).join("+")}+`;

  const drawRow = (cells: string[][]): string[] => {
    const height = Math.max(...cells.map(lines => lines.length));
    const lines: string[] = [];
    for (let i = 0; i < height; i += 1) {
      const parts = cells.map((cellLines, column) => (cellLines[i] ?? "").padEnd(widths[column]));
      lines.push(`| ${parts.join(" | ")} |`);
    }
    return lines;
  };

  const output = [border("-"), ...drawRow(headerCells), border("=")];
  for (const row of bodyCells) {
    output.push(...drawRow(row), border("-"));
  }
  return output.join("\n");
}

/**
 * Text of each direct child cell of a row, indexed from 0 for column 1.
 * A position occupied by anything other than a `<td>` reads as `""`, the
 * same as `td:nth-child(n)` finding nothing there.
 */
export function readCells(row: Element): string[] {
  return Array.from(row.children, (child) =>
    child.tagName === 'TD' ? (child.textContent ?? '').trim() : ''
  );
}

/** Cell text at a 1-based column; `""` when the row is shorter. */
export function cellAt(cells: readonly string[], column: number): string {
  return cells[column - 1] ?? '';
}

/** Trimmed text of the first match, or `""` when nothing matches. */
export function selectText(root: ParentNode, selector: string): string {
  return (root.querySelector(selector)?.textContent ?? '').trim();
}

export function tableRows(table: Element): Element[] {
  return Array.from(table.querySelectorAll('tr'));
}

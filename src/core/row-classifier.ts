export type RowKind = 'header' | 'data';

/**
 * Header rows are recognised only by an exact first-cell label from the
 * table's allow-list. Unexpected content is treated as data so that it fails
 * parsing loudly instead of being skipped.
 */
export function classifyRow(cells: readonly string[], headerLabels: readonly string[]): RowKind {
  const first = cells[0] ?? '';
  return headerLabels.includes(first) ? 'header' : 'data';
}

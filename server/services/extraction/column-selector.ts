import type { ColumnConvention } from '../../config';
import { parsePeriodHeader, parseReportNumber } from './numbers';

export type ColumnSelection =
  | { kind: 'selected'; columnIndex: number; value: number; cell: string }
  | { kind: 'undecidable'; reason: string };

function undecidable(reason: string): ColumnSelection {
  return { kind: 'undecidable', reason };
}

function selectCell(valueCells: readonly string[], columnIndex: number): ColumnSelection {
  const cell = valueCells[columnIndex];
  const value = parseReportNumber(cell);
  if (value === null) {
    return undecidable(`column ${columnIndex} holds no number ("${cell}")`);
  }
  return { kind: 'selected', columnIndex, value, cell };
}

/**
 * Picks the current-period column of a multi-period row. Each cell is
 * parsed on its own; values from different columns are never joined.
 *
 * With a header, the column whose period ends latest wins and anything the
 * header cannot decide (unparseable cell, tie, column count mismatch) fails
 * closed. `noteColumns` counts text columns the header puts before its
 * periods; a row with a cell for each of them has those cells skipped.
 * Without a header, the document family convention applies.
 */
export function selectCurrentPeriodColumn(
  valueCells: readonly string[],
  headerCells: readonly string[] | null,
  convention: ColumnConvention,
  noteColumns: number = 0
): ColumnSelection {
  if (valueCells.length === 0) {
    return undecidable('row has no value columns');
  }

  if (headerCells && headerCells.length > 0) {
    const offset = noteColumns > 0 && valueCells.length === headerCells.length + noteColumns ? noteColumns : 0;
    if (headerCells.length !== valueCells.length - offset) {
      return undecidable(`header has ${headerCells.length} columns, row has ${valueCells.length}`);
    }

    const periods = headerCells.map(parsePeriodHeader);
    const parsed: number[] = [];
    for (const [index, period] of periods.entries()) {
      if (period === null) {
        return undecidable(`header cell "${headerCells[index]}" is not a period`);
      }
      parsed.push(period);
    }

    const latest = Math.max(...parsed);
    const latestColumns = parsed.flatMap((period, index) => (period === latest ? [index] : []));
    if (latestColumns.length !== 1) {
      return undecidable('several columns share the latest period');
    }
    return selectCell(valueCells, latestColumns[0] + offset);
  }

  if (valueCells.length === 1) {
    return selectCell(valueCells, 0);
  }

  switch (convention) {
    case 'leftmost':
      return selectCell(valueCells, 0);
    case 'none':
      return undecidable('no header row and no column convention');
  }
}

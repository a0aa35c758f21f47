import type { ColumnConvention } from '../../config';
import { extractionLogger } from '../../logger';
import { selectCurrentPeriodColumn } from './column-selector';
import { isWithinExpectedRange } from './field-catalog';
import { detectUnit, getHintIndex, SectionTracker, unitAccepts, type HintIndex } from './label-matching';
import { parsePeriodHeader, parseReportNumber, REPORT_NUMBER_SOURCE } from './numbers';
import { selectRelevantPages } from './page-relevance';
import type {
  ExtractionContext,
  ExtractionStrategy,
  FieldCandidate,
  FieldCatalog,
  FieldSpec,
  PageText,
  RawTable,
  ReportUnit,
} from './types';

const CELL_SEPARATOR = /\s{2,}/;
const TRAILING_NUMBER = new RegExp(`^(.*[^\\d\\s])\\s+(${REPORT_NUMBER_SOURCE})$`);

// Non-value lines tolerated inside one table (section markers, sub-headings).
const MAX_ROW_GAP = 3;
// Lines above the first value row searched for a header, caption or marker.
const MAX_LEAD_IN = 4;
const MIN_VALUE_ROWS = 2;
const CAPTION_LOOKBACK = 5;

/**
 * Splits a laid-out line into cells on runs of two or more spaces. A label
 * that ran into its first value ("Other assets 1 234  1 100") is peeled
 * apart, but only on lines that are already columnar.
 */
export function splitRow(line: string): string[] {
  const cells = line.trim().split(CELL_SEPARATOR).filter(cell => cell.length > 0);
  if (cells.length < 2 || parsePeriodHeader(cells[0]) !== null) return cells;

  const peeled = TRAILING_NUMBER.exec(cells[0]);
  if (peeled && parseReportNumber(peeled[2]) !== null) {
    return [peeled[1].trim(), peeled[2], ...cells.slice(1)];
  }
  return cells;
}

export function isValueRow(cells: readonly string[]): boolean {
  return cells.length >= 2 && cells.slice(1).some(cell => parseReportNumber(cell) !== null);
}

export interface PeriodHeader {
  periods: string[];
  // Text columns between the caption and the periods, e.g. "Note".
  noteColumns: number;
}

const NOTE_HEADER = /^(?:notes?|ref\.?)$/i;

/**
 * Reads a header row as its trailing run of period cells. The cells left of
 * the periods are a caption and note columns; none of them may be a number.
 */
export function parseHeaderRow(cells: readonly string[]): PeriodHeader | null {
  let start = cells.length;
  while (start > 0 && parsePeriodHeader(cells[start - 1]) !== null) start--;
  if (start === cells.length) return null;

  const leading = cells.slice(0, start);
  if (leading.some(cell => parseReportNumber(cell) !== null)) return null;
  return {
    periods: cells.slice(start),
    noteColumns: leading.filter((cell, index) => index > 0 || NOTE_HEADER.test(cell)).length,
  };
}

function isHeaderRow(cells: readonly string[], hintIndex: HintIndex): boolean {
  const header = parseHeaderRow(cells);
  if (!header) return false;
  return header.periods.length === cells.length || hintIndex.matchLabel(cells[0]) === null;
}

export function scoreTableQuality(rows: readonly string[][], headerRowIndex: number | null = null): number {
  const valueRows = rows.filter((row, index) => index !== headerRowIndex && isValueRow(row));
  if (valueRows.length === 0) return 0;

  const widths = new Map<number, number>();
  for (const row of valueRows) {
    widths.set(row.length, (widths.get(row.length) ?? 0) + 1);
  }
  const consistency = Math.max(...widths.values()) / valueRows.length;

  const dataCells = valueRows.flatMap(row => row.slice(1));
  const density = dataCells.filter(cell => parseReportNumber(cell) !== null).length / dataCells.length;

  return Math.round((0.6 * consistency + 0.4 * density) * 100) / 100;
}

function detectTableUnit(
  rows: readonly string[][],
  headerRowIndex: number | null,
  captionLines: readonly string[]
): ReportUnit | null {
  for (const [index, row] of rows.entries()) {
    if (index !== headerRowIndex && isValueRow(row)) continue;
    const unit = detectUnit(row.join(' '));
    if (unit) return unit;
  }
  for (const line of [...captionLines].reverse()) {
    const unit = detectUnit(line);
    if (unit) return unit;
  }
  return null;
}

function tablesOnPage(page: PageText, hintIndex: HintIndex): RawTable[] {
  const rows = page.lines.map(splitRow);
  const headerRows = rows.map(cells => isHeaderRow(cells, hintIndex));
  const valueRowIndexes = rows.flatMap((cells, index) => (!headerRows[index] && isValueRow(cells) ? [index] : []));

  const runs: Array<{ start: number; end: number; valueRows: number }> = [];
  for (const index of valueRowIndexes) {
    const last = runs[runs.length - 1];
    if (last && index - last.end - 1 <= MAX_ROW_GAP) {
      last.end = index;
      last.valueRows++;
    } else {
      runs.push({ start: index, end: index, valueRows: 1 });
    }
  }

  const tables: RawTable[] = [];
  let previousEnd = -1;
  for (const run of runs) {
    if (run.valueRows < MIN_VALUE_ROWS) {
      previousEnd = run.end;
      continue;
    }

    let start = run.start;
    while (start - 1 > previousEnd && run.start - start < MAX_LEAD_IN) {
      start--;
      if (headerRows[start]) break;
    }

    const tableRows = rows.slice(start, run.end + 1);
    const headerOffset = headerRows.slice(start, run.end + 1).indexOf(true);
    const headerRowIndex = headerOffset >= 0 ? headerOffset : null;
    const captionLines = page.lines.slice(Math.max(0, start - CAPTION_LOOKBACK), start);

    tables.push({
      pageNumber: page.pageNumber,
      rows: tableRows,
      headerRowIndex,
      unit: detectTableUnit(tableRows, headerRowIndex, captionLines),
      quality: scoreTableQuality(tableRows, headerRowIndex),
    });
    previousEnd = run.end;
  }
  return tables;
}

/**
 * Locates whitespace-column tables: runs of at least two value rows, with
 * short gaps for markers and sub-headings, plus the lines above that carry
 * the period header.
 */
export function extractTables(pages: readonly PageText[], catalog: FieldCatalog): RawTable[] {
  const hintIndex = getHintIndex(catalog);
  return pages.flatMap(page => tablesOnPage(page, hintIndex));
}

/**
 * Binds the rows of one table to outstanding fields. A field gets a
 * candidate only when every row bound to it agrees on one value.
 */
export function bindTable(
  table: RawTable,
  remaining: readonly FieldSpec[],
  catalog: FieldCatalog,
  convention: ColumnConvention
): FieldCandidate[] {
  const hintIndex = getHintIndex(catalog);
  const wanted = new Set(remaining.map(field => field.identifier));
  const tracker = new SectionTracker(catalog);
  const headerRowIndex = table.headerRowIndex;
  const header = headerRowIndex !== null ? parseHeaderRow(table.rows[headerRowIndex]) : null;
  const bindings = new Map<string, Array<{ value: number; evidence: string }>>();

  table.rows.forEach((cells, rowIndex) => {
    if (rowIndex === headerRowIndex || !isValueRow(cells)) {
      tracker.observe(cells[0] ?? '');
      return;
    }

    const label = cells[0];
    const entry = hintIndex.matchLabel(label);
    if (!entry) return;

    const rowUnit = detectUnit(label) ?? table.unit;
    const owners = entry.fields.filter(field => tracker.accepts(field) && unitAccepts(field, rowUnit));
    if (owners.length !== 1) {
      if (owners.length > 1) {
        extractionLogger.debug({
          pageNumber: table.pageNumber,
          label,
          fields: owners.map(field => field.identifier),
        }, 'Table row claimed by several fields');
      }
      return;
    }

    const field = owners[0];
    if (!wanted.has(field.identifier)) return;

    const applicableHeader = header !== null && headerRowIndex !== null && headerRowIndex < rowIndex ? header : null;
    const selection = selectCurrentPeriodColumn(
      cells.slice(1),
      applicableHeader?.periods ?? null,
      convention,
      applicableHeader?.noteColumns ?? 0
    );
    if (selection.kind === 'undecidable') {
      extractionLogger.debug({
        pageNumber: table.pageNumber,
        field: field.identifier,
        reason: selection.reason,
      }, 'Column selection undecidable');
      return;
    }

    if (!isWithinExpectedRange(field, selection.value)) {
      extractionLogger.debug({
        field: field.identifier,
        value: selection.value,
      }, 'Table value outside expected range');
      return;
    }

    const found = bindings.get(field.identifier) ?? [];
    found.push({ value: selection.value, evidence: cells.join('  ') });
    bindings.set(field.identifier, found);
  });

  const candidates: FieldCandidate[] = [];
  for (const [identifier, found] of bindings) {
    const distinct = new Set(found.map(binding => binding.value));
    if (distinct.size > 1) {
      extractionLogger.debug({
        pageNumber: table.pageNumber,
        field: identifier,
        values: [...distinct],
      }, 'Ambiguous table binding');
      continue;
    }
    candidates.push({
      identifier,
      value: found[0].value,
      evidence: found[0].evidence,
      confidence: table.quality,
    });
  }
  return candidates;
}

export function extractStructuralCandidates(
  remaining: readonly FieldSpec[],
  context: ExtractionContext,
  convention: ColumnConvention
): { candidates: FieldCandidate[]; tableCount: number } {
  const tables = extractTables(selectRelevantPages(context.pages), context.catalog);

  const byField = new Map<string, FieldCandidate[]>();
  for (const table of tables) {
    for (const candidate of bindTable(table, remaining, context.catalog, convention)) {
      const found = byField.get(candidate.identifier) ?? [];
      found.push(candidate);
      byField.set(candidate.identifier, found);
    }
  }

  const candidates: FieldCandidate[] = [];
  for (const field of remaining) {
    const found = byField.get(field.identifier);
    if (!found) continue;

    const distinct = new Set(found.map(candidate => candidate.value));
    if (distinct.size > 1) {
      extractionLogger.debug({ field: field.identifier, values: [...distinct] }, 'Tables disagree on field value');
      continue;
    }
    candidates.push(found.reduce((best, candidate) => (candidate.confidence > best.confidence ? candidate : best)));
  }

  return { candidates, tableCount: tables.length };
}

export function createStructuralStrategy(options: { columnConvention: ColumnConvention }): ExtractionStrategy {
  return {
    tier: 'structural',
    async attempt(remaining, context) {
      const { candidates, tableCount } = extractStructuralCandidates(remaining, context, options.columnConvention);
      return {
        candidates,
        escalationReason: tableCount === 0 ? 'No tables located' : null,
      };
    },
  };
}

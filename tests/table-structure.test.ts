import { describe, it, expect, vi } from 'vitest';
import {
  bindTable,
  createStructuralStrategy,
  extractStructuralCandidates,
  extractTables,
  parseHeaderRow,
  splitRow,
} from '../server/services/extraction/table-structure';
import { getFieldCatalog, loadFieldCatalog, valueFields } from '../server/services/extraction/field-catalog';
import { extractionLogger } from '../server/logger';
import {
  BALANCE_SHEET_LINES,
  EXPECTED_VALUES,
  KEY_RATIO_LINES,
  fullReport,
  pages,
} from './helpers/report-fixtures';

vi.mock('../server/logger', () => ({
  extractionLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const catalog = getFieldCatalog();
const allValueFields = valueFields(catalog);

function contextFor(...pageLines: string[][]) {
  return { document: fullReport(), pages: pages(...pageLines), catalog };
}

function valuesOf(candidates: Array<{ identifier: string; value: number }>): Record<string, number> {
  return Object.fromEntries(candidates.map(candidate => [candidate.identifier, candidate.value]));
}

describe('TableStructureExtractor', () => {
  describe('splitRow', () => {
    it('should split cells on runs of two or more spaces', () => {
      expect(splitRow('Total assets  358 884  354 365')).toEqual(['Total assets', '358 884', '354 365']);
    });

    it('should peel a value that ran into its label on a columnar line', () => {
      expect(splitRow('Other assets 1 500  1 200')).toEqual(['Other assets', '1 500', '1 200']);
    });

    it('should leave single-cell lines alone', () => {
      expect(splitRow('Net result 12 000')).toEqual(['Net result 12 000']);
    });

    it('should not split a date header cell', () => {
      expect(splitRow('30 Jun 2025  30 Jun 2024')).toEqual(['30 Jun 2025', '30 Jun 2024']);
    });
  });

  describe('parseHeaderRow', () => {
    it('should count note columns between the caption and the periods', () => {
      expect(parseHeaderRow(['SEK million', 'Note', '30 Jun 2025', '30 Jun 2024'])).toEqual({
        periods: ['30 Jun 2025', '30 Jun 2024'],
        noteColumns: 1,
      });
      expect(parseHeaderRow(['30 Jun 2025', '30 Jun 2024'])).toEqual({
        periods: ['30 Jun 2025', '30 Jun 2024'],
        noteColumns: 0,
      });
    });

    it('should not read a value row as a header', () => {
      expect(parseHeaderRow(['Total assets', '358 884', '354 365'])).toBeNull();
    });
  });

  describe('extractTables', () => {
    it('should locate the balance sheet with its period header and unit', () => {
      const tables = extractTables(pages(BALANCE_SHEET_LINES), catalog);

      expect(tables).toHaveLength(1);
      expect(tables[0].pageNumber).toBe(1);
      expect(tables[0].rows).toHaveLength(22);
      expect(tables[0].rows[0]).toEqual(['SEK million', '30 Jun 2025', '30 Jun 2024']);
      expect(tables[0].headerRowIndex).toBe(0);
      expect(tables[0].unit).toBe('SEK million');
      expect(tables[0].quality).toBe(1);
    });

    it('should find one table per page', () => {
      const tables = extractTables(pages(BALANCE_SHEET_LINES, KEY_RATIO_LINES), catalog);

      expect(tables.map(table => table.pageNumber)).toEqual([1, 2]);
      expect(tables[1].headerRowIndex).toBe(0);
      expect(tables[1].unit).toBeNull();
    });

    it('should ignore prose without value rows', () => {
      const tables = extractTables(pages(['The fund reports its results twice a year.', 'Net result 12 000']), catalog);
      expect(tables).toEqual([]);
    });
  });

  describe('bindTable', () => {
    it('should bind every balance sheet row to its field', () => {
      const [table] = extractTables(pages(BALANCE_SHEET_LINES), catalog);
      const candidates = bindTable(table, allValueFields, catalog, 'leftmost');

      const keyRatios = new Set(['FUNDCAPITALCARRIEDFORWARDLEVEL', 'NETOUTFLOWSTOTHENATIONALPENSIONSYSTEM', 'TOTAL']);
      const balanceSheet = Object.fromEntries(Object.entries(EXPECTED_VALUES).filter(([identifier]) => !keyRatios.has(identifier)));
      expect(valuesOf(candidates)).toEqual(balanceSheet);
      expect(candidates.every(candidate => candidate.confidence === 1)).toBe(true);
    });

    it('should bind key ratio rows by their unit', () => {
      const [table] = extractTables(pages(KEY_RATIO_LINES), catalog);
      const candidates = bindTable(table, allValueFields, catalog, 'leftmost');

      expect(valuesOf(candidates)).toEqual({
        FUNDCAPITALCARRIEDFORWARDLEVEL: 352.4,
        NETOUTFLOWSTOTHENATIONALPENSIONSYSTEM: -4.6,
        TOTAL: 12,
      });
    });

    it('should only bind fields that are still outstanding', () => {
      const [table] = extractTables(pages(BALANCE_SHEET_LINES), catalog);
      const outstanding = allValueFields.filter(field => field.identifier === 'TOTALASSETS');

      expect(bindTable(table, outstanding, catalog, 'leftmost')).toEqual([
        {
          identifier: 'TOTALASSETS',
          value: 358884,
          evidence: 'Total assets  358 884  354 365',
          confidence: 1,
        },
      ]);
    });

    it('should not let a data row named like a section move the section', () => {
      const [table] = extractTables(pages([
        'SEK million  30 Jun 2025  30 Jun 2024',
        'Liabilities',
        'Other liabilities  2 847  2 600',
        'Other assets',
        'Derivative instruments  3 100  2 900',
      ]), catalog);

      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({
        OTHERLIABILITIES: 2847,
        DERIVATIVEINSTRUMENTSLIABILITIES: 3100,
      });
    });

    it('should yield nothing for a field bound to two different values', () => {
      const [table] = extractTables(pages([
        'SEK million  30 Jun 2025  30 Jun 2024',
        'Other assets  1 500  1 200',
        'Other assets  1 700  1 200',
        'Total assets  358 884  354 365',
      ]), catalog);

      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({ TOTALASSETS: 358884 });
      expect(extractionLogger.debug).toHaveBeenCalledWith(
        expect.objectContaining({ field: 'OTHERASSETS', values: [1500, 1700] }),
        'Ambiguous table binding'
      );
    });

    it('should yield nothing for a row claimed by several fields', () => {
      const sharedHintCatalog = loadFieldCatalog({
        version: 1,
        defaultSection: null,
        sectionMarkers: { assets: [], liabilities: [], 'fund-capital': [] },
        fields: [
          { identifier: 'RESULTA', ordinal: 1, seriesCode: 'A', description: 'First result', kind: 'value', statement: null, section: null, unit: null, hints: ['net result'] },
          { identifier: 'RESULTB', ordinal: 2, seriesCode: 'B', description: 'Second result', kind: 'value', statement: null, section: null, unit: null, hints: ['net result'] },
          { identifier: 'ASSETSUM', ordinal: 3, seriesCode: 'C', description: 'Assets', kind: 'value', statement: null, section: null, unit: null, hints: ['total assets'] },
        ],
      });
      const [table] = extractTables(pages(['Net result  12 000  12 600', 'Total assets  358 884  354 365']), sharedHintCatalog);

      expect(valuesOf(bindTable(table, sharedHintCatalog.fields, sharedHintCatalog, 'leftmost'))).toEqual({ ASSETSUM: 358884 });
    });

    it('should drop values outside the expected range', () => {
      const [table] = extractTables(pages([
        'Listed equities and participations  -5  -3',
        'Total assets  358 884  354 365',
      ]), catalog);

      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({ TOTALASSETS: 358884 });
    });

    it('should skip the note column under a header that names one', () => {
      const [table] = extractTables(pages([
        'SEK million  Note  30 Jun 2025  30 Jun 2024',
        'Listed equities and participations  7  184 676  195 400',
        'Total assets  9  358 884  354 365',
      ]), catalog);

      expect(table.headerRowIndex).toBe(0);
      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({
        EQUITIESANDPARTICIPATIONSLISTED: 184676,
        TOTALASSETS: 358884,
      });
    });

    it('should not fall back to the leftmost cell when a row is wider than its header', () => {
      const [table] = extractTables(pages([
        'SEK million  30 Jun 2025  30 Jun 2024',
        'Listed equities and participations  7  184 676  195 400',
        'Total assets  358 884  354 365',
      ]), catalog);

      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({ TOTALASSETS: 358884 });
    });

    it('should honour a headerless table only under a column convention', () => {
      const lines = ['Other assets  1 500  1 200', 'Total assets  358 884  354 365'];
      const [table] = extractTables(pages(lines), catalog);

      expect(table.headerRowIndex).toBeNull();
      expect(bindTable(table, allValueFields, catalog, 'none')).toEqual([]);
      expect(valuesOf(bindTable(table, allValueFields, catalog, 'leftmost'))).toEqual({
        OTHERASSETS: 1500,
        TOTALASSETS: 358884,
      });
    });
  });

  describe('extractStructuralCandidates', () => {
    it('should drop fields on which two tables disagree', () => {
      const { candidates, tableCount } = extractStructuralCandidates(allValueFields, contextFor([
        'SEK million  30 Jun 2025  30 Jun 2024',
        'Total assets  358 884  354 365',
        'Total liabilities  6 447  5 965',
        'Comment line one',
        'Comment line two',
        'Comment line three',
        'Comment line four',
        'SEK million  31 Dec 2024  31 Dec 2023',
        'Total assets  354 000  350 000',
        'Total liabilities  6 447  6 100',
      ]), 'leftmost');

      expect(tableCount).toBe(2);
      expect(valuesOf(candidates)).toEqual({ TOTALLIABILITIES: 6447 });
    });

    it('should resolve all twenty value fields from a well-formed report', () => {
      const { candidates } = extractStructuralCandidates(allValueFields, contextFor(BALANCE_SHEET_LINES, KEY_RATIO_LINES), 'leftmost');

      expect(valuesOf(candidates)).toEqual(EXPECTED_VALUES);
      expect(candidates.map(candidate => candidate.identifier)).toEqual(allValueFields.map(field => field.identifier));
    });
  });

  describe('structural strategy', () => {
    it('should report when no table was found', async () => {
      const strategy = createStructuralStrategy({ columnConvention: 'leftmost' });
      const attempt = await strategy.attempt(allValueFields, contextFor(['Unlisted: 131970', 'Listed: 184676']));

      expect(strategy.tier).toBe('structural');
      expect(attempt).toEqual({ candidates: [], escalationReason: 'No tables located' });
    });
  });
});

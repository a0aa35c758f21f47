import { extractionLogger } from '../../logger';
import { isWithinExpectedRange } from './field-catalog';
import { detectUnit, getHintIndex, SectionTracker, unitAccepts, type HintIndex } from './label-matching';
import { parseReportNumber, REPORT_NUMBER_SOURCE } from './numbers';
import { selectRelevantPages } from './page-relevance';
import { splitRow } from './table-structure';
import type { ExtractionContext, ExtractionStrategy, FieldCandidate, FieldSpec, ReportUnit } from './types';

export const PATTERN_CONFIDENCE = 0.8;

const VALUE_AFTER_LABEL = new RegExp(`[\\s:=.\\u2026]*(${REPORT_NUMBER_SOURCE})(?!\\d)`, 'y');
// "Net result for the year 2024 was ...": a year running into prose is not a value.
const YEAR_VALUE = /^(?:19|20)\d{2}$/;
const FOLLOWED_BY_WORD = /^\s+\p{L}/u;

function prepareLine(line: string): string {
  return line.normalize('NFKC').replace(/[\u2010\u2011\u2014]/g, '-');
}

function mask(text: string, start: number, end: number): string {
  return text.slice(0, start) + ' '.repeat(end - start) + text.slice(end);
}

interface LineContext {
  tracker: SectionTracker;
  unit: ReportUnit | null;
}

interface PatternMatch {
  field: FieldSpec;
  value: number;
  evidence: string;
}

/**
 * Finds `<label><separator><number>` pairs on one line. Hints are tried
 * longest first and each match blanks out its span, so "listed" can never
 * match inside "Unlisted".
 */
export function matchLine(
  line: string,
  context: LineContext,
  hintIndex: HintIndex
): PatternMatch[] {
  const matches: PatternMatch[] = [];
  let text = prepareLine(line);
  const evidence = line.trim();

  for (const entry of hintIndex.entries) {
    const spans: Array<[number, number]> = [];
    for (const hit of text.matchAll(entry.pattern)) {
      const start = hit.index ?? 0;
      const end = start + hit[0].length;
      spans.push([start, end]);

      VALUE_AFTER_LABEL.lastIndex = end;
      const valueMatch = VALUE_AFTER_LABEL.exec(text);
      if (!valueMatch) continue;
      const value = parseReportNumber(valueMatch[1]);
      if (value === null) continue;
      if (YEAR_VALUE.test(valueMatch[1]) && FOLLOWED_BY_WORD.test(text.slice(VALUE_AFTER_LABEL.lastIndex))) continue;

      const unit = detectUnit(text.slice(start, VALUE_AFTER_LABEL.lastIndex)) ?? context.unit;
      const owners = entry.fields.filter(field => context.tracker.accepts(field) && unitAccepts(field, unit));
      if (owners.length !== 1) {
        if (owners.length > 1) {
          extractionLogger.debug({ hint: entry.hint, fields: owners.map(f => f.identifier) }, 'Pattern claimed by several fields');
        }
        continue;
      }
      matches.push({ field: owners[0], value, evidence });
    }
    for (const [start, end] of spans) {
      text = mask(text, start, end);
    }
  }
  return matches;
}

export function isColumnarRow(line: string): boolean {
  return splitRow(line).slice(1).filter(cell => parseReportNumber(cell) !== null).length >= 2;
}

export function matchPatterns(remaining: readonly FieldSpec[], context: ExtractionContext): FieldCandidate[] {
  const hintIndex = getHintIndex(context.catalog);
  const wanted = new Set(remaining.map(field => field.identifier));
  const found = new Map<string, PatternMatch[]>();

  for (const page of selectRelevantPages(context.pages)) {
    const lineContext: LineContext = { tracker: new SectionTracker(context.catalog), unit: null };

    for (const line of page.lines) {
      if (lineContext.tracker.observe(line)) continue;
      // Rows with several value columns are left to column selection.
      if (isColumnarRow(line)) continue;

      const matches = matchLine(line, lineContext, hintIndex);
      if (matches.length === 0) {
        lineContext.unit = detectUnit(line) ?? lineContext.unit;
        continue;
      }

      for (const match of matches) {
        if (!wanted.has(match.field.identifier)) continue;
        if (!isWithinExpectedRange(match.field, match.value)) continue;
        const list = found.get(match.field.identifier) ?? [];
        list.push(match);
        found.set(match.field.identifier, list);
      }
    }
  }

  const candidates: FieldCandidate[] = [];
  for (const field of remaining) {
    const list = found.get(field.identifier);
    if (!list) continue;

    const distinct = new Set(list.map(match => match.value));
    if (distinct.size > 1) {
      extractionLogger.debug({ field: field.identifier, values: [...distinct] }, 'Ambiguous pattern match');
      continue;
    }
    candidates.push({
      identifier: field.identifier,
      value: list[0].value,
      evidence: list[0].evidence,
      confidence: PATTERN_CONFIDENCE,
    });
  }
  return candidates;
}

export function createPatternStrategy(): ExtractionStrategy {
  return {
    tier: 'pattern',
    async attempt(remaining, context) {
      return { candidates: matchPatterns(remaining, context) };
    },
  };
}

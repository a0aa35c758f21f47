const MINUS_SIGNS = /^[-−–]/;
const GROUP_SEPARATORS = /[ \u00a0\u2009\u202f]/g;
const NIL_CELLS = new Set(['-', '–', '—', '−', 'n/a', '']);

// A number as it appears in one cell or after one label. Groups are joined
// by a single separator, so two adjacent columns never read as one value.
export const REPORT_NUMBER_SOURCE =
  '\\(?[-\\u2212\\u2013]?\\d{1,3}(?:[ \\u00a0\\u2009\\u202f]\\d{3})+(?:[.,]\\d+)?\\)?' +
  '|\\(?[-\\u2212\\u2013]?\\d{1,3}(?:,\\d{3})+(?:\\.\\d+)?\\)?' +
  '|\\(?[-\\u2212\\u2013]?\\d+(?:[.,]\\d+)?\\)?';

export function parseReportNumber(raw: string): number | null {
  let text = raw.trim();
  if (NIL_CELLS.has(text.toLowerCase())) return null;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1).trim();
  }
  if (MINUS_SIGNS.test(text)) {
    negative = !negative;
    text = text.slice(1).trim();
  }

  text = text.replace(GROUP_SEPARATORS, '');
  if (!/^[\d.,]+$/.test(text) || !/\d/.test(text)) return null;

  let normalized: string;
  if (text.includes('.') && text.includes(',')) {
    normalized = text.replace(/,/g, '');
  } else if (text.includes(',')) {
    normalized = /^\d{1,3}(,\d{3})+$/.test(text) ? text.replace(/,/g, '') : text.replace(',', '.');
  } else {
    normalized = text;
  }

  if (!/^\d+(\.\d+)?$/.test(normalized)) return null;
  const value = Number(normalized);
  if (!Number.isFinite(value)) return null;
  return negative && value !== 0 ? -value : value;
}

const MONTHS: Record<string, number> = {
  jan: 0, january: 0, feb: 1, february: 1, mar: 2, march: 2,
  apr: 3, april: 3, may: 4, jun: 5, june: 5,
  jul: 6, july: 6, aug: 7, august: 7, sep: 8, sept: 8, september: 8,
  oct: 9, october: 9, nov: 10, november: 10, dec: 11, december: 11,
};

const MONTH_NAMES = 'jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?';

const DATE_PATTERNS: Array<{ pattern: RegExp; toDate: (m: RegExpMatchArray) => number | null }> = [
  {
    pattern: new RegExp(`\\b(\\d{1,2})\\s+(${MONTH_NAMES})\\.?\\s+(\\d{4})\\b`, 'gi'),
    toDate: m => utc(Number(m[3]), MONTHS[m[2].toLowerCase()], Number(m[1])),
  },
  {
    pattern: new RegExp(`\\b(${MONTH_NAMES})\\.?\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`, 'gi'),
    toDate: m => utc(Number(m[3]), MONTHS[m[1].toLowerCase()], Number(m[2])),
  },
  {
    pattern: /\b(\d{4})[-/](\d{1,2})[-/](\d{1,2})\b/g,
    toDate: m => utc(Number(m[1]), Number(m[2]) - 1, Number(m[3])),
  },
  {
    pattern: /\b(\d{1,2})[./](\d{1,2})[./](\d{4})\b/g,
    toDate: m => utc(Number(m[3]), Number(m[2]) - 1, Number(m[1])),
  },
];

const MONTH_YEAR_PATTERN = new RegExp(`\\b(${MONTH_NAMES})\\.?\\s+(\\d{4})\\b`, 'gi');
const YEAR_PATTERN = /\b(19\d{2}|20\d{2})\b/g;

function utc(year: number, month: number | undefined, day: number): number | null {
  if (month === undefined || month < 0 || month > 11 || day < 1 || day > 31) return null;
  const value = Date.UTC(year, month, day);
  const check = new Date(value);
  return check.getUTCDate() === day ? value : null;
}

function latest(values: number[]): number | null {
  return values.length > 0 ? Math.max(...values) : null;
}

/**
 * Reads a period header cell ("30 Jun 2025", "2025-06-30", "Jan-Jun 2025",
 * "2025") as the UTC timestamp of the period's closing date. Ranges resolve
 * to their last date.
 */
export function parsePeriodHeader(raw: string): number | null {
  const text = raw.trim();
  if (!text) return null;

  const fullDates: number[] = [];
  let invalidDate = false;
  for (const { pattern, toDate } of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const value = toDate(match);
      if (value === null) {
        invalidDate = true;
      } else {
        fullDates.push(value);
      }
    }
  }
  if (invalidDate) return null;
  if (fullDates.length > 0) return latest(fullDates);

  const monthEnds: number[] = [];
  for (const match of text.matchAll(MONTH_YEAR_PATTERN)) {
    const month = MONTHS[match[1].toLowerCase()];
    if (month !== undefined) monthEnds.push(Date.UTC(Number(match[2]), month + 1, 0));
  }
  if (monthEnds.length > 0) return latest(monthEnds);

  const yearEnds = [...text.matchAll(YEAR_PATTERN)].map(m => Date.UTC(Number(m[1]), 11, 31));
  if (yearEnds.length === 0) return null;

  // Anything besides years, separators and period words is not a header.
  const residue = text
    .replace(YEAR_PATTERN, '')
    .replace(/\b(fy|h[12]|q[1-4]|jan|dec|full year|half[- ]year|period|year)\b/gi, '')
    .replace(/[\s\-–/,.]+/g, '');
  return residue.length === 0 ? latest(yearEnds) : null;
}

import type { PageText } from './types';

export interface PageScore {
  pageNumber: number;
  balanceSheet: number;
  keyRatios: number;
}

export const BALANCE_SHEET_THRESHOLD = 30;

export function scorePage(page: PageText): PageScore {
  const text = page.lines.join('\n').toLowerCase();
  const has = (phrase: string) => text.includes(phrase);

  let balanceSheet = 0;
  if (has('balance sheet')) balanceSheet += 30;
  if (has('sek million')) balanceSheet += 15;
  if (has('total assets') && has('liabilities')) balanceSheet += 20;
  if (has('fund capital')) balanceSheet += 15;
  if (has('listed') && has('unlisted')) balanceSheet += 10;
  // Summary pages repeat balance-sheet words without the table.
  if (has('key ratios')) balanceSheet -= 15;
  if (has('ten-year performance')) balanceSheet -= 15;
  if (has('income statement') && !has('balance sheet')) balanceSheet -= 10;

  let keyRatios = 0;
  if (has('key ratios') || has('key ratio')) keyRatios += 30;
  if (has('sek billion')) keyRatios += 15;
  if (has('national pension system')) keyRatios += 10;

  return { pageNumber: page.pageNumber, balanceSheet, keyRatios };
}

/**
 * Pages most likely to hold the requested statements, in document order.
 * Falls back to every page when nothing scores above the threshold.
 */
export function selectRelevantPages(pages: readonly PageText[]): PageText[] {
  const scores = pages.map(scorePage);
  const selected = new Set<number>();

  const bestBalanceSheet = scores.reduce<PageScore | null>(
    (best, score) => (score.balanceSheet > (best?.balanceSheet ?? 0) ? score : best),
    null
  );
  if (bestBalanceSheet && bestBalanceSheet.balanceSheet >= BALANCE_SHEET_THRESHOLD) {
    selected.add(bestBalanceSheet.pageNumber);
  }

  const keyRatioPage = scores.find(score => score.keyRatios >= BALANCE_SHEET_THRESHOLD);
  if (keyRatioPage) selected.add(keyRatioPage.pageNumber);

  if (selected.size === 0) return [...pages];
  return pages.filter(page => selected.has(page.pageNumber));
}

export function buildExcerpt(pages: readonly PageText[], maxChars: number): string {
  const text = selectRelevantPages(pages)
    .map(page => `--- Page ${page.pageNumber} ---\n${page.lines.join('\n')}`)
    .join('\n\n');
  return text.length > maxChars ? text.substring(0, maxChars) : text;
}

import type { FieldCatalog, FieldSpec, ReportUnit, SectionKind } from './types';

export function normalizeLabel(raw: string): string {
  return raw
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[‐‑–—]/g, '-')
    .replace(/[,;:()*]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function detectUnit(text: string): ReportUnit | null {
  const normalized = normalizeLabel(text);
  if (/\bsek (?:bn|billion)\b/.test(normalized)) return 'SEK billion';
  if (/\bsek (?:m|mn|million)\b/.test(normalized)) return 'SEK million';
  return null;
}

export function unitAccepts(field: FieldSpec, unit: ReportUnit | null): boolean {
  return field.unit === null || unit === null || field.unit === unit;
}

export interface HintEntry {
  hint: string;
  fields: readonly FieldSpec[];
  pattern: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Word tokens may be separated by any run of spaces or light punctuation in
// the source text; the hint must not touch a letter or digit on either side.
function hintPatternSource(hint: string): string {
  const body = hint.split(' ').map(escapeRegExp).join('[\\s,;:()]+');
  return `(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`;
}

/**
 * Every hint of the catalog, longest first. Matching always walks the full
 * list so a shorter hint (e.g. "listed") can never claim text that belongs
 * to a longer one ("unlisted equities and participations"), even after the
 * longer hint's field is already resolved.
 */
export class HintIndex {
  readonly entries: readonly HintEntry[];

  constructor(fields: readonly FieldSpec[]) {
    const byHint = new Map<string, FieldSpec[]>();
    for (const field of fields) {
      for (const raw of field.hints) {
        const hint = normalizeLabel(raw);
        if (!hint) continue;
        const owners = byHint.get(hint) ?? [];
        if (!owners.includes(field)) owners.push(field);
        byHint.set(hint, owners);
      }
    }

    this.entries = [...byHint.entries()]
      .sort(([a], [b]) => b.length - a.length || a.localeCompare(b))
      .map(([hint, owners]) => ({
        hint,
        fields: owners,
        pattern: new RegExp(hintPatternSource(hint), 'giu'),
      }));
  }

  matchLabel(label: string): HintEntry | null {
    const normalized = normalizeLabel(label);
    if (!normalized) return null;
    for (const entry of this.entries) {
      entry.pattern.lastIndex = 0;
      if (entry.pattern.test(normalized)) return entry;
    }
    return null;
  }
}

const hintIndexCache = new WeakMap<FieldCatalog, HintIndex>();

export function getHintIndex(catalog: FieldCatalog): HintIndex {
  let index = hintIndexCache.get(catalog);
  if (!index) {
    index = new HintIndex(catalog.fields);
    hintIndexCache.set(catalog, index);
  }
  return index;
}

export class SectionTracker {
  private current: SectionKind | null;
  private readonly markers: Map<string, SectionKind>;

  constructor(catalog: FieldCatalog) {
    this.current = catalog.defaultSection;
    this.markers = new Map();
    for (const [section, labels] of Object.entries(catalog.sectionMarkers)) {
      for (const label of labels) {
        this.markers.set(normalizeLabel(label), toSection(section));
      }
    }
  }

  get section(): SectionKind | null {
    return this.current;
  }

  // Exact match only: "Other assets" never opens the assets section.
  observe(label: string): boolean {
    const section = this.markers.get(normalizeLabel(label));
    if (!section) return false;
    this.current = section;
    return true;
  }

  accepts(field: FieldSpec): boolean {
    return field.section === null || field.section === this.current;
  }
}

function toSection(value: string): SectionKind {
  switch (value) {
    case 'assets':
    case 'liabilities':
    case 'fund-capital':
      return value;
    default:
      throw new Error(`Unknown section kind: ${value}`);
  }
}

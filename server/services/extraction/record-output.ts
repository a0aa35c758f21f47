import type { ExtractionRecord, FieldCatalog } from './types';

export interface OutputColumn {
  ordinal: number;
  identifier: string;
  seriesCode: string;
  value: number | null;
}

// Positional column identity is what downstream sheets depend on.
export function toOrderedRow(record: ExtractionRecord, catalog: FieldCatalog): OutputColumn[] {
  const byIdentifier = new Map(record.fields.map(field => [field.identifier, field]));
  return [...catalog.fields]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map(field => ({
      ordinal: field.ordinal,
      identifier: field.identifier,
      seriesCode: field.seriesCode,
      value: byIdentifier.get(field.identifier)?.value ?? null,
    }));
}

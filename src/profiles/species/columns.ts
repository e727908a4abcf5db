import type { ColumnSpec, TableSpec } from '../../dialects/target';

export const ENTITY_SET = 'SpeciesSightings_CoreData';
export const IDENTITY_FIELD = 'ScientificName';
export const COORDINATE_FIELDS = { latitude: 'DecimalLatitude', longitude: 'DecimalLongitude' };

/** Requested in this order; the pager may drop any of them except the identity. */
export const SPECIES_FIELDS: readonly string[] = [
  'ScientificName',
  'CommonName',
  'Kingdom',
  'Class',
  'Family',
  'BCActStatus',
  'EPBCActStatus',
  'DateLast',
];

export const SPECIES_COLUMNS: readonly ColumnSpec[] = [
  { name: 'ScientificName', alias: 'Scientific Name', type: 'text', length: 255 },
  { name: 'CommonName', alias: 'Common Name', type: 'text', length: 255 },
  { name: 'Kingdom', alias: 'Kingdom', type: 'text', length: 50 },
  { name: 'Class', alias: 'Class', type: 'text', length: 100 },
  { name: 'Family', alias: 'Family', type: 'text', length: 100 },
  { name: 'BCActStatus', alias: 'BC Act Status', type: 'text', length: 100 },
  { name: 'EPBCActStatus', alias: 'EPBC Act Status', type: 'text', length: 100 },
  { name: 'DateLast', alias: 'Last Recorded', type: 'date' },
];

export const speciesTable = (name: string, description: string): TableSpec => ({
  name,
  identityColumn: IDENTITY_FIELD,
  columns: SPECIES_COLUMNS,
  description,
});

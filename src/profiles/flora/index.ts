import type { SyncProfile } from '../../engine/types';
import { COORDINATE_FIELDS, ENTITY_SET, IDENTITY_FIELD, SPECIES_FIELDS, speciesTable } from '../species/columns';
import { speciesRow } from '../species/parse';

export const FLORA_GROUPS = {
  Dicots: ['Magnoliopsida'],
  Monocots: ['Liliopsida'],
  Ferns: ['Polypodiopsida'],
  Conifers: ['Pinopsida'],
  'All Flora': ['Magnoliopsida', 'Liliopsida', 'Polypodiopsida', 'Pinopsida'],
} as const satisfies Record<string, readonly string[]>;

const floraProfile: SyncProfile = {
  name: 'flora',
  entitySet: ENTITY_SET,
  identityField: IDENTITY_FIELD,
  fields: SPECIES_FIELDS,
  groups: FLORA_GROUPS,
  defaultGroup: 'All Flora',
  coordinateFields: COORDINATE_FIELDS,
  table: speciesTable('bionet_flora_species', 'Unique flora species recorded in NSW BioNet'),
  toRow: speciesRow,
};

export default floraProfile;

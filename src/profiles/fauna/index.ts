import type { SyncProfile } from '../../engine/types';
import { COORDINATE_FIELDS, ENTITY_SET, IDENTITY_FIELD, SPECIES_FIELDS, speciesTable } from '../species/columns';
import { speciesRow } from '../species/parse';

export const FAUNA_GROUPS = {
  Mammals: ['Mammalia'],
  Birds: ['Aves'],
  Reptiles: ['Reptilia'],
  Amphibians: ['Amphibia'],
  'All Fauna': ['Mammalia', 'Aves', 'Reptilia', 'Amphibia'],
} as const satisfies Record<string, readonly string[]>;

const faunaProfile: SyncProfile = {
  name: 'fauna',
  entitySet: ENTITY_SET,
  identityField: IDENTITY_FIELD,
  fields: SPECIES_FIELDS,
  groups: FAUNA_GROUPS,
  defaultGroup: 'All Fauna',
  coordinateFields: COORDINATE_FIELDS,
  table: speciesTable('bionet_fauna_species', 'Unique fauna species recorded in NSW BioNet'),
  toRow: speciesRow,
};

export default faunaProfile;

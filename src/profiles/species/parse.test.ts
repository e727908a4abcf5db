import { parseIsoDate, parseSpecies, speciesRow, toTableRow } from './parse';

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('parseIsoDate', () => {
  it('reads a bare date as UTC midnight', () => {
    expect(parseIsoDate('2020-01-02')?.toISOString()).toBe('2020-01-02T00:00:00.000Z');
  });

  it('treats a time without a zone as UTC', () => {
    expect(parseIsoDate('2020-01-02T03:04:05')?.toISOString()).toBe('2020-01-02T03:04:05.000Z');
  });

  it('applies offsets with or without a colon', () => {
    expect(parseIsoDate('2020-01-02T03:04:05.123456+10:00')?.toISOString()).toBe('2020-01-01T17:04:05.123Z');
    expect(parseIsoDate('2020-01-02T03:04+1000')?.toISOString()).toBe('2020-01-01T17:04:00.000Z');
    expect(parseIsoDate('2020-01-02T03:04:05Z')?.toISOString()).toBe('2020-01-02T03:04:05.000Z');
  });

  it('pads short fractions to milliseconds', () => {
    expect(parseIsoDate('2020-01-02T03:04:05.5Z')?.toISOString()).toBe('2020-01-02T03:04:05.500Z');
  });

  it('rejects impossible or unrecognised values', () => {
    expect(parseIsoDate('2021-02-30')).toBeNull();
    expect(parseIsoDate('2021-01-01T25:00:00Z')).toBeNull();
    expect(parseIsoDate('02/01/2020')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
    expect(parseIsoDate(null)).toBeNull();
  });
});

describe('parseSpecies', () => {
  it('maps OData fields and blanks out empty text', () => {
    const species = parseSpecies({
      ScientificName: ' Petaurus australis ',
      CommonName: 'Yellow-bellied Glider',
      Class: 'Mammalia',
      BCActStatus: '',
      EPBCActStatus: 'Vulnerable',
      DateLast: '2023-06-30T00:00:00Z',
    });

    expect(species).toEqual({
      scientificName: 'Petaurus australis',
      commonName: 'Yellow-bellied Glider',
      kingdom: null,
      className: 'Mammalia',
      family: null,
      bcActStatus: null,
      epbcActStatus: 'Vulnerable',
      lastRecorded: '2023-06-30T00:00:00Z',
    });
  });

  it('returns null without a scientific name', () => {
    expect(parseSpecies({ ScientificName: '   ', CommonName: 'Unknown' })).toBeNull();
    expect(parseSpecies({ CommonName: 'Unknown' })).toBeNull();
  });

  it('rejects structured values in text fields', () => {
    expect(parseSpecies({ ScientificName: 'Canis lupus', CommonName: { en: 'Dingo' } })).toBeNull();
  });
});

describe('toTableRow', () => {
  it('produces one value per output column, dates parsed', () => {
    const row = speciesRow({ ScientificName: 'Canis lupus', CommonName: 'Dingo', DateLast: '2019-11-05' });

    expect(row).toEqual({
      ScientificName: 'Canis lupus',
      CommonName: 'Dingo',
      Kingdom: null,
      Class: null,
      Family: null,
      BCActStatus: null,
      EPBCActStatus: null,
      DateLast: new Date('2019-11-05T00:00:00.000Z'),
    });
  });

  it('stores null for an unreadable date', () => {
    const row = toTableRow({
      scientificName: 'Canis lupus',
      commonName: null,
      kingdom: null,
      className: null,
      family: null,
      bcActStatus: null,
      epbcActStatus: null,
      lastRecorded: 'last spring',
    });

    expect(row.DateLast).toBeNull();
  });
});

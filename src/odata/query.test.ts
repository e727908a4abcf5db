import {
  andPredicates,
  boundingBoxPredicate,
  buildGroupFilter,
  buildUrl,
  encodeODataValue,
  isKnownGroup,
  toQueryString,
  type GroupMap,
} from './query';

const groups: GroupMap = {
  Mammals: ['Mammalia'],
  Birds: ['Aves'],
  Warm: ['Mammalia', 'Aves'],
  Odd: ["O'Neill"],
};

describe('encodeODataValue', () => {
  it('keeps OData punctuation literal', () => {
    expect(encodeODataValue("Class eq 'Aves'")).toBe("Class%20eq%20'Aves'");
    expect(encodeODataValue('ScientificName,CommonName')).toBe('ScientificName,CommonName');
    expect(encodeODataValue('groupby((ScientificName))')).toBe('groupby((ScientificName))');
  });
});

describe('toQueryString', () => {
  it('renders options in a fixed order', () => {
    const query = toQueryString({
      count: true,
      skip: 0,
      top: 1000,
      filter: "Class eq 'Aves'",
      select: ['ScientificName', 'CommonName'],
    });

    expect(query).toBe("$select=ScientificName,CommonName&$filter=Class%20eq%20'Aves'&$top=1000&$skip=0&$count=true");
  });

  it('omits empty options', () => {
    expect(toQueryString({ select: [], filter: '', count: false })).toBe('');
  });
});

describe('buildUrl', () => {
  it('joins the service root and entity set', () => {
    expect(buildUrl('https://odata.test/odata/', 'SpeciesSightings_CoreData', { top: 1 })).toBe(
      'https://odata.test/odata/SpeciesSightings_CoreData?$top=1'
    );
    expect(buildUrl('https://odata.test/odata', 'SpeciesSightings_CoreData', {})).toBe(
      'https://odata.test/odata/SpeciesSightings_CoreData'
    );
  });
});

describe('buildGroupFilter', () => {
  it('filters a single class', () => {
    expect(buildGroupFilter(groups, 'Mammals')).toBe("Class eq 'Mammalia'");
  });

  it('ORs several classes', () => {
    expect(buildGroupFilter(groups, 'Warm')).toBe("Class eq 'Mammalia' or Class eq 'Aves'");
  });

  it('parenthesises both sides when an extra predicate is given', () => {
    expect(buildGroupFilter(groups, 'Warm', "BCActStatus eq 'Vulnerable'")).toBe(
      "(Class eq 'Mammalia' or Class eq 'Aves') and (BCActStatus eq 'Vulnerable')"
    );
  });

  it('doubles single quotes in class names', () => {
    expect(buildGroupFilter(groups, 'Odd')).toBe("Class eq 'O''Neill'");
  });

  it('contributes nothing for an unknown selector', () => {
    expect(buildGroupFilter(groups, 'Fish')).toBe('');
    expect(buildGroupFilter(groups, 'Fish', "Kingdom eq 'Animalia'")).toBe("Kingdom eq 'Animalia'");
    expect(buildGroupFilter(groups, undefined)).toBe('');
  });
});

describe('isKnownGroup', () => {
  it('only knows its own selectors', () => {
    expect(isKnownGroup(groups, 'Birds')).toBe(true);
    expect(isKnownGroup(groups, 'toString')).toBe(false);
  });
});

describe('boundingBoxPredicate', () => {
  it('bounds both coordinates inclusively', () => {
    const box = { minLon: 150.5, minLat: -34, maxLon: 151.25, maxLat: -33.5 };

    expect(boundingBoxPredicate(box, { latitude: 'DecimalLatitude', longitude: 'DecimalLongitude' })).toBe(
      'DecimalLatitude ge -34 and DecimalLatitude le -33.5 and DecimalLongitude ge 150.5 and DecimalLongitude le 151.25'
    );
  });
});

describe('andPredicates', () => {
  it('parenthesises each predicate when several are given', () => {
    expect(andPredicates("Kingdom eq 'Animalia'", 'DecimalLatitude ge -34')).toBe(
      "(Kingdom eq 'Animalia') and (DecimalLatitude ge -34)"
    );
  });

  it('returns a lone predicate unchanged and skips blanks', () => {
    expect(andPredicates(undefined, ' ', 'DecimalLatitude ge -34')).toBe('DecimalLatitude ge -34');
    expect(andPredicates(undefined, '')).toBe('');
  });
});

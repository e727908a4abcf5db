import { ConfigError, loadEnv, parseBoundingBox, sourceConfigFromEnv, targetConfigFromEnv } from './config';

describe('loadEnv', () => {
  it('applies defaults and treats blank values as unset', () => {
    const env = loadEnv({ BIONET_BASE_URL: '', BIONET_USERNAME: '  ', PAGE_DELAY_MS: '' });

    expect(env.BIONET_BASE_URL).toBe('https://data.bionet.nsw.gov.au/biosvcapp/odata');
    expect(env.BIONET_USERNAME).toBeUndefined();
    expect(env.PAGE_DELAY_MS).toBe(250);
    expect(env.REQUEST_TIMEOUT_MS).toBe(60_000);
    expect(env.PG_PORT).toBe(5432);
    expect(env.DB_SSL).toBe(false);
  });

  it('coerces numbers and flags', () => {
    const env = loadEnv({ PAGE_DELAY_MS: '0', PG_PORT: '6543', DB_SSL: 'true' });

    expect(env.PAGE_DELAY_MS).toBe(0);
    expect(env.PG_PORT).toBe(6543);
    expect(env.DB_SSL).toBe(true);
  });

  it('rejects malformed values', () => {
    expect(() => loadEnv({ PG_PORT: 'postgres' })).toThrow(ConfigError);
    expect(() => loadEnv({ DB_SSL: 'yes' })).toThrow('DB_SSL');
  });
});

describe('sourceConfigFromEnv', () => {
  it('passes credentials and timeout through', () => {
    const env = loadEnv({ BIONET_USERNAME: 'reader', BIONET_PASSWORD: 'test-secret', REQUEST_TIMEOUT_MS: '5000' });

    expect(sourceConfigFromEnv(env)).toEqual({
      type: 'bionet-odata',
      baseUrl: 'https://data.bionet.nsw.gov.au/biosvcapp/odata',
      username: 'reader',
      password: 'test-secret',
      timeoutMs: 5000,
    });
  });
});

describe('targetConfigFromEnv', () => {
  it('builds a PostgreSQL config', () => {
    const env = loadEnv({ PG_HOST: 'db.local', PG_USER: 'sync', PG_PASSWORD: 'test-secret' });

    expect(targetConfigFromEnv('postgresql', env, 'Species')).toEqual({
      type: 'postgresql',
      host: 'db.local',
      port: 5432,
      user: 'sync',
      password: 'test-secret',
      database: 'bionet',
      ssl: false,
    });
  });

  it('names the missing PostgreSQL variables', () => {
    const env = loadEnv({ PG_HOST: 'db.local' });

    expect(() => targetConfigFromEnv('postgresql', env, 'Species')).toThrow(
      'Missing required env vars: PG_USER, PG_PASSWORD'
    );
  });

  it('uses the default title for ArcGIS Online when none is configured', () => {
    const env = loadEnv({ ARCGIS_TOKEN: 'test-token' });

    expect(targetConfigFromEnv('arcgis-online', env, 'Unique fauna species')).toEqual({
      type: 'arcgis-online',
      portalUrl: 'https://www.arcgis.com',
      itemTitle: 'Unique fauna species',
      username: undefined,
      password: undefined,
      token: 'test-token',
    });
  });

  it('requires a token or a username and password for ArcGIS Online', () => {
    const env = loadEnv({ ARCGIS_USERNAME: 'tester' });

    expect(() => targetConfigFromEnv('arcgis-online', env, 'Species')).toThrow(ConfigError);
  });

  it('rejects unknown targets', () => {
    expect(() => targetConfigFromEnv('sqlite', loadEnv({}), 'Species')).toThrow('Unknown target "sqlite"');
  });
});

describe('parseBoundingBox', () => {
  it('reads longitude and latitude pairs', () => {
    expect(parseBoundingBox('150.5, -34, 151.25, -33.5')).toEqual({
      minLon: 150.5,
      minLat: -34,
      maxLon: 151.25,
      maxLat: -33.5,
    });
  });

  it('rejects an inverted box', () => {
    expect(() => parseBoundingBox('151,-34,150,-33')).toThrow(
      '--bbox expects minLon,minLat,maxLon,maxLat: minLon must be less than maxLon'
    );
  });

  it('rejects coordinates outside WGS84', () => {
    expect(() => parseBoundingBox('150,-95,151,-33')).toThrow(
      '--bbox expects minLon,minLat,maxLon,maxLat: latitude out of range'
    );
  });

  it('rejects missing or non-numeric parts', () => {
    expect(() => parseBoundingBox('150,-34,151')).toThrow(ConfigError);
    expect(() => parseBoundingBox('150,-34,,-33')).toThrow(ConfigError);
    expect(() => parseBoundingBox('east,-34,151,-33')).toThrow(ConfigError);
  });
});

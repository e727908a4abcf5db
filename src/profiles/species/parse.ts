import { z } from 'zod';
import type { SourceRecord } from '../../dialects/source';
import type { TableRow } from '../../dialects/target';
import { log } from '../../engine/logger';

// OData scalars arrive as strings or numbers; blanks become null
const textField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' ? null : text;
  });

const SpeciesRowSchema = z.object({
  ScientificName: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1)),
  CommonName: textField,
  Kingdom: textField,
  Class: textField,
  Family: textField,
  BCActStatus: textField,
  EPBCActStatus: textField,
  DateLast: textField,
});

export type SpeciesRecord = {
  scientificName: string;
  commonName: string | null;
  kingdom: string | null;
  className: string | null;
  family: string | null;
  bcActStatus: string | null;
  epbcActStatus: string | null;
  lastRecorded: string | null;
};

let errorLogCount = 0;
const MAX_ERROR_LOGS = 10;

export const parseSpecies = (raw: SourceRecord): SpeciesRecord | null => {
  const result = SpeciesRowSchema.safeParse(raw);
  if (!result.success) {
    if (errorLogCount < MAX_ERROR_LOGS) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      log.warn(`[parse] Skipping record ${JSON.stringify(raw).slice(0, 200)} (${issues})`);
      errorLogCount++;
      if (errorLogCount === MAX_ERROR_LOGS) {
        log.warn('[parse] Suppressing further validation errors...');
      }
    }
    return null;
  }

  const row = result.data;
  return {
    scientificName: row.ScientificName,
    commonName: row.CommonName,
    kingdom: row.Kingdom,
    className: row.Class,
    family: row.Family,
    bcActStatus: row.BCActStatus,
    epbcActStatus: row.EPBCActStatus,
    lastRecorded: row.DateLast,
  };
};

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const isCalendarDate = (year: number, month: number, day: number): boolean => {
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
};

/**
 * `YYYY-MM-DD` or `YYYY-MM-DDTHH:mm[:ss[.fraction]]` with an optional `Z`,
 * `±hh:mm` or `±hhmm` zone. No zone means UTC. Anything else is null.
 */
export const parseIsoDate = (value: string | null | undefined): Date | null => {
  if (!value) return null;
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hours = '00', minutes = '00', seconds = '00', fraction = '', zone] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
  if (Number(hours) > 23 || Number(minutes) > 59 || Number(seconds) > 59) return null;

  const millis = fraction.slice(0, 3).padEnd(3, '0');
  const offset = (() => {
    if (!zone || zone.toUpperCase() === 'Z') return 'Z';
    return zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  })();

  const date = new Date(`${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${millis}${offset}`);
  return Number.isNaN(date.getTime()) ? null : date;
};

export const toTableRow = (species: SpeciesRecord): TableRow => ({
  ScientificName: species.scientificName,
  CommonName: species.commonName,
  Kingdom: species.kingdom,
  Class: species.className,
  Family: species.family,
  BCActStatus: species.bcActStatus,
  EPBCActStatus: species.epbcActStatus,
  DateLast: parseIsoDate(species.lastRecorded),
});

/** Raw OData record → output row, or null when the record cannot be stored. */
export const speciesRow = (raw: SourceRecord): TableRow | null => {
  const species = parseSpecies(raw);
  return species ? toTableRow(species) : null;
};

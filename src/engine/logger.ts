import { HttpStatusError, NetworkError } from '../odata/errors';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  page: (
    pageIndex: number,
    stats: { rows: number; newUnique: number; unique: number; target?: number; totalCount?: number }
  ) => {
    const tag = `${COLORS.cyan}page-${pageIndex}${COLORS.reset}`;
    const unique =
      stats.target === undefined
        ? `${formatNumber(stats.unique)}`
        : `${formatNumber(stats.unique)}/${formatNumber(stats.target)}`;
    const parts: string[] = [
      `rows ${COLORS.bold}${formatNumber(stats.rows)}${COLORS.reset}`,
      `new ${COLORS.green}${formatNumber(stats.newUnique)}${COLORS.reset}`,
      `unique ${COLORS.bold}${unique}${COLORS.reset}`,
    ];

    if (stats.totalCount !== undefined) {
      parts.push(`${COLORS.dim}of ${formatNumber(stats.totalCount)} sightings${COLORS.reset}`);
    }
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${parts.join('  ')}`);
  },

  sync: {
    start: (config: { profile: string; query: string; target: string; pageSize: number; maxRecords?: number }) => {
      const lines = [
        '',
        `${COLORS.bold}Sync started${COLORS.reset}`,
        `  profile:     ${config.profile}`,
        `  query:       ${config.query}`,
        `  target:      ${config.target}`,
        `  page size:   ${formatNumber(config.pageSize)}`,
        `  max records: ${config.maxRecords === undefined ? 'none' : formatNumber(config.maxRecords)}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: {
      pages: number;
      rows: number;
      unique: number;
      written: number;
      skipped: number;
      errors: number;
      completed: boolean;
      stopReason?: string;
      elapsed: number;
    }) => {
      const status = (() => {
        if (stats.completed) {
          return `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`;
        }

        return `${COLORS.yellow}${COLORS.bold}INCOMPLETE${COLORS.reset}`;
      })();

      const errors = (() => {
        if (stats.errors > 0) {
          return `${COLORS.red}${formatNumber(stats.errors)}${COLORS.reset}`;
        }
        return `0${COLORS.reset}`;
      })();

      const reason = stats.stopReason ? `  ${COLORS.dim}[${stats.stopReason}]${COLORS.reset}` : '';

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}${reason}`,
        '',
        `  pages:    ${COLORS.bold}${formatNumber(stats.pages)}${COLORS.reset}`,
        `  rows:     ${COLORS.bold}${formatNumber(stats.rows)}${COLORS.reset}`,
        `  unique:   ${COLORS.bold}${formatNumber(stats.unique)}${COLORS.reset}`,
        `  written:  ${COLORS.green}${formatNumber(stats.written)}${COLORS.reset}`,
        `  skipped:  ${COLORS.yellow}${formatNumber(stats.skipped)}${COLORS.reset}`,
        `  errors:   ${errors}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },

  batch: (target: string, action: string, count: number, elapsed: number) => {
    const tag = `${COLORS.magenta}${target}${COLORS.reset}`;
    const time = (() => {
      if (elapsed > 1000) {
        return `${COLORS.yellow}${elapsed}ms${COLORS.reset}`;
      }
      return `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    })();
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } rows  ${time}`
    );
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  constraint?: string;
  table?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

const padding = '                      ';

const formatFields = (fields: Array<[string, string | undefined]>): string =>
  fields
    .filter(([, v]) => v)
    .map(([k, v]) => `${padding}${COLORS.dim}${k.padEnd(12)}${COLORS.reset}${v}`)
    .join('\n');

const firstLine = (text: string): string => text.split('\n')[0].slice(0, 200);

/**
 * One-line message plus the diagnostic fields a failure carries:
 * status, url and body excerpt for HTTP errors, pg fields for database errors.
 */
export const formatError = (err: unknown): string => {
  if (err instanceof HttpStatusError) {
    return [
      firstLine(err.message),
      formatFields([
        ['status', String(err.status)],
        ['url', err.url],
        ['body', err.body.replace(/\s+/g, ' ').slice(0, 300)],
      ]),
    ].join('\n');
  }

  if (err instanceof NetworkError) {
    return [firstLine(err.message), formatFields([['url', err.url]])].join('\n');
  }

  if (isPgError(err)) {
    return formatFields([
      ['code', err.code],
      ['severity', err.severity],
      ['detail', err.detail],
      ['constraint', err.constraint],
      ['table', err.table],
      ['hint', err.hint],
    ]);
  }

  const msg = err instanceof Error ? err.message : String(err);
  return firstLine(msg);
};

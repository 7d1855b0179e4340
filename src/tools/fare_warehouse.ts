import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { FareAnalyticsWarehouse } from '../core/adapters.js';
import { QueryAbortedError, type SqlClient } from '../db/pool.js';
import { AirlineOnTimeRow, DayOfWeekDelayRow, type DayOfWeekDelayRowT } from '../schemas/query.js';
import type { Logger } from '../util/logging.js';

export const SQL_TEMPLATES = ['rank_airlines_on_time', 'delays_by_day_of_week'] as const;
export type SqlTemplateId = (typeof SQL_TEMPLATES)[number];

const ISO_DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

const DayOfWeekRaw = DayOfWeekDelayRow.omit({ dayOfWeek: true });

/**
 * Reads and caches the approved SQL files. Queries only ever receive user
 * values through `$n` placeholders.
 */
export class TemplateLoader {
  private cache = new Map<SqlTemplateId, string>();
  private readonly templatesDir: string;

  constructor(templatesDir?: string) {
    this.templatesDir = templatesDir ?? defaultSqlDir();
  }

  load(templateId: SqlTemplateId): string {
    const cached = this.cache.get(templateId);
    if (cached !== undefined) return cached;

    const templatePath = path.join(this.templatesDir, `${templateId}.sql`);
    if (!fs.existsSync(templatePath)) {
      throw new Error(`SQL template file not found: ${templatePath}`);
    }
    const sql = fs.readFileSync(templatePath, 'utf-8');
    this.cache.set(templateId, sql);
    return sql;
  }
}

function defaultSqlDir(): string {
  const candidates: string[] = [];
  if (process.env.SQL_DIR) candidates.push(path.resolve(process.env.SQL_DIR));
  candidates.push(path.join(__dirname, '..', 'sql'));
  candidates.push(path.join(process.cwd(), 'src', 'sql'));
  return candidates.find((c) => fs.existsSync(c)) ?? path.join(process.cwd(), 'src', 'sql');
}

function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[], templateId: SqlTemplateId): Array<z.infer<S>> {
  const parsed = z.array(schema).safeParse(rows);
  if (!parsed.success) {
    throw new Error(`unexpected rows from ${templateId}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function createFareWarehouse(
  sql: SqlClient,
  opts: { minFlights?: number; templates?: TemplateLoader; log?: Logger } = {},
): FareAnalyticsWarehouse {
  const templates = opts.templates ?? new TemplateLoader();
  const defaultMin = opts.minFlights ?? 10;

  async function run(templateId: SqlTemplateId, values: unknown[], signal?: AbortSignal): Promise<unknown[]> {
    if (signal?.aborted) throw new QueryAbortedError();
    const started = Date.now();
    const { rows } = await sql.query(templates.load(templateId), values, signal);
    if (signal?.aborted) {
      opts.log?.debug({ templateId, ms: Date.now() - started }, 'warehouse_query_discarded');
      throw new QueryAbortedError();
    }
    opts.log?.debug({ templateId, rows: rows.length, ms: Date.now() - started }, 'warehouse_query');
    return rows;
  }

  return {
    async rankAirlinesByOnTime(origin, destination, year, minFlights = defaultMin, signal) {
      const rows = await run('rank_airlines_on_time', [origin, destination, year ?? null, minFlights], signal);
      return parseRows(AirlineOnTimeRow, rows, 'rank_airlines_on_time');
    },

    async delaysByDayOfWeek(origin, destination, year, minFlights = defaultMin, signal): Promise<DayOfWeekDelayRowT[]> {
      const rows = await run('delays_by_day_of_week', [origin, destination, year ?? null, minFlights], signal);
      return parseRows(DayOfWeekRaw, rows, 'delays_by_day_of_week').map((row) => ({
        ...row,
        dayOfWeek: ISO_DAY_NAMES[row.isoDay - 1] ?? `day ${row.isoDay}`,
      }));
    },
  };
}

// src/services/filter-extraction.ts
// Pull hard constraints (price ceiling, city, category, genre, duration, date range)
// out of the query. Only what the user actually said may constrain retrieval, so the
// model's output is re-validated against the query text before use.
import { z } from 'zod';
import type { ModelBackend } from '@/models/base/backend';
import type { DateRange, Filters } from '@/types/core';
import { fail, ok, type Result } from '@/types/result';
import { toRetrievalError } from '@/utils/errors';
import { logger } from '@/utils/logger';
import { foldText, foldedTokens } from '@/utils/text';
import dateKeywords from '@/data/date-keywords.json';

const optionalText = z.string().nullable().optional();

export const ExtractedFiltersSchema = z.object({
  max_price: z.coerce.number().nullable().optional(),
  city: optionalText,
  category: optionalText,
  genre: optionalText,
  duration: optionalText,
  date_range: z
    .object({ start: optionalText, end: optionalText })
    .nullable()
    .optional(),
});

export type ExtractedFilters = z.infer<typeof ExtractedFiltersSchema>;

const DATE_KEYWORDS: string[] = [...dateKeywords.relative, ...dateKeywords.weekdays, ...dateKeywords.months].map(
  (kw) => foldText(kw),
);

const NUMERIC_DATE = /\d{1,2}[./-]\d{1,2}|\d{4}/;
const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

/** True when the query names a day, a period or a numeric date such as 12.12 or 2025. */
export function hasDateCue(query: string): boolean {
  if (NUMERIC_DATE.test(query)) return true;
  const tokens = foldedTokens(query);
  return DATE_KEYWORDS.some((kw) => tokens.some((t) => t === kw || (kw.length >= 4 && t.startsWith(kw))));
}

function formatDay(d: Date): string {
  const mm = String(d.getMonth() + 1).padStart(2, '0');
  const dd = String(d.getDate()).padStart(2, '0');
  return `${d.getFullYear()}-${mm}-${dd}`;
}

function validDay(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const day = value.trim().slice(0, 10);
  if (!ISO_DAY.test(day) || Number.isNaN(Date.parse(day))) return undefined;
  return day;
}

/** 'concert' and 'concerts' match each other; stems shorter than 4 letters must match exactly. */
function tokensMatch(a: string, b: string): boolean {
  if (a === b) return true;
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  return short.length >= 4 && long.startsWith(short);
}

/** True when some word of `value` appears in the query. */
export function queryMentions(query: string, value: string): boolean {
  const queryTokens = foldedTokens(query);
  return foldedTokens(value).some((v) => queryTokens.some((q) => tokensMatch(q, v)));
}

function cleanText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function buildPrompt(query: string, now: Date): string {
  const weekday = now.toLocaleDateString('en-US', { weekday: 'long' });
  return `You are a query parser for an event-discovery assistant. Extract search filters from the user's query.

Current date: ${formatDay(now)} (${weekday})

Query: "${query}"

Return these keys, using null for anything the query does not state:
- max_price: number, the highest acceptable ticket price (e.g. "under 500 TL" -> 500)
- city: string (e.g. "Istanbul", "Ankara"); extract it even for cities outside Turkey
- category: string, the kind of event (e.g. "Concert", "Theater", "Workshop")
- genre: string, a musical or artistic genre (e.g. "Jazz", "Rock", "Comedy")
- duration: string, only if the user states a length (e.g. "2 hours")
- date_range: { "start": "YYYY-MM-DD" | null, "end": "YYYY-MM-DD" | null }
  - "this weekend" / "hafta sonu": the coming Friday to Sunday
  - "tomorrow" / "yarın": the current date + 1 day
  - "next week": next Monday to Sunday

IMPORTANT:
- ONLY extract filters explicitly mentioned in the query. Never invent values.
- If the query does not mention a date or time, date_range is null.
- If the query does not mention a city, city is null.`;
}

/**
 * Turn the model's snake_case output into Filters: null keys are dropped, the
 * date range is flattened, and values the query gives no evidence for are discarded.
 */
export function normalizeExtractedFilters(raw: ExtractedFilters, query: string): Filters {
  const filters: Filters = {};

  const price = raw.max_price;
  if (typeof price === 'number' && Number.isFinite(price) && price > 0) {
    if (/\d/.test(query)) filters.maxPrice = price;
    else logger.warn('filters:discarded_price', { price });
  }

  const city = cleanText(raw.city);
  if (city) {
    if (foldText(query).includes(foldText(city))) filters.city = city;
    else logger.warn('filters:discarded_city', { city });
  }

  for (const field of ['category', 'genre', 'duration'] as const) {
    const value = cleanText(raw[field]);
    if (!value) continue;
    if (queryMentions(query, value)) filters[field] = value;
    else logger.warn(`filters:discarded_${field}`, { [field]: value });
  }

  const range: DateRange = {};
  const start = validDay(raw.date_range?.start);
  const end = validDay(raw.date_range?.end);
  if (start) range.start = start;
  if (end) range.end = end;

  if (range.start || range.end) {
    if (!hasDateCue(query)) {
      logger.warn('filters:discarded_date_range', { range });
    } else if (range.start && range.end && range.start > range.end) {
      logger.warn('filters:inverted_date_range', { range });
    } else {
      filters.dateRange = range;
    }
  }

  return filters;
}

export interface FilterExtractorOptions {
  now?: () => Date;
}

export class FilterExtractor {
  private readonly now: () => Date;

  constructor(
    private readonly backend: ModelBackend,
    options: FilterExtractorOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async extract(query: string, signal?: AbortSignal): Promise<Result<Filters>> {
    try {
      const raw = await this.backend.generateStructured(buildPrompt(query, this.now()), ExtractedFiltersSchema, {
        temperature: 0,
        signal,
      });
      const filters = normalizeExtractedFilters(raw, query);
      logger.debug('filters:extracted', { filters });
      return ok(filters);
    } catch (err) {
      return fail(toRetrievalError('filters', err));
    }
  }
}

// Parsing of GRAPH.QUERY replies and of the loosely-typed rows they carry.
// Nothing past this module sees an untyped property bag.
import { z } from 'zod';
import type { CandidateSummary, EventDetails } from '@/types/core';
import { clamp01, parseVector } from '@/services/retrieval-vector-utils';
import type { CollectionEntry, VectorHit } from './catalog-store';

export type GraphRow = Record<string, unknown>;

function columnName(header: unknown): string {
  // Verbose replies give plain names; compact replies give [type, name].
  if (Array.isArray(header)) return String(header[header.length - 1]);
  return String(header);
}

/**
 * A reply with a result set is [header, rows, stats]; a write-only reply is
 * [stats]. Rows are zipped with the header into records.
 */
export function parseGraphReply(reply: unknown): GraphRow[] {
  if (!Array.isArray(reply) || reply.length < 3) return [];
  const [header, rows] = reply;
  if (!Array.isArray(header) || !Array.isArray(rows)) return [];

  const columns = header.map(columnName);
  return rows.filter(Array.isArray).map((row: unknown[]) => {
    const record: GraphRow = {};
    columns.forEach((col, i) => {
      record[col] = row[i] ?? null;
    });
    return record;
  });
}

const optionalText = z.unknown().transform((v): string | null => {
  if (typeof v === 'string') return v.trim() || null;
  if (typeof v === 'number') return String(v);
  return null;
});

const optionalNumber = z.unknown().transform((v): number | null => {
  const n = typeof v === 'number' ? v : typeof v === 'string' && v.trim() !== '' ? Number(v) : NaN;
  return Number.isFinite(n) ? n : null;
});

const requiredText = z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1));

const EventDetailsRow = z.object({
  uuid: requiredText,
  title: requiredText,
  venue: optionalText,
  date: optionalText,
  price: optionalNumber,
  city: optionalText,
  genre: optionalText,
  duration: optionalText,
  category: optionalText,
});

const SummaryRow = z.object({
  event_uuid: requiredText,
  sentiment_summary: optionalText,
  embedding: z.unknown().optional(),
});

const VectorHitRow = SummaryRow.extend({ score: optionalNumber });

const CollectionRow = EventDetailsRow.extend({
  rank: optionalNumber,
  reason: optionalText,
  sentiment_summary: optionalText,
});

function toDetails(row: z.infer<typeof EventDetailsRow>): EventDetails {
  return { ...row, venue: row.venue ?? '' };
}

export function toEventDetails(row: GraphRow): EventDetails | null {
  const parsed = EventDetailsRow.safeParse(row);
  return parsed.success ? toDetails(parsed.data) : null;
}

export function toCandidateSummary(row: GraphRow): CandidateSummary | null {
  const parsed = SummaryRow.safeParse(row);
  if (!parsed.success) return null;
  const embedding = parseVector(parsed.data.embedding);
  return {
    eventUuid: parsed.data.event_uuid,
    sentimentSummary: parsed.data.sentiment_summary ?? '',
    ...(embedding ? { embedding } : {}),
  };
}

/** The vector index reports cosine distance; hits carry similarity = 1 - distance. */
export function toVectorHit(row: GraphRow): VectorHit | null {
  const parsed = VectorHitRow.safeParse(row);
  if (!parsed.success || parsed.data.score === null) return null;
  return {
    summary: {
      eventUuid: parsed.data.event_uuid,
      sentimentSummary: parsed.data.sentiment_summary ?? '',
    },
    score: clamp01(1 - parsed.data.score),
  };
}

export function toCollectionEntry(row: GraphRow): CollectionEntry | null {
  const parsed = CollectionRow.safeParse(row);
  if (!parsed.success) return null;
  const { rank, reason, sentiment_summary, ...details } = parsed.data;
  return {
    rank: rank ?? Number.MAX_SAFE_INTEGER,
    reason,
    summary: { eventUuid: details.uuid, sentimentSummary: sentiment_summary ?? '' },
    details: toDetails(details),
  };
}

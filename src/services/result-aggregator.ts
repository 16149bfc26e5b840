// Group "same show, many nights" into one result per (title, venue).

import type { EventDetails, ResultGroup, ScoredCandidate } from '@/types/core';
import { foldText } from '@/utils/text';

export const DEFAULT_MAX_RESULTS = 10;

function normalizeString(s: string | null | undefined): string {
  return foldText(s)
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function groupKey(c: Aggregatable): string {
  return `${normalizeString(c.details.title)}|${normalizeString(c.details.venue)}`;
}

/** A retrieval candidate, or a group from an earlier pass. */
export type Aggregatable = ScoredCandidate & {
  details: EventDetails & { dates?: string[] };
  reason?: string;
};

function datesOf(c: Aggregatable): string[] {
  const own = c.details.date ? [c.details.date] : [];
  return [...(c.details.dates ?? []), ...own];
}

/**
 * score = best member's score; summary and details come from that member;
 * dates = sorted unique union. Groups are ordered by score (stable) and truncated.
 * Feeding the output back in yields the same groups.
 */
export function aggregateResults(
  candidates: Aggregatable[],
  maxResults: number = DEFAULT_MAX_RESULTS,
): ResultGroup[] {
  const groups = new Map<string, { best: Aggregatable; dates: Set<string> }>();

  for (const c of candidates) {
    const key = groupKey(c);
    const existing = groups.get(key);
    if (!existing) {
      groups.set(key, { best: c, dates: new Set(datesOf(c)) });
      continue;
    }
    for (const d of datesOf(c)) existing.dates.add(d);
    if (c.score > existing.best.score) existing.best = c;
  }

  const out: ResultGroup[] = [];
  for (const { best, dates } of groups.values()) {
    const group: ResultGroup = {
      score: best.score,
      summary: best.summary,
      details: { ...best.details, dates: [...dates].sort() },
    };
    if (best.reason) group.reason = best.reason;
    out.push(group);
  }

  return out.sort((a, b) => b.score - a.score).slice(0, maxResults);
}

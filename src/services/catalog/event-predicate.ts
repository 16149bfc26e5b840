// Translate Filters into an EventPredicate and evaluate one against event details.
import type { EventDetails, Filters } from '@/types/core';
import type { EventPredicate, PredicateClause, TextField } from './catalog-store';

const TEXT_FIELDS: TextField[] = ['city', 'category', 'genre', 'duration'];

export function buildEventPredicate(filters: Filters): EventPredicate {
  const clauses: PredicateClause[] = [];

  if (typeof filters.maxPrice === 'number') {
    clauses.push({ field: 'price', op: 'lte', value: filters.maxPrice });
  }
  for (const field of TEXT_FIELDS) {
    const value = filters[field];
    if (value) clauses.push({ field, op: 'contains', value });
  }
  if (filters.dateRange?.start) {
    clauses.push({ field: 'date', op: 'gte', value: filters.dateRange.start });
  }
  if (filters.dateRange?.end) {
    clauses.push({ field: 'date', op: 'lte', value: filters.dateRange.end });
  }
  return clauses;
}

/** Calendar-day part of a stored date, e.g. '2025-12-10T20:00' -> '2025-12-10'. */
export function dayOf(date: string): string {
  return date.slice(0, 10);
}

function matchesClause(details: EventDetails, clause: PredicateClause): boolean {
  switch (clause.field) {
    case 'price':
      return details.price !== null && details.price <= clause.value;
    case 'date': {
      if (!details.date) return false;
      const day = dayOf(details.date);
      return clause.op === 'gte' ? day >= clause.value : day <= clause.value;
    }
    default: {
      const actual = details[clause.field];
      return actual !== null && actual.toLowerCase().includes(clause.value.toLowerCase());
    }
  }
}

/** Same semantics as the store's Cypher: a null property never satisfies a clause. */
export function matchesPredicate(details: EventDetails, predicate: EventPredicate): boolean {
  return predicate.every((clause) => matchesClause(details, clause));
}

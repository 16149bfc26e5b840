// src/services/catalog/falkor-catalog.ts
// CatalogStore over a FalkorDB graph, spoken to through GRAPH.QUERY on a Redis connection.

import Redis from 'ioredis';
import type { CandidateSummary, EventDetails } from '@/types/core';
import { CatalogStoreError } from '@/utils/errors';
import { errMessage, logger } from '@/utils/logger';
import type { CatalogStore, CollectionEntry, EventPredicate, PredicateClause, VectorHit } from './catalog-store';
import {
  parseGraphReply,
  toCandidateSummary,
  toCollectionEntry,
  toEventDetails,
  toVectorHit,
  type GraphRow,
} from './graph-reply';

/** The slice of an ioredis client this adapter needs. */
export interface GraphClient {
  call(command: string, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

export interface FalkorCatalogOptions {
  graphName: string;
  /** Summary property holding the embedding; read by the fallback scan. */
  embeddingProperty: string;
}

export type CypherValue = string | number | boolean | null | number[];
export type CypherParams = Record<string, CypherValue>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const EVENT_COLUMNS = [
  'e.uuid AS uuid',
  'e.title AS title',
  'e.venue AS venue',
  'e.date AS date',
  'e.price AS price',
  'e.city AS city',
  'e.genre AS genre',
  'e.duration AS duration',
  'e.category AS category',
].join(', ');

function assertIdentifier(value: string, what: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new CatalogStoreError(`Invalid ${what}: ${value}`);
  }
  return value;
}

export function toCypherLiteral(value: CypherValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `[${value.map((n) => toCypherLiteral(n)).join(',')}]`;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new CatalogStoreError(`Non-finite query parameter: ${value}`);
    return String(value);
  }
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return JSON.stringify(value);
}

/** Parameters travel in the query text as a `CYPHER a=1 b="x"` prefix. */
export function buildParamPrefix(params: CypherParams): string {
  const entries = Object.entries(params);
  if (entries.length === 0) return '';
  return `CYPHER ${entries.map(([name, value]) => `${assertIdentifier(name, 'parameter name')}=${toCypherLiteral(value)}`).join(' ')} `;
}

function compileClause(clause: PredicateClause, param: string): string {
  switch (clause.field) {
    case 'price':
      return `e.price <= $${param}`;
    case 'date':
      return `substring(e.date, 0, 10) ${clause.op === 'gte' ? '>=' : '<='} $${param}`;
    default:
      return `toLower(e.${clause.field}) CONTAINS toLower($${param})`;
  }
}

/**
 * Compile a predicate to a WHERE fragment over `e:Event`. Missing properties
 * evaluate to null in Cypher, so they never satisfy a clause.
 */
export function compileCypherWhere(predicate: EventPredicate): { where: string; params: CypherParams } {
  const params: CypherParams = {};
  const conditions = predicate.map((clause, i) => {
    const name = `p${i}`;
    params[name] = clause.value;
    return compileClause(clause, name);
  });
  return { where: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '', params };
}

function collect<T>(rows: GraphRow[], parse: (row: GraphRow) => T | null): T[] {
  const out: T[] = [];
  for (const row of rows) {
    const parsed = parse(row);
    if (parsed !== null) out.push(parsed);
  }
  return out;
}

export class FalkorCatalogStore implements CatalogStore {
  private readonly graphName: string;
  private readonly embeddingProperty: string;

  constructor(
    private readonly client: GraphClient,
    options: FalkorCatalogOptions,
  ) {
    this.graphName = options.graphName;
    this.embeddingProperty = assertIdentifier(options.embeddingProperty, 'embedding property');
  }

  async findEventIds(predicate: EventPredicate): Promise<string[]> {
    const { where, params } = compileCypherWhere(predicate);
    const rows = await this.query(`MATCH (e:Event) ${where} RETURN DISTINCT e.uuid AS uuid`, params);
    const ids = new Set<string>();
    for (const row of rows) {
      const id = row.uuid;
      if (typeof id === 'string' && id) ids.add(id);
    }
    return [...ids];
  }

  async vectorQuery(label: string, property: string, k: number, vector: number[]): Promise<VectorHit[]> {
    try {
      const rows = await this.query(
        'CALL db.idx.vector.queryNodes($label, $property, $k, vecf32($vec)) YIELD node, score ' +
          'RETURN node.event_uuid AS event_uuid, node.sentiment_summary AS sentiment_summary, score',
        { label, property, k, vec: vector },
      );
      return collect(rows, toVectorHit);
    } catch (err) {
      // A missing index is expected on fresh graphs; the retriever falls back to a scan.
      logger.warn('catalog:vector_query_failed', { label, property, error: errMessage(err) });
      return [];
    }
  }

  async getAllSummaries(limit: number): Promise<CandidateSummary[]> {
    const prop = this.embeddingProperty;
    const rows = await this.query(
      `MATCH (s:AISummary) WHERE s.${prop} IS NOT NULL ` +
        `RETURN s.event_uuid AS event_uuid, s.sentiment_summary AS sentiment_summary, s.${prop} AS embedding ` +
        'LIMIT $limit',
      { limit },
    );
    return collect(rows, toCandidateSummary).filter((s) => s.embedding !== undefined);
  }

  async getEventDetails(uuid: string): Promise<EventDetails | null> {
    const rows = await this.query(`MATCH (e:Event {uuid: $uuid}) RETURN ${EVENT_COLUMNS} LIMIT 1`, { uuid });
    const [first] = collect(rows, toEventDetails);
    return first ?? null;
  }

  async getCollection(tag: string, limit: number): Promise<CollectionEntry[]> {
    const rows = await this.query(
      'MATCH (c:Collection {category: $tag})-[r:CONTAINS]->(e:Event) ' +
        'OPTIONAL MATCH (e)-[:HAS_AI_SUMMARY]->(s:AISummary) ' +
        `RETURN ${EVENT_COLUMNS}, r.rank AS rank, r.reason AS reason, s.sentiment_summary AS sentiment_summary ` +
        'ORDER BY r.rank ASC LIMIT $limit',
      { tag, limit },
    );
    return collect(rows, toCollectionEntry).sort((a, b) => a.rank - b.rank);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async query(cypher: string, params: CypherParams): Promise<GraphRow[]> {
    const text = `${buildParamPrefix(params)}${cypher}`;
    let reply: unknown;
    try {
      reply = await this.client.call('GRAPH.QUERY', this.graphName, text);
    } catch (err) {
      throw new CatalogStoreError(`GRAPH.QUERY on ${this.graphName} failed: ${errMessage(err)}`, { cause: err });
    }
    return parseGraphReply(reply);
  }
}

export interface FalkorConnectionConfig {
  url: string;
  graphName: string;
  timeoutMs: number;
  embeddingProperty: string;
}

export function createFalkorCatalogStore(config: FalkorConnectionConfig): FalkorCatalogStore {
  const client = new Redis(config.url, {
    retryStrategy: (times) => Math.min(times * 50, 30_000),
    maxRetriesPerRequest: 3,
    commandTimeout: config.timeoutMs,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('error', (err: Error) => {
    logger.error('catalog:connection_error', { error: err.message });
  });
  client.on('ready', () => {
    logger.info('catalog:ready', { graph: config.graphName });
  });

  return new FalkorCatalogStore(client, {
    graphName: config.graphName,
    embeddingProperty: config.embeddingProperty,
  });
}

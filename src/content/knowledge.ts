import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { TenantCache } from '../cache/tenant-cache.js';
import type { ContentRepository } from './repository.js';
import { KnowledgeChunkSchema, type KnowledgeChunk } from './types.js';

export interface KnowledgeQuery {
  text: string;
  smeIds?: readonly string[];
  limit: number;
}

export interface KnowledgeSource {
  /** Chunks most relevant to `text`, best first. */
  rankedChunks(tenantId: string, query: KnowledgeQuery): Promise<KnowledgeChunk[]>;
  /** Drops cached rankings after new knowledge was stored. */
  invalidate(tenantId: string): Promise<void>;
}

const RankedChunksSchema = z.array(KnowledgeChunkSchema);
const GenerationSchema = z.string();
const GENERATION_KEY = 'knowledge:generation';

function terms(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter((term) => term.length > 2));
}

export function scoreChunk(chunk: KnowledgeChunk, queryTerms: Set<string>): number {
  let score = 0;
  for (const term of terms(`${chunk.topic ?? ''} ${chunk.content}`)) {
    if (queryTerms.has(term)) score++;
  }
  return score;
}

export function rankChunks(chunks: readonly KnowledgeChunk[], text: string, limit: number): KnowledgeChunk[] {
  const queryTerms = terms(text);
  return chunks
    .map((chunk, index) => ({ chunk, index, score: scoreChunk(chunk, queryTerms) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, limit)
    .map(({ chunk }) => chunk);
}

function rankingKey(generation: string, query: KnowledgeQuery): string {
  const digest = createHash('sha256')
    .update(JSON.stringify({ smeIds: [...(query.smeIds ?? [])].sort(), text: query.text, limit: query.limit }))
    .digest('hex')
    .slice(0, 32);
  return `knowledge:${generation}:${digest}`;
}

/**
 * Ranks stored knowledge by term overlap with the query. Rankings are cached
 * per tenant under a generation marker that ingestion bumps.
 */
export class CachedKnowledgeSource implements KnowledgeSource {
  constructor(private content: ContentRepository, private cache: TenantCache) {}

  async rankedChunks(tenantId: string, query: KnowledgeQuery): Promise<KnowledgeChunk[]> {
    const generation = (await this.cache.get(tenantId, GENERATION_KEY, GenerationSchema)) ?? '0';
    return this.cache.getOrLoad(tenantId, rankingKey(generation, query), RankedChunksSchema, async () => {
      const chunks = await this.content.listKnowledgeChunks(tenantId, query.smeIds);
      return rankChunks(chunks, query.text, query.limit);
    });
  }

  async invalidate(tenantId: string): Promise<void> {
    await this.cache.set(tenantId, GENERATION_KEY, String(Date.now()), 24 * 60 * 60);
  }
}

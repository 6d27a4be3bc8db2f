import { describe, it, expect, beforeEach } from 'vitest';
import { CachedKnowledgeSource, rankChunks, scoreChunk } from './knowledge.js';
import { InMemoryContentRepository } from './repository.js';
import type { KnowledgeChunk } from './types.js';
import { InMemoryCacheBackend, TenantCache } from '../cache/index.js';
import { silentLogger } from '../logger.js';
import { OTHER_TENANT, TENANT } from '../testing/fixtures.js';

function chunk(id: string, topic: string | null, content: string): KnowledgeChunk {
  return { id, smeId: 'sme-1', topic, content, sourcePath: null };
}

const escalations = chunk('sme-1-1', 'Escalation', 'Escalations go to tier two');
const refunds = chunk('sme-1-2', 'Refunds', 'Refunds are issued within 14 days');
const receipts = chunk('sme-1-3', null, 'Refunds need a receipt');

describe('scoreChunk', () => {
  it('should count shared terms of three or more characters', () => {
    expect(scoreChunk(refunds, new Set(['refund', 'window', 'days']))).toBe(1);
    expect(scoreChunk(refunds, new Set(['refunds', 'issued']))).toBe(2);
  });
});

describe('rankChunks', () => {
  it('should order chunks by overlap with the query', () => {
    const ranked = rankChunks([escalations, refunds, receipts], 'How are refunds issued?', 2);

    expect(ranked).toEqual([refunds, receipts]);
  });

  it('should keep stored order between equal scores', () => {
    expect(rankChunks([escalations, refunds, receipts], 'nothing relevant', 3)).toEqual([escalations, refunds, receipts]);
  });
});

describe('CachedKnowledgeSource', () => {
  let content: InMemoryContentRepository;
  let source: CachedKnowledgeSource;

  beforeEach(() => {
    content = new InMemoryContentRepository();
    const logger = silentLogger();
    source = new CachedKnowledgeSource(content, new TenantCache(new InMemoryCacheBackend(), { defaultTtlSeconds: 300, logger }));
  });

  it('should serve cached rankings until the tenant knowledge is invalidated', async () => {
    await content.saveKnowledgeChunks(TENANT, 'sme-1', [refunds]);
    expect(await source.rankedChunks(TENANT, { text: 'refunds', limit: 5 })).toEqual([refunds]);

    await content.saveKnowledgeChunks(TENANT, 'sme-1', [refunds, receipts]);
    expect(await source.rankedChunks(TENANT, { text: 'refunds', limit: 5 })).toEqual([refunds]);

    await source.invalidate(TENANT);
    expect(await source.rankedChunks(TENANT, { text: 'refunds', limit: 5 })).toEqual([refunds, receipts]);
  });

  it('should only rank the tenant own knowledge', async () => {
    await content.saveKnowledgeChunks(TENANT, 'sme-1', [refunds]);

    expect(await source.rankedChunks(OTHER_TENANT, { text: 'refunds', limit: 5 })).toEqual([]);
  });

  it('should restrict ranking to the requested experts', async () => {
    const other = { ...receipts, id: 'sme-2-1', smeId: 'sme-2' };
    await content.saveKnowledgeChunks(TENANT, 'sme-1', [refunds]);
    await content.saveKnowledgeChunks(TENANT, 'sme-2', [other]);

    expect(await source.rankedChunks(TENANT, { text: 'refunds', smeIds: ['sme-2'], limit: 5 })).toEqual([other]);
  });
});

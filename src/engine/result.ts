import { z } from 'zod';
import type { ContentRecord, SourceEntity } from '../discovery/types.js';
import type { StrategyName } from './rank.js';

export interface ResultParams {
  limit: number;
  targetNewCount?: number;
  maxAgeHours?: number;
  hashtags?: string[];
}

export interface RankedResultSet {
  sourceEntity: SourceEntity;
  generatedAt: string;
  strategy: StrategyName;
  params: ResultParams;
  records: ContentRecord[];
}

const ContentRecordSchema = z.object({
  id: z.string(),
  url: z.string(),
  shortcode: z.string().nullable(),
  sourceEntity: z.string(),
  timestamp: z.string().nullable(),
  rawText: z.string(),
  kind: z.enum(['photo', 'reel', 'unknown']),
  metrics: z
    .object({
      likes: z.number().int().nonnegative(),
      comments: z.number().int().nonnegative(),
      engagementScore: z.number().int().nonnegative(),
    })
    .nullable(),
  hashtags: z.array(z.string()),
  audioName: z.string().nullable(),
});

export const RankedResultSetSchema = z.object({
  sourceEntity: z.object({
    kind: z.enum(['handle', 'topic']),
    value: z.string(),
  }),
  generatedAt: z.string().datetime(),
  strategy: z.enum(['chronological', 'engagement']),
  params: z.object({
    limit: z.number().int().nonnegative(),
    targetNewCount: z.number().int().optional(),
    maxAgeHours: z.number().optional(),
    hashtags: z.array(z.string()).optional(),
  }),
  records: z.array(ContentRecordSchema),
});

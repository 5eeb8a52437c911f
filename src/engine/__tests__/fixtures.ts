import type { ContentRecord } from '../../discovery/types.js';

export function makeRecord(overrides: Partial<ContentRecord> = {}): ContentRecord {
  return {
    id: 'https://example.test/p/A/',
    url: 'https://example.test/p/A/',
    shortcode: 'A',
    sourceEntity: 'handle:corner_cafe',
    timestamp: '2025-05-01T12:00:00Z',
    rawText: 'Flat white season',
    kind: 'photo',
    metrics: null,
    hashtags: [],
    audioName: null,
    ...overrides,
  };
}

export function withMetrics(likes: number, comments: number): ContentRecord['metrics'] {
  return { likes, comments, engagementScore: likes + 3 * comments };
}

// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { RawResult } from './types';
import { PlatformMappers, type MapperKind } from './PlatformMappers';
import type { Logger } from '../../observability/Logger';

// Validation schema (exported for JSON Schema generation)
export const RawResultSchema = z.object({
  title: z.string().trim().min(1),
  url: z.string().trim().url(),
  content: z.string(),
  platform: z.string().min(1),
  query: z.string(),
  date: z.string().datetime(),
  metadata: z.record(z.unknown()).optional(),
});

export interface NormalizeContext {
  platform: string;
  query: string;
}

export class Normalizer {
  private mappers: PlatformMappers;

  constructor(
    private logger?: Logger,
    private clock: () => Date = () => new Date()
  ) {
    this.mappers = new PlatformMappers();
  }

  /**
   * Map raw platform records onto RawResult.
   *
   * Records without a usable title or an absolute URL are dropped here, so
   * everything downstream can rely on both being present.
   */
  normalize(kind: MapperKind, ctx: NormalizeContext, rawData: unknown[]): RawResult[] {
    const mapper = this.mappers.get(kind);
    if (!mapper) {
      throw new Error(`No mapper found for platform kind: ${kind}`);
    }

    const now = this.clock();
    const results: RawResult[] = [];
    let dropped = 0;

    for (const item of rawData) {
      const mapped = mapper(item, { ...ctx, now });
      const parsed = mapped ? RawResultSchema.safeParse(mapped) : undefined;

      if (!parsed?.success) {
        dropped++;
        continue;
      }

      // Keep metadata keys that carry a value
      const metadata = parsed.data.metadata
        ? Object.fromEntries(Object.entries(parsed.data.metadata).filter(([, v]) => v !== undefined))
        : undefined;

      results.push({ ...parsed.data, metadata });
    }

    if (dropped > 0) {
      this.logger?.debug('Dropped unusable records', { platform: ctx.platform, kind, dropped });
    }

    return results;
  }
}

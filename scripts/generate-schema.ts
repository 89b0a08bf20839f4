#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod result schema
 *
 * Converts the schema the Normalizer validates crawled items against into
 * standard JSON Schema, for consumers of reports outside TypeScript.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { RawResultSchema } from '../src/core/normalizer/Normalizer';

const OUTPUT_PATH = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '../src/core/normalizer/schema.json'
);

function generateSchema(): void {
  console.log('Generating JSON Schema from Zod...');

  const jsonSchema = zodToJsonSchema(RawResultSchema, {
    name: 'RawResult',
    $refStrategy: 'none',
    target: 'jsonSchema7',
    definitions: {},
    errorMessages: true,
  });

  const schemaWithMetadata = {
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'RawResult',
    description: 'One crawled search result, before relevance scoring',
    version: '1.0.0',
    ...jsonSchema,
    examples: [
      {
        title: 'vitest: flaky snapshot tests on CI',
        url: 'https://github.com/example/project/issues/42',
        content: 'Snapshots differ between local and CI runs.',
        platform: 'github',
        query: 'vitest flaky',
        date: '2024-01-15T10:30:00.000Z',
        metadata: {
          stars: 42,
          language: 'TypeScript',
        },
      },
    ],
  };

  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');

  console.log(`JSON Schema generated: ${OUTPUT_PATH}`);
  console.log(`Schema version: ${schemaWithMetadata.version}`);
  console.log('Fields: title, url, content, platform, query, date, metadata');
}

try {
  generateSchema();
  process.exit(0);
} catch (error: unknown) {
  console.error('Failed to generate JSON Schema:', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}

#!/usr/bin/env tsx
/**
 * Re-run tag aggregation over the whole vault
 * Article stages are read from cache; only missing artifacts are generated.
 *
 * Usage:
 *   npx tsx scripts/rebuild-tags.ts [--rebuild-tags] [--sequential] [--vault <dir>]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config();

import { assertRunnable, loadPipelineConfig } from '@/src/config/pipeline';
import { createRunContext } from '@/src/lib/pipeline/run-context';
import { rebuildTags } from '@/src/lib/pipeline/batch';
import { logger } from '@/src/lib/logger';
import { applyCliFlags } from './cli-flags';

async function main() {
  try {
    const config = applyCliFlags(loadPipelineConfig(), process.argv.slice(2));
    assertRunnable(config);

    const result = await rebuildTags(createRunContext(config));
    if (!result) {
      console.log('\n⚠ No articles found, nothing to do');
      return;
    }

    console.log('\n✓ Tags rebuilt');
    console.log(`  Vocabulary: ${result.vocabulary.length} tags`);
    console.log(`  Articles retagged: ${result.retaggedArticles}`);
    console.log(`  Descriptions written: ${result.descriptions}`);
    console.log(`  Surveys written: ${result.surveys}`);
  } catch (error) {
    logger.error('[REBUILD-TAGS] Fatal error', error);
    console.error('\n✗ Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();

#!/usr/bin/env tsx
/**
 * Run the article pipeline for a single article (no tag aggregation)
 *
 * Usage:
 *   npx tsx scripts/process-article.ts <article-slug> [--rebuild] [--from-scratch] [--vault <dir>]
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config();

import { assertRunnable, loadPipelineConfig } from '@/src/config/pipeline';
import { createRunContext } from '@/src/lib/pipeline/run-context';
import { processArticleBySlug } from '@/src/lib/pipeline/batch';
import { articleOutcome } from '@/src/lib/pipeline/article-pipeline';
import { logger } from '@/src/lib/logger';
import { applyCliFlags, positionalArgs } from './cli-flags';

async function main() {
  const args = process.argv.slice(2);
  const [slug] = positionalArgs(args);
  if (!slug) {
    console.error('Usage: npx tsx scripts/process-article.ts <article-slug> [--rebuild]');
    process.exit(1);
  }

  try {
    const config = applyCliFlags(loadPipelineConfig(), args);
    assertRunnable(config);

    const record = await processArticleBySlug(createRunContext(config), slug);
    const outcome = articleOutcome(record);
    if (!record) {
      console.error(`\n✗ Article "${slug}" could not be processed`);
      process.exit(1);
    }

    console.log(`\n✓ ${record.title} (${outcome})`);
    console.log(`  Summary: ${record.summary ? 'yes' : 'no'}`);
    console.log(`  Short summary: ${record.shortSummary ? 'yes' : 'no'}`);
    console.log(`  TLDR: ${record.tldr?.text ?? 'n/a'}`);
    console.log(`  Tags: ${record.tags.join(', ') || 'none'}`);
  } catch (error) {
    logger.error('[PROCESS-ARTICLE] Fatal error', error);
    console.error('\n✗ Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();

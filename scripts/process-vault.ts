#!/usr/bin/env tsx
/**
 * Process every article in the vault, then update all tags
 *
 * Usage:
 *   npx tsx scripts/process-vault.ts [options]
 *
 * Options:
 *   --vault <dir>        Vault root (overrides VAULT_DIR)
 *   --rebuild            Regenerate every artifact, seeding prompts with the previous content
 *   --from-scratch       With --rebuild, ignore previous content
 *   --rebuild-tags       Regenerate tag descriptions even when cached
 *   --sequential         Process articles and tags one at a time
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config();

import { assertRunnable, loadPipelineConfig } from '@/src/config/pipeline';
import { createRunContext } from '@/src/lib/pipeline/run-context';
import { runBatch } from '@/src/lib/pipeline/batch';
import { logger } from '@/src/lib/logger';
import { applyCliFlags } from './cli-flags';

async function main() {
  try {
    const config = applyCliFlags(loadPipelineConfig(), process.argv.slice(2));
    assertRunnable(config);

    logger.info('[PROCESS-VAULT] Starting', {
      vault: config.vaultDir,
      provider: config.provider,
      rebuild: config.rebuild,
      maxConcurrent: config.maxConcurrent,
    });

    const result = await runBatch(createRunContext(config));

    console.log('\n✓ Vault processed');
    console.log(`  Articles discovered: ${result.discovered}`);
    console.log(`  Complete: ${result.completed}`);
    console.log(`  Partial: ${result.partial}`);
    console.log(`  Failed: ${result.failed}`);
    console.log(`  Tags: ${result.tags}`);
    console.log(`  Surveys: ${result.surveys}`);
    console.log(`  Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
  } catch (error) {
    logger.error('[PROCESS-VAULT] Fatal error', error);
    console.error('\n✗ Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

main();

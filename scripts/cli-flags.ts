/**
 * Shared command-line flags for the vault scripts
 */

import * as path from 'path';
import type { PipelineConfig } from '@/src/config/pipeline';

const VALUE_FLAGS = new Set(['--vault']);

/**
 * Arguments that are neither flags nor flag values
 */
export function positionalArgs(args: string[]): string[] {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.has(args[i])) {
      i++;
      continue;
    }
    if (!args[i].startsWith('--')) positional.push(args[i]);
  }
  return positional;
}

export function applyCliFlags(config: PipelineConfig, args: string[]): PipelineConfig {
  const next: PipelineConfig = { ...config };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--vault': {
        const value = args[++i];
        if (value) {
          next.vaultDir = path.resolve(value);
          next.docsDir = path.join(next.vaultDir, 'docs');
          next.tagsDir = path.join(next.vaultDir, 'tags');
        }
        break;
      }
      case '--rebuild':
        next.rebuild = true;
        break;
      case '--from-scratch':
        next.fromScratch = true;
        break;
      case '--rebuild-tags':
        next.rebuildTags = true;
        break;
      case '--sequential':
        next.maxConcurrent = -1;
        break;
    }
  }

  return next;
}

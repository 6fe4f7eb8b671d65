/**
 * Run context
 * Everything one batch run shares: config, gateway, prompts, tag registry and usage counters.
 * Built once per run and passed explicitly to the article pipeline and tag aggregator.
 */

import type { PipelineConfig } from "../../config/pipeline";
import { type LlmGateway, createGateway } from "../llm/gateway";
import { UsageTracker } from "../llm/usage";
import { PromptCatalog } from "../prompts/catalog";
import { PromptLoader } from "../prompts/loader";
import { SimilarityIndex } from "../rag/similarity-index";
import { TagRegistry } from "./tag-registry";

export interface RunContext {
  config: PipelineConfig;
  gateway: LlmGateway;
  usage: UsageTracker;
  prompts: PromptCatalog;
  tags: TagRegistry;
  rag: SimilarityIndex;
}

export interface RunContextOverrides {
  gateway?: LlmGateway;
  usage?: UsageTracker;
  prompts?: PromptCatalog;
}

export function createRunContext(
  config: PipelineConfig,
  overrides: RunContextOverrides = {}
): RunContext {
  const usage = overrides.usage ?? new UsageTracker();
  const gateway = overrides.gateway ?? createGateway(config, usage);
  const prompts = overrides.prompts ?? new PromptCatalog(new PromptLoader(config.promptsDir));

  return {
    config,
    gateway,
    usage,
    prompts,
    tags: new TagRegistry(config.tagsDir),
    rag: new SimilarityIndex(gateway, { docsDir: config.docsDir, tagsDir: config.tagsDir }),
  };
}

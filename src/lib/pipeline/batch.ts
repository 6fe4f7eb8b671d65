/**
 * Batch orchestrator
 * Discover -> article pipeline per article -> tag aggregation -> usage report
 */

import { promises as fs } from "fs";
import path from "path";
import type { ArticleRecord, BatchResult, DiscoveredArticle } from "../model";
import { UsageReporter } from "../llm/usage";
import { createLogger, errorMessage } from "../logger";
import { runEach } from "../utils/tasks";
import { slugify } from "../utils/slug";
import { articleOutcome, processArticle } from "./article-pipeline";
import { aggregateTags, type TagAggregationResult } from "./tag-aggregator";
import { discoverArticles } from "./discovery";
import type { RunContext } from "./run-context";

const logger = createLogger("batch");

async function ensureVaultDirectories(ctx: RunContext): Promise<void> {
  await fs.mkdir(ctx.config.docsDir, { recursive: true });
  await fs.mkdir(ctx.config.tagsDir, { recursive: true });
}

/**
 * Run the usage reporter around `work` and always log the final usage table
 */
async function withUsageReport<T>(ctx: RunContext, work: () => Promise<T>): Promise<T> {
  const reporter = new UsageReporter(ctx.usage, ctx.config.usageReportIntervalMs);
  reporter.start();
  try {
    return await work();
  } finally {
    await reporter.stop();
    logger.info(`\n${ctx.usage.formatTable()}`);
  }
}

/**
 * Run one article's pipeline; an unexpected error fails that article only
 */
async function processIsolated(ctx: RunContext, article: DiscoveredArticle): Promise<ArticleRecord | null> {
  try {
    return await processArticle(ctx, article);
  } catch (error) {
    logger.error(`Failed to process "${article.title}"`, {
      directory: article.directoryPath,
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Process every article in the vault, then update all tags
 */
export async function runBatch(ctx: RunContext): Promise<BatchResult> {
  const startTime = Date.now();

  return withUsageReport(ctx, async () => {
    await ensureVaultDirectories(ctx);
    const articles = await discoverArticles(ctx.config.docsDir);

    const sequential = ctx.config.maxConcurrent < 0;
    const outcomes = await runEach(
      articles,
      async (article, index) => {
        logger.info(`[${index + 1}/${articles.length}] Processing "${article.title}"`);
        return processIsolated(ctx, article);
      },
      sequential
    );

    const records = outcomes.filter((record): record is ArticleRecord => record !== null);
    let tagResult: TagAggregationResult | null = null;
    if (records.length > 0) {
      tagResult = await aggregateTags(ctx, records);
    } else {
      logger.warn("No articles processed, skipping tag update");
    }

    const result: BatchResult = {
      discovered: articles.length,
      completed: outcomes.filter((r) => articleOutcome(r) === "complete").length,
      partial: outcomes.filter((r) => articleOutcome(r) === "partial").length,
      failed: outcomes.filter((r) => articleOutcome(r) === "failed").length,
      tags: tagResult?.tags.length ?? 0,
      surveys: tagResult?.surveys ?? 0,
      durationMs: Date.now() - startTime,
    };

    logger.info("Batch complete", { ...result });
    return result;
  });
}

/**
 * Run the article pipeline for one article directory, without tag aggregation
 */
export async function processArticleBySlug(
  ctx: RunContext,
  slug: string
): Promise<ArticleRecord | null> {
  return withUsageReport(ctx, async () => {
    const articles = await discoverArticles(ctx.config.docsDir);
    const wanted = slugify(slug);
    const article = articles.find((a) => a.slug === wanted || path.basename(a.directoryPath) === slug);
    if (!article) {
      logger.error(`No article found for "${slug}"`, { docsDir: ctx.config.docsDir });
      return null;
    }

    const record = await processArticle(ctx, article);
    logger.info(`Finished "${article.title}"`, { outcome: articleOutcome(record) });
    return record;
  });
}

/**
 * Reload every article (cached stages make no calls) and re-run tag aggregation
 */
export async function rebuildTags(ctx: RunContext): Promise<TagAggregationResult | null> {
  return withUsageReport(ctx, async () => {
    const articles = await discoverArticles(ctx.config.docsDir);
    const records: ArticleRecord[] = [];
    for (const article of articles) {
      const record = await processIsolated(ctx, article);
      if (record) records.push(record);
    }
    if (records.length === 0) {
      logger.warn("No articles to aggregate tags for");
      return null;
    }
    return aggregateTags(ctx, records);
  });
}

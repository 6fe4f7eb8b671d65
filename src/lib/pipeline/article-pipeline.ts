/**
 * Article pipeline
 * Per-article staged generation: extraction intake, multi-pass summary, short summary,
 * TLDR and tag extraction. Each stage checks its own cache, so a warm rerun makes no LLM calls.
 * A failed stage leaves the later fields of the record empty instead of failing the batch.
 */

import type { ArticleOutcome, ArticleRecord, ChatMessage, Content, DiscoveredArticle } from "../model";
import { VAULT_FILES } from "../../config/pipeline";
import { loadContent, saveContent, saveEmbedding } from "../storage/content-store";
import { readTagList, writeTagList } from "../storage/tag-list";
import { assistantMessage, labeledBlock, userMessage } from "../llm/messages";
import { orNotAvailable } from "../prompts/loader";
import { SHORT_SUMMARY_INSTRUCTION } from "../prompts/catalog";
import { isUsableContext } from "../rag/similarity-index";
import { parseTagList } from "../utils/slug";
import { createLogger } from "../logger";
import { RAG_ANCHOR_STAGE, SUMMARY_STAGES } from "./summary-stages";
import { pruneTags } from "./tag-aggregator";
import type { RunContext } from "./run-context";

const logger = createLogger("article");

/**
 * Embed freshly generated text and persist both files.
 * A failed embedding still caches the text.
 */
async function persistGenerated(
  ctx: RunContext,
  directory: string,
  fileName: string,
  text: string
): Promise<Content> {
  const embedding = await ctx.gateway.embed(text);
  await saveContent(directory, fileName, text, embedding);
  return embedding ? { text, embedding } : { text };
}

/**
 * Stage 1: load extracted.md and make sure its embedding exists.
 * The text is never rewritten; only a missing vector file is filled in.
 */
export async function loadExtracted(ctx: RunContext, directory: string): Promise<Content | null> {
  const extracted = await loadContent(directory, VAULT_FILES.extracted);
  if (!extracted) {
    logger.error(`${VAULT_FILES.extracted} not found, skipping article`, { directory });
    return null;
  }

  if (extracted.embedding) {
    return extracted;
  }

  logger.info(`Embedding ${VAULT_FILES.extracted}`, { directory });
  const embedding = await ctx.gateway.embed(extracted.text);
  if (!embedding) {
    logger.warn("Could not embed extracted text, continuing without it", { directory });
    return extracted;
  }
  await saveEmbedding(directory, VAULT_FILES.extracted, embedding);
  return { text: extracted.text, embedding };
}

/**
 * Stage 2: multi-pass summary. Every stage sees the full conversation so far;
 * any failed stage aborts the summary without caching anything.
 */
export async function generateSummary(
  ctx: RunContext,
  article: DiscoveredArticle,
  extracted: Content
): Promise<Content | null> {
  const { config, gateway, prompts } = ctx;
  const cached = await loadContent(article.directoryPath, VAULT_FILES.summary);
  if (cached && !config.rebuild) {
    logger.debug("Reusing cached summary", { slug: article.slug });
    return cached;
  }

  const previous = config.fromScratch ? undefined : cached?.text;
  const systemPrompt = await prompts.get("articleSummarySystem");

  const conversation: ChatMessage[] = [
    labeledBlock("This is the Article Content", extracted.text),
    labeledBlock("This is the Previous Summary", orNotAvailable(previous)),
  ];
  const stageOutputs: ChatMessage[] = [];

  logger.info(`Generating summary for "${article.title}"`, { stages: SUMMARY_STAGES.length });

  for (const stage of SUMMARY_STAGES) {
    const template = await prompts.file(stage.templateFile);
    conversation.push(userMessage(stage.instruction, { template }));

    const text = await gateway.complete({
      messages: conversation,
      systemPrompt,
      model: config.models.default,
      maxTokens: config.maxTokens.summaryPass,
      thinking: config.thinking,
    });
    if (!text) {
      logger.error(`Summary stage "${stage.name}" failed`, { slug: article.slug });
      return null;
    }

    logger.debug(`Generated ${stage.name}`, { slug: article.slug, chars: text.length });
    conversation.push(assistantMessage(text));
    stageOutputs.push(assistantMessage(text));

    if (stage.name === RAG_ANCHOR_STAGE && config.enableRag) {
      const [similarArticles, similarTags] = await Promise.all([
        ctx.rag.relevantContext(text, "articles", config.ragTopK, article.slug),
        ctx.rag.relevantContext(text, "tags", config.ragTopK),
      ]);
      const blocks = [similarArticles, similarTags].filter(isUsableContext);
      if (blocks.length > 0) {
        conversation.push(userMessage(blocks.join("\n\n")));
      }
    }
  }

  const merged = await gateway.complete({
    messages: [...stageOutputs, userMessage(await prompts.mergeInstruction())],
    systemPrompt,
    model: config.models.fast,
    maxTokens: config.maxTokens.summaryMerge,
    thinking: config.thinking,
  });
  if (!merged) {
    logger.error("Summary merge failed", { slug: article.slug });
    return null;
  }

  const content = await persistGenerated(ctx, article.directoryPath, VAULT_FILES.summary, merged);
  logger.info(`Saved summary for "${article.title}"`, { chars: merged.length });
  return content;
}

/**
 * Stage 3: short summary from the truncated article text and the full summary
 */
export async function generateShortSummary(
  ctx: RunContext,
  article: DiscoveredArticle,
  extracted: Content,
  summary: Content
): Promise<Content | null> {
  const { config, gateway, prompts } = ctx;
  const cached = await loadContent(article.directoryPath, VAULT_FILES.shortSummary);
  if (cached && !config.rebuild) {
    return cached;
  }

  const text = await gateway.complete({
    messages: [
      labeledBlock("This is the Article Content", extracted.text.substring(0, config.shortSummaryInputChars)),
      labeledBlock("This is the Full Summary", summary.text),
      userMessage(SHORT_SUMMARY_INSTRUCTION),
    ],
    systemPrompt: await prompts.get("shortSummarySystem"),
    model: config.models.fast,
    maxTokens: config.maxTokens.shortSummary,
  });
  if (!text) {
    logger.error("Short summary failed", { slug: article.slug });
    return null;
  }

  return persistGenerated(ctx, article.directoryPath, VAULT_FILES.shortSummary, text);
}

/**
 * Stage 4: TLDR from the short summary, optionally grounded on similar articles
 */
export async function generateTldr(
  ctx: RunContext,
  article: DiscoveredArticle,
  shortSummary: Content
): Promise<Content | null> {
  const { config, gateway, prompts } = ctx;
  const cached = await loadContent(article.directoryPath, VAULT_FILES.tldr);
  if (cached && !config.rebuild) {
    return cached;
  }

  const messages: ChatMessage[] = [labeledBlock("This is the Article Summary", shortSummary.text)];
  if (config.enableRag) {
    const context = await ctx.rag.relevantContext(article.title, "articles", 2, article.slug);
    if (isUsableContext(context)) {
      messages.push(labeledBlock("This is the RAG Context", context));
    }
  }

  const text = await gateway.complete({
    messages,
    systemPrompt: await prompts.get("tldrSystem"),
    model: config.models.fast,
    maxTokens: config.maxTokens.tldr,
  });
  if (!text) {
    logger.warn("TLDR failed", { slug: article.slug });
    return null;
  }

  return persistGenerated(ctx, article.directoryPath, VAULT_FILES.tldr, text.trim());
}

/**
 * Stage 5: comma-separated tags from the short summary, seeded with the previous tags
 */
export async function extractTags(
  ctx: RunContext,
  article: DiscoveredArticle,
  shortSummary: Content
): Promise<string[]> {
  const { config, gateway, prompts } = ctx;
  const existing = await readTagList(article.directoryPath);
  if (existing && existing.length > 0 && !config.rebuild) {
    return existing;
  }

  const seed = config.fromScratch ? [] : existing ?? [];
  const messages: ChatMessage[] = [labeledBlock("This is the Article Summary", shortSummary.text)];
  if (seed.length > 0) {
    messages.push(labeledBlock("These are the Previous Tags", seed.join(", ")));
  }

  const answer = await gateway.complete({
    messages,
    systemPrompt: await prompts.get("extractTagsSystem"),
    model: config.models.tag,
    maxTokens: config.maxTokens.tags,
    thinking: false,
  });
  if (!answer) {
    logger.warn("Tag extraction failed", { slug: article.slug });
    return [];
  }

  let tags = parseTagList(answer);
  if (config.pruneTags && tags.length > 0) {
    tags = await pruneTags(ctx, tags);
  }
  if (tags.length === 0) {
    logger.warn("Tag extraction returned no usable tags", { slug: article.slug, answer });
    return [];
  }

  await writeTagList(article.directoryPath, tags);
  logger.info(`Extracted tags for "${article.title}"`, { tags });
  return tags;
}

/**
 * Run every stage for one article.
 * Returns null only when extracted.md is missing; later failures give a partial record.
 */
export async function processArticle(
  ctx: RunContext,
  article: DiscoveredArticle
): Promise<ArticleRecord | null> {
  const extracted = await loadExtracted(ctx, article.directoryPath);
  if (!extracted) {
    return null;
  }

  const record: ArticleRecord = { ...article, extracted, tags: [] };

  const summary = await generateSummary(ctx, article, extracted);
  if (!summary) {
    logger.warn(`Stopping after failed summary for "${article.title}"`);
    return record;
  }
  record.summary = summary;

  const shortSummary = await generateShortSummary(ctx, article, extracted, summary);
  if (!shortSummary) {
    logger.warn(`Stopping after failed short summary for "${article.title}"`);
    return record;
  }
  record.shortSummary = shortSummary;

  record.tldr = (await generateTldr(ctx, article, shortSummary)) ?? undefined;
  record.tags = await extractTags(ctx, article, shortSummary);

  return record;
}

export function articleOutcome(record: ArticleRecord | null): ArticleOutcome {
  if (!record) return "failed";
  const complete =
    record.summary !== undefined &&
    record.shortSummary !== undefined &&
    record.tldr !== undefined &&
    record.tags.length > 0;
  return complete ? "complete" : "partial";
}


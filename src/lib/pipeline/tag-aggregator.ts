/**
 * Tag aggregator
 * Pass 1 converges the tag vocabulary across all articles (prune, then reconcile each article).
 * Pass 2 links articles to tags and (re)builds each tag's description and survey.
 * Pass 2 starts only after pass 1 has finished for every article.
 */

import path from "path";
import type { ArticleRecord, ChatMessage, Content, TagRecord } from "../model";
import { VAULT_FILES } from "../../config/pipeline";
import { loadContent, saveContent } from "../storage/content-store";
import { writeTagList } from "../storage/tag-list";
import { assistantMessage, labeledBlock, userMessage } from "../llm/messages";
import { orNotAvailable } from "../prompts/loader";
import {
  DESCRIPTION_INSTRUCTION,
  NO_RELATED_ARTICLES,
  SURVEY_ARTICLE_INSTRUCTION,
  SURVEY_FINAL_INSTRUCTION,
  SURVEY_INTRODUCTION_INSTRUCTION,
} from "../prompts/catalog";
import { humanizeSlug, parseTagList, sameTagSet, slugify, tokenizeTagAnswer } from "../utils/slug";
import { runEach } from "../utils/tasks";
import { createLogger, errorMessage } from "../logger";
import type { RunContext } from "./run-context";

const logger = createLogger("tags");

export interface TagAggregationResult {
  vocabulary: string[];
  tags: TagRecord[];
  retaggedArticles: number;
  descriptions: number;
  surveys: number;
}

interface RelatedSummary {
  slug: string;
  title: string;
  text: string;
}

function unionOfTags(records: readonly ArticleRecord[]): string[] {
  const all = new Set<string>();
  for (const record of records) {
    for (const tag of record.tags) all.add(tag);
  }
  return [...all];
}

/**
 * Ask the model to merge near-duplicates in a tag list.
 * Falls back to the slugified input when the call fails.
 */
export async function pruneTags(ctx: RunContext, tags: readonly string[]): Promise<string[]> {
  const stripped = tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
  if (stripped.length === 0) return [];

  const answer = await ctx.gateway.complete({
    messages: [userMessage(stripped.join(","))],
    systemPrompt: await ctx.prompts.get("pruneTagsSystem"),
    model: ctx.config.models.fast,
    thinking: false,
  });

  if (!answer) {
    logger.error("Failed to prune tags, keeping them as they are", { count: stripped.length });
    return [...new Set(stripped.map(slugify))];
  }

  const pruned = parseTagList(answer);
  logger.info("Pruned tags", { before: stripped.length, after: pruned.length });
  return pruned;
}

/**
 * Ask the model to map one article's tags onto the canonical vocabulary.
 * Returns null when the call fails or yields nothing usable.
 */
export async function reconcileArticleTags(
  ctx: RunContext,
  record: ArticleRecord,
  vocabulary: readonly string[]
): Promise<string[] | null> {
  const messages: ChatMessage[] = [];
  const digest = record.shortSummary?.text ?? record.summary?.text;
  if (digest) {
    messages.push(labeledBlock("Article Summary", digest));
  }
  messages.push(labeledBlock("Pruned Tags", vocabulary.join(",")));
  messages.push(labeledBlock("Article Tags", record.tags.join(",")));

  const answer = await ctx.gateway.complete({
    messages,
    systemPrompt: await ctx.prompts.get("updateTagsSystem"),
    model: ctx.config.models.tag,
    temperature: 0.1,
    thinking: false,
  });
  if (!answer) {
    logger.error(`Failed to update tags for "${record.title}"`, { tags: record.tags });
    return null;
  }

  const tags = [...new Set(tokenizeTagAnswer(answer).map(slugify))];
  return tags.length > 0 ? tags : null;
}

/**
 * Pass 1: prune the global vocabulary and reconcile every article against it.
 * `tags.json` is rewritten only for articles whose tag set changed.
 */
export async function convergeVocabulary(
  ctx: RunContext,
  records: ArticleRecord[]
): Promise<{ vocabulary: string[]; retagged: number }> {
  const union = unionOfTags(records);
  if (!ctx.config.pruneTags || union.length === 0) {
    return { vocabulary: union, retagged: 0 };
  }

  const canonical = await pruneTags(ctx, union);
  logger.info("Canonical vocabulary", { tags: canonical });

  const sequential = ctx.config.maxConcurrent < 0;
  const changed = await runEach(
    records.filter((record) => record.tags.length > 0),
    async (record) => {
      const updated = await reconcileArticleTags(ctx, record, canonical);
      if (!updated || sameTagSet(record.tags, updated)) {
        return false;
      }
      try {
        await writeTagList(record.directoryPath, updated);
      } catch (error) {
        logger.error(`Failed to save tags for "${record.title}"`, { error: errorMessage(error) });
        return false;
      }
      logger.info(`Retagged "${record.title}"`, { before: record.tags, after: updated });
      record.tags = updated;
      return true;
    },
    sequential
  );

  return {
    vocabulary: unionOfTags(records),
    retagged: changed.filter(Boolean).length,
  };
}

/**
 * Build registry entries for the vocabulary and link every article carrying each tag
 */
export async function linkArticlesToTags(
  ctx: RunContext,
  records: readonly ArticleRecord[],
  vocabulary: readonly string[]
): Promise<TagRecord[]> {
  const tags: TagRecord[] = [];
  for (const name of vocabulary) {
    const tag = await ctx.tags.getOrCreate(name);
    if (!tags.includes(tag)) tags.push(tag);
  }

  for (const record of records) {
    for (const tagSlug of record.tags) {
      const tag = ctx.tags.get(slugify(tagSlug));
      if (tag) {
        ctx.tags.link(tag, record.slug);
      }
    }
  }

  return tags;
}

async function loadRelatedSummaries(
  ctx: RunContext,
  tag: TagRecord,
  limit?: number
): Promise<RelatedSummary[]> {
  const summaries: RelatedSummary[] = [];
  for (const slug of tag.relatedArticleSlugs) {
    if (limit !== undefined && summaries.length >= limit) break;
    const content = await loadContent(path.join(ctx.config.docsDir, slug), VAULT_FILES.summary);
    if (!content || content.text.trim().length === 0) {
      logger.warn(`No summary for related article ${slug}`, { tag: tag.slug });
      continue;
    }
    summaries.push({ slug, title: humanizeSlug(slug), text: content.text });
  }
  return summaries;
}

async function persistTagContent(
  ctx: RunContext,
  tag: TagRecord,
  fileName: string,
  text: string
): Promise<Content> {
  const embedding = await ctx.gateway.embed(text);
  await saveContent(ctx.tags.directoryFor(tag.slug), fileName, text, embedding);
  return embedding ? { text, embedding } : { text };
}

/**
 * Wikipedia-style description grounded on up to N related summaries.
 * Skipped when one is cached and tag rebuilds are off.
 */
export async function generateTagDescription(ctx: RunContext, tag: TagRecord): Promise<Content | null> {
  if (tag.description && tag.description.text.trim() && !ctx.config.rebuildTags) {
    return tag.description;
  }

  const related = await loadRelatedSummaries(ctx, tag, ctx.config.descriptionContextArticles);
  const relatedSummaries =
    related.length > 0
      ? related.map((r) => `Article: ${r.title}\nSummary: ${r.text}`).join("\n\n")
      : NO_RELATED_ARTICLES;

  const text = await ctx.gateway.complete({
    messages: [
      userMessage(DESCRIPTION_INSTRUCTION, {
        tagName: tag.name,
        relatedSummaries,
        previousDescription: orNotAvailable(tag.description?.text),
      }),
    ],
    systemPrompt: await ctx.prompts.get("tagDescriptionSystem"),
    model: ctx.config.models.default,
    maxTokens: ctx.config.maxTokens.tagDescription,
  });
  if (!text) {
    logger.error(`Failed to generate description for "${tag.name}"`);
    return null;
  }

  const content = await persistTagContent(ctx, tag, VAULT_FILES.tagDescription, text);
  ctx.tags.setDescription(tag, content);
  logger.info(`Saved description for "${tag.name}"`);
  return content;
}

/**
 * Multi-turn survey: an introduction, one related-work paragraph per article, then a synthesis.
 * Only runs once the tag has enough related articles; always regenerates.
 */
export async function generateTagSurvey(ctx: RunContext, tag: TagRecord): Promise<Content | null> {
  const { config, gateway, prompts } = ctx;
  if (tag.relatedArticleSlugs.size < config.surveyMinArticles) {
    logger.debug(`Not enough related articles for a survey of "${tag.name}"`, {
      related: tag.relatedArticleSlugs.size,
      required: config.surveyMinArticles,
    });
    return null;
  }

  const systemPrompt = await prompts.get("tagSurveySystem");
  const related = await loadRelatedSummaries(ctx, tag);
  const seeds = related.slice(0, config.surveySeedArticles);

  const conversation: ChatMessage[] = [
    labeledBlock("Topic", tag.name),
    labeledBlock("Previous Survey", orNotAvailable(tag.survey?.text)),
    labeledBlock("Tag Description", orNotAvailable(tag.description?.text)),
    labeledBlock(
      "Related Article Summaries",
      seeds.length > 0 ? seeds.map((r) => `Article: ${r.title}\n${r.text}`).join("\n\n") : NO_RELATED_ARTICLES
    ),
    userMessage(SURVEY_INTRODUCTION_INSTRUCTION, { template: await prompts.get("tagSurveyIntroduction") }),
  ];

  const introduction = await gateway.complete({
    messages: conversation,
    systemPrompt,
    model: config.models.default,
    maxTokens: config.maxTokens.tagDescription,
  });
  if (!introduction) {
    logger.error(`Failed to generate survey introduction for "${tag.name}"`);
    return null;
  }
  conversation.push(assistantMessage(introduction));

  const articleTemplate = await prompts.get("tagSurveyArticle");
  for (const article of related) {
    const turn: ChatMessage[] = [
      labeledBlock(`This is the paper summary: ${article.title}`, article.text),
      userMessage(SURVEY_ARTICLE_INSTRUCTION, { template: articleTemplate }),
    ];
    const paragraph = await gateway.complete({
      messages: [...conversation, ...turn],
      systemPrompt,
      model: config.models.default,
      maxTokens: config.maxTokens.tagSurveyArticle,
    });
    if (!paragraph) {
      logger.error(`Failed to write related work for ${article.slug}`, { tag: tag.slug });
      continue;
    }
    conversation.push(...turn, assistantMessage(paragraph));
  }

  const survey = await gateway.complete({
    messages: [...conversation, userMessage(SURVEY_FINAL_INSTRUCTION)],
    systemPrompt,
    model: config.models.default,
    maxTokens: config.maxTokens.tagSurvey,
    temperature: 0.2,
  });
  if (!survey) {
    logger.error(`Failed to generate survey for "${tag.name}"`);
    return null;
  }

  const content = await persistTagContent(ctx, tag, VAULT_FILES.tagSurvey, survey);
  ctx.tags.setSurvey(tag, content);
  logger.info(`Saved survey for "${tag.name}"`, { related: tag.relatedArticleSlugs.size });
  return content;
}

/**
 * Run both passes over the whole batch
 */
export async function aggregateTags(
  ctx: RunContext,
  records: ArticleRecord[]
): Promise<TagAggregationResult> {
  logger.info("Updating all tags", { articles: records.length });
  for (const record of records) {
    if (record.tags.length === 0) {
      logger.warn(`Article "${record.title}" has no tags`);
    }
  }

  const { vocabulary, retagged } = await convergeVocabulary(ctx, records);
  const tags = await linkArticlesToTags(ctx, records, vocabulary);

  const active = tags.filter((tag) => tag.relatedArticleSlugs.size > 0);
  const sequential = ctx.config.maxConcurrent < 0;
  const outcomes = await runEach(
    active,
    async (tag) => {
      logger.info(`Tag "${tag.name}" has ${tag.relatedArticleSlugs.size} related articles`);
      try {
        const description = await generateTagDescription(ctx, tag);
        const survey = await generateTagSurvey(ctx, tag);
        return { description: description !== null, survey: survey !== null };
      } catch (error) {
        logger.error(`Failed to update tag "${tag.name}"`, { error: errorMessage(error) });
        return { description: false, survey: false };
      }
    },
    sequential
  );

  const result: TagAggregationResult = {
    vocabulary,
    tags,
    retaggedArticles: retagged,
    descriptions: outcomes.filter((o) => o.description).length,
    surveys: outcomes.filter((o) => o.survey).length,
  };
  logger.info("Tag update complete", {
    tags: tags.length,
    retagged,
    descriptions: result.descriptions,
    surveys: result.surveys,
  });
  return result;
}

/**
 * Core data models for the paper vault
 */

/**
 * A generated or extracted piece of text and its embedding.
 * The embedding is absent when generating it failed or the vector file is missing.
 */
export interface Content {
  text: string;
  embedding?: number[];
}

export interface ArticleRecord {
  title: string;
  slug: string;
  directoryPath: string;
  extracted: Content;
  summary?: Content;
  shortSummary?: Content;
  tldr?: Content;
  tags: string[];
}

export interface TagRecord {
  name: string;
  slug: string;
  description?: Content;
  survey?: Content;
  relatedArticleSlugs: Set<string>;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type RagCorpus = "articles" | "tags";

/**
 * A discovered paper directory, before any generation runs
 */
export interface DiscoveredArticle {
  title: string;
  slug: string;
  directoryPath: string;
}

export type ArticleOutcome = "complete" | "partial" | "failed";

export interface BatchResult {
  discovered: number;
  completed: number;
  partial: number;
  failed: number;
  tags: number;
  surveys: number;
  durationMs: number;
}

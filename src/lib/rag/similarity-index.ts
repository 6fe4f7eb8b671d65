/**
 * Similarity index for retrieval-augmented prompts
 * Brute-force cosine search over every article summary or tag description on disk.
 * The corpus is small (tens to low hundreds of entries), so nothing is indexed or persisted.
 */

import { promises as fs } from "fs";
import path from "path";
import type { Content, RagCorpus } from "../model";
import type { LlmGateway } from "../llm/gateway";
import { loadContent, isNotFound } from "../storage/content-store";
import { topKSimilar } from "../embeddings";
import { humanizeSlug } from "../utils/slug";
import { createLogger, errorMessage } from "../logger";
import { VAULT_FILES } from "../../config/pipeline";

const logger = createLogger("rag");

export const NO_CONTEXT = "No relevant context found.";
const DELIMITER = "\n---\n";

export interface RagCandidate {
  slug: string;
  text: string;
  embedding?: number[];
}

export interface SimilarityIndexPaths {
  docsDir: string;
  tagsDir: string;
}

/**
 * False for the NO_CONTEXT sentinel (and blank strings); callers omit the RAG block then
 */
export function isUsableContext(context: string): boolean {
  return context.trim().length > 0 && context !== NO_CONTEXT;
}

async function listDirectories(root: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(root, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

export class SimilarityIndex {
  constructor(
    private readonly gateway: LlmGateway,
    private readonly paths: SimilarityIndexPaths
  ) {}

  /**
   * Load the enriched candidates of a corpus: summaries for articles, descriptions for tags
   */
  async loadCorpus(corpus: RagCorpus): Promise<RagCandidate[]> {
    const root = corpus === "articles" ? this.paths.docsDir : this.paths.tagsDir;
    const fileName = corpus === "articles" ? VAULT_FILES.summary : VAULT_FILES.tagDescription;
    const candidates: RagCandidate[] = [];

    for (const slug of await listDirectories(root)) {
      let content: Content | null;
      try {
        content = await loadContent(path.join(root, slug), fileName);
      } catch (error) {
        logger.warn(`Skipping unreadable ${fileName} in ${slug}`, { error: errorMessage(error) });
        continue;
      }
      if (!content || content.text.trim().length === 0) continue;

      const heading =
        corpus === "articles"
          ? `Article Title: ${humanizeSlug(slug)}\nSummary:\n`
          : `Tag: ${humanizeSlug(slug)}\nDescription:\n`;
      candidates.push({ slug, text: `${heading}${content.text}`, embedding: content.embedding });
    }

    return candidates;
  }

  /**
   * Top-K most similar blocks joined into one context string, or NO_CONTEXT.
   * `excludeSlug` keeps an article from retrieving its own summary.
   */
  async relevantContext(
    queryText: string,
    corpus: RagCorpus,
    topK: number,
    excludeSlug?: string
  ): Promise<string> {
    const candidates = (await this.loadCorpus(corpus)).filter((c) => c.slug !== excludeSlug);
    if (candidates.length === 0) {
      logger.debug("Corpus is empty", { corpus });
      return NO_CONTEXT;
    }

    const queryVector = await this.gateway.embed(queryText);
    if (!queryVector) {
      logger.warn("Query embedding failed, skipping retrieval", { corpus });
      return NO_CONTEXT;
    }

    const matches = topKSimilar(
      queryVector,
      candidates.map((candidate) => ({ item: candidate, vector: candidate.embedding })),
      topK
    );
    if (matches.length === 0) {
      return NO_CONTEXT;
    }

    logger.debug("Retrieved context", {
      corpus,
      matches: matches.map((m) => ({ slug: m.item.slug, score: Number(m.score.toFixed(3)) })),
    });

    const blocks = matches.map((m) => m.item.text);
    return `Relevant Information (${corpus}):${DELIMITER}${blocks.join(DELIMITER)}${DELIMITER}`;
  }
}

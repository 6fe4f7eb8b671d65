/**
 * Article discovery
 * Lists `docs/`, keeps directories with an extracted.md and converges each directory name to its slug
 */

import { promises as fs } from "fs";
import path from "path";
import type { DiscoveredArticle } from "../model";
import { VAULT_FILES } from "../../config/pipeline";
import { contentExists, isNotFound } from "../storage/content-store";
import { humanizeSlug, slugify } from "../utils/slug";
import { createLogger, errorMessage } from "../logger";

const logger = createLogger("discovery");

const HEADING_PATTERN = /^#\s+(.+?)\s*#*\s*$/m;

/**
 * Title of an article: its first level-1 heading, else the humanized directory name
 */
export function extractTitle(markdown: string, directoryName: string): string {
  const match = HEADING_PATTERN.exec(markdown);
  const heading = match?.[1]?.trim();
  return heading || humanizeSlug(directoryName);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * Rename a directory to its slug. Keeps the old name when the target is already taken.
 */
async function convergeDirectory(docsDir: string, name: string, slug: string): Promise<string> {
  const current = path.join(docsDir, name);
  if (name === slug) return current;

  const target = path.join(docsDir, slug);
  if (await pathExists(target)) {
    logger.warn(`Cannot rename "${name}" to "${slug}": target already exists`);
    return current;
  }

  await fs.rename(current, target);
  logger.info(`Renamed "${name}" to "${slug}"`);
  return target;
}

/**
 * Find every article directory under `docsDir`, sorted by slug
 */
export async function discoverArticles(docsDir: string): Promise<DiscoveredArticle[]> {
  let entries: string[];
  try {
    const dirents = await fs.readdir(docsDir, { withFileTypes: true });
    entries = dirents.filter((d) => d.isDirectory()).map((d) => d.name);
  } catch (error) {
    if (isNotFound(error)) {
      logger.warn("Docs directory does not exist", { docsDir });
      return [];
    }
    throw error;
  }

  const articles: DiscoveredArticle[] = [];
  for (const name of entries.sort()) {
    const directory = path.join(docsDir, name);
    if (!(await contentExists(directory, VAULT_FILES.extracted))) {
      logger.debug(`Skipping "${name}": no ${VAULT_FILES.extracted}`);
      continue;
    }

    try {
      const markdown = await fs.readFile(path.join(directory, VAULT_FILES.extracted), "utf-8");
      const title = extractTitle(markdown, name);
      const slug = slugify(title);
      const directoryPath = await convergeDirectory(docsDir, name, slug);
      articles.push({ title, slug: path.basename(directoryPath), directoryPath });
    } catch (error) {
      logger.error(`Skipping "${name}"`, { error: errorMessage(error) });
    }
  }

  logger.info(`Discovered ${articles.length} articles`, { docsDir });
  return articles.sort((a, b) => a.slug.localeCompare(b.slug));
}

/**
 * Per-article tag list (`tags.json`): a pretty-printed JSON array of tag slugs
 */

import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { VAULT_FILES } from "../../config/pipeline";
import { createLogger, errorMessage } from "../logger";
import { isNotFound } from "./content-store";

const logger = createLogger("store");

const TagListSchema = z.array(z.string());

/**
 * Read an article's tags. Returns null when the file is missing or not a JSON array of strings.
 */
export async function readTagList(articleDir: string): Promise<string[] | null> {
  const filePath = path.join(articleDir, VAULT_FILES.tags);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn("Ignoring unreadable tags file", { path: filePath, error: errorMessage(error) });
    return null;
  }

  const result = TagListSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn("Ignoring tags file that is not a list of strings", {
      path: filePath,
      issues: result.error.issues.map((issue) => issue.message),
    });
    return null;
  }
  return result.data.filter((tag) => tag.trim().length > 0);
}

export async function writeTagList(articleDir: string, tags: readonly string[]): Promise<void> {
  await fs.mkdir(articleDir, { recursive: true });
  const filePath = path.join(articleDir, VAULT_FILES.tags);
  await fs.writeFile(filePath, `${JSON.stringify(tags, null, 2)}\n`, "utf-8");
  logger.debug("Saved tags", { path: filePath, count: tags.length });
}

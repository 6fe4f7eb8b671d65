/**
 * Content store
 * Persists a (text, embedding) pair per named artifact inside an article or tag directory.
 * `<dir>/<name>.md` holds the text and `<dir>/<name>.vec` the embedding.
 * The two writes are not atomic; a text file without a vector is a valid cache entry.
 */

import { promises as fs } from "fs";
import path from "path";
import type { Content } from "../model";
import { decodeEmbedding, encodeEmbedding } from "../embeddings";
import { createLogger, errorMessage } from "../logger";

const logger = createLogger("store");

export const VECTOR_EXTENSION = ".vec";

/**
 * Path of the embedding file that belongs to a text artifact
 */
export function vectorPathFor(directory: string, name: string): string {
  const parsed = path.parse(name);
  return path.join(directory, parsed.dir, `${parsed.name}${VECTOR_EXTENSION}`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function contentExists(directory: string, name: string): Promise<boolean> {
  return fileExists(path.join(directory, name));
}

/**
 * Write the text and, when present, the embedding. Creates the directory if needed.
 */
export async function saveContent(
  directory: string,
  name: string,
  text: string,
  embedding?: readonly number[] | null
): Promise<void> {
  await fs.mkdir(directory, { recursive: true });
  await fs.writeFile(path.join(directory, name), text, "utf-8");

  // never leave the previous text's vector beside new text
  const vectorPath = vectorPathFor(directory, name);
  if (embedding && embedding.length > 0) {
    await fs.writeFile(vectorPath, encodeEmbedding(embedding));
  } else {
    await fs.rm(vectorPath, { force: true });
  }

  logger.debug("Saved content", {
    path: path.join(directory, name),
    chars: text.length,
    embedding: embedding ? embedding.length : 0,
  });
}

/**
 * Write only the embedding of an existing artifact (cache upgrade)
 */
export async function saveEmbedding(
  directory: string,
  name: string,
  embedding: readonly number[]
): Promise<void> {
  await fs.mkdir(directory, { recursive: true });
  await fs.writeFile(vectorPathFor(directory, name), encodeEmbedding(embedding));
}

/**
 * Load an artifact. Returns null when the text file is absent.
 * A missing or unreadable vector file yields Content without an embedding.
 */
export async function loadContent(directory: string, name: string): Promise<Content | null> {
  const textPath = path.join(directory, name);
  let text: string;
  try {
    text = await fs.readFile(textPath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  const vectorPath = vectorPathFor(directory, name);
  if (!(await fileExists(vectorPath))) {
    return { text };
  }

  try {
    const embedding = decodeEmbedding(await fs.readFile(vectorPath));
    return embedding.length > 0 ? { text, embedding } : { text };
  } catch (error) {
    logger.warn("Could not load embedding, treating it as absent", {
      path: vectorPath,
      error: errorMessage(error),
    });
    return { text };
  }
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

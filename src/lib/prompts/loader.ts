/**
 * Prompt template loader
 * Reads Markdown templates from the prompts directory and expands
 * `<!-- INCLUDE: relative/path.md -->` directives.
 */

import { promises as fs } from "fs";
import path from "path";
import { createLogger } from "../logger";

const logger = createLogger("prompts");

const INCLUDE_PATTERN = /<!--\s*INCLUDE:\s*([^>]+?)\s*-->/;

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PromptTemplateError";
  }
}

export class PromptLoader {
  private readonly cache = new Map<string, string>();

  constructor(private readonly rootDir: string) {}

  /**
   * Load a template relative to the prompts root, with includes expanded.
   * Results are cached per path for the lifetime of the loader.
   */
  async load(relativePath: string): Promise<string> {
    const cached = this.cache.get(relativePath);
    if (cached !== undefined) return cached;

    const expanded = await this.expand(relativePath, []);
    this.cache.set(relativePath, expanded);
    logger.debug(`Loaded prompt ${relativePath}`, { chars: expanded.length });
    return expanded;
  }

  private async read(relativePath: string): Promise<string> {
    const fullPath = path.join(this.rootDir, relativePath);
    try {
      return await fs.readFile(fullPath, "utf-8");
    } catch {
      throw new PromptTemplateError(`Prompt template not found: ${fullPath}`);
    }
  }

  private async expand(relativePath: string, stack: string[]): Promise<string> {
    if (stack.includes(relativePath)) {
      throw new PromptTemplateError(
        `Circular include: ${[...stack, relativePath].join(" -> ")}`
      );
    }

    let text = await this.read(relativePath);
    const nextStack = [...stack, relativePath];

    let match = INCLUDE_PATTERN.exec(text);
    while (match) {
      const included = (await this.expand(match[1].trim(), nextStack)).trim();
      const front = text.slice(0, match.index).trim();
      const back = text.slice(match.index + match[0].length).trim();
      text = [front, included, back].filter((part) => part.length > 0).join("\n");
      match = INCLUDE_PATTERN.exec(text);
    }

    return text;
  }
}

/**
 * Replace `{name}` placeholders; unknown placeholders are left untouched
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : whole
  );
}

/**
 * Placeholder rendered in prompts for an artifact that does not exist yet
 */
export const NOT_AVAILABLE = "N/A";

export function orNotAvailable(text: string | undefined | null): string {
  return text && text.trim().length > 0 ? text : NOT_AVAILABLE;
}

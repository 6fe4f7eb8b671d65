/**
 * Tag registry
 * In-memory map of tag records for one run, lazily backed by `tags/<slug>/` on disk
 */

import path from "path";
import type { Content, TagRecord } from "../model";
import { loadContent } from "../storage/content-store";
import { humanizeSlug, slugify } from "../utils/slug";
import { createLogger } from "../logger";
import { VAULT_FILES } from "../../config/pipeline";

const logger = createLogger("tags");

export class TagRegistry {
  private readonly records = new Map<string, TagRecord>();
  private readonly loading = new Map<string, Promise<TagRecord>>();

  constructor(private readonly tagsDir: string) {}

  directoryFor(slug: string): string {
    return path.join(this.tagsDir, slug);
  }

  get(slug: string): TagRecord | undefined {
    return this.records.get(slug);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Return the record for a tag, reading its description and survey from disk on first access
   */
  async getOrCreate(tagName: string): Promise<TagRecord> {
    const slug = slugify(tagName);
    const existing = this.records.get(slug);
    if (existing) return existing;

    const inFlight = this.loading.get(slug);
    if (inFlight) return inFlight;

    const load = this.loadFromDisk(slug).finally(() => this.loading.delete(slug));
    this.loading.set(slug, load);
    return load;
  }

  private async loadFromDisk(slug: string): Promise<TagRecord> {
    const dir = this.directoryFor(slug);
    const [description, survey] = await Promise.all([
      loadContent(dir, VAULT_FILES.tagDescription),
      loadContent(dir, VAULT_FILES.tagSurvey),
    ]);

    const record: TagRecord = {
      name: humanizeSlug(slug),
      slug,
      description: description ?? undefined,
      survey: survey ?? undefined,
      relatedArticleSlugs: new Set<string>(),
    };

    if (description || survey) {
      logger.debug(`Loaded existing tag "${record.name}" from disk`);
    } else {
      logger.debug(`Creating new tag "${record.name}"`);
    }

    this.records.set(slug, record);
    return record;
  }

  /**
   * Link an article to a tag; linking the same article twice has no effect
   */
  link(record: TagRecord, articleSlug: string): void {
    record.relatedArticleSlugs.add(articleSlug);
  }

  setDescription(record: TagRecord, content: Content): void {
    record.description = content;
  }

  setSurvey(record: TagRecord, content: Content): void {
    record.survey = content;
  }
}

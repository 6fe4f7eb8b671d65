/**
 * Prompt catalog
 * Names every template file the pipeline reads and the fixed instructions wrapped around them
 */

import { PromptLoader, fillTemplate } from "./loader";

export const PROMPT_FILES = {
  articleSummarySystem: "article_summary.md",
  summaryFullTemplate: "article_summary/summary_full.md",
  shortSummarySystem: "short_summary.md",
  tldrSystem: "tldr_summary.md",
  extractTagsSystem: "extract_tags.md",
  pruneTagsSystem: "prune_tags.md",
  updateTagsSystem: "update_tags.md",
  tagDescriptionSystem: "tag_description.md",
  tagSurveySystem: "tag_survey.md",
  tagSurveyIntroduction: "tag_survey/introduction.md",
  tagSurveyArticle: "tag_survey/related_article.md",
} as const;

export type PromptName = keyof typeof PROMPT_FILES;

export const MERGE_INSTRUCTION = `Provided are different parts of the full summary, base on this, merge and get the final result.

You should remove:
1. all the html comments, i.e. \`<!-- xxx -->\`
2. all the squared brackets (blanks), i.e. \`[yyy]\`

**Output Template:**

{template}`;

export const SHORT_SUMMARY_INSTRUCTION =
  "Write a short summary of the article in at most three paragraphs. Focus on the problem, the core idea and the main results. Do not use headings.";

export const SURVEY_INTRODUCTION_INSTRUCTION =
  "Generate the introduction part of the survey. Fill in the blanks (square brackets). Template:\n\n{template}";

export const SURVEY_ARTICLE_INSTRUCTION =
  "Generate the 'Related Work' paragraph of the survey for the article above only. Fill in the blanks (square brackets). Template:\n\n{template}";

export const SURVEY_FINAL_INSTRUCTION =
  "Generate the final survey text based on the introduction and the related work paragraphs above. Merge them into one cohesive survey and remove any remaining template placeholders.";

export const DESCRIPTION_INSTRUCTION = `Generate a concise, Wikipedia-like description for the tag: "{tagName}".
The description should explain what this tag represents, its core concepts, and potentially its significance or common applications.
You can use the following related article summaries for context.

Related Article Summaries:
{relatedSummaries}

Previous Description (if any, for context and iterative improvement):
{previousDescription}

Description for "{tagName}":`;

export const NO_RELATED_ARTICLES = "No specific related articles found yet for context.";

/**
 * Typed access to the template files of one prompts directory
 */
export class PromptCatalog {
  constructor(private readonly loader: PromptLoader) {}

  get(name: PromptName): Promise<string> {
    return this.loader.load(PROMPT_FILES[name]);
  }

  file(relativePath: string): Promise<string> {
    return this.loader.load(relativePath);
  }

  async mergeInstruction(): Promise<string> {
    return fillTemplate(MERGE_INSTRUCTION, { template: await this.get("summaryFullTemplate") });
  }
}

/**
 * Ordered stage descriptors for the multi-pass article summary.
 * Each stage sees the whole conversation so far; the order here is the call order.
 */

export type SummaryStageName =
  | "introduction"
  | "first-pass"
  | "second-pass"
  | "third-pass"
  | "conclusion";

export interface SummaryStage {
  name: SummaryStageName;
  /** `{template}` is replaced with the stage's template file */
  instruction: string;
  templateFile: string;
}

export const SUMMARY_STAGES: readonly SummaryStage[] = [
  {
    name: "introduction",
    instruction:
      "Generate the introduction part of the paper summary. Fill in the blanks (square brackets). Template:\n\n{template}",
    templateFile: "article_summary/summary_introduction.md",
  },
  {
    name: "first-pass",
    instruction:
      "Generate your first pass reading summary of the paper. Fill in the blanks (square brackets). Template:\n\n{template}",
    templateFile: "article_summary/summary_first_pass.md",
  },
  {
    name: "second-pass",
    instruction:
      "Generate your second pass reading summary of the paper. Fill in the blanks (square brackets). Template:\n\n{template}",
    templateFile: "article_summary/summary_second_pass.md",
  },
  {
    name: "third-pass",
    instruction:
      "Generate your third pass reading summary of the paper. Fill in the blanks (square brackets). Template:\n\n{template}",
    templateFile: "article_summary/summary_third_pass.md",
  },
  {
    name: "conclusion",
    instruction:
      "Generate the conclusion part of the paper summary. Fill in the blanks (square brackets). Template:\n\n{template}",
    templateFile: "article_summary/summary_conclusion.md",
  },
];

/**
 * The stage after which RAG context is injected
 */
export const RAG_ANCHOR_STAGE: SummaryStageName = "introduction";

/**
 * Tests for retrieval over article summaries and tag descriptions
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import { NO_CONTEXT, SimilarityIndex, isUsableContext } from "../../../src/lib/rag/similarity-index";
import { saveContent } from "../../../src/lib/storage/content-store";
import { FakeGateway } from "../../helpers/fake-gateway";
import { makeTempDir, removeDir } from "../../helpers/vault";

describe("SimilarityIndex", () => {
  let vault: string;
  let docsDir: string;
  let tagsDir: string;

  beforeEach(async () => {
    vault = await makeTempDir("rag-");
    docsDir = path.join(vault, "docs");
    tagsDir = path.join(vault, "tags");

    await saveContent(path.join(docsDir, "alpha-paper"), "summarized.md", "About alpha", [1, 0, 0]);
    await saveContent(path.join(docsDir, "beta-paper"), "summarized.md", "About beta", [0, 1, 0]);
    await saveContent(path.join(docsDir, "gamma-paper"), "summarized.md", "No vector yet");
    await saveContent(path.join(tagsDir, "graph_models"), "description.md", "Graphs", [0, 0, 1]);
  });

  afterEach(async () => {
    await removeDir(vault);
  });

  it("should return the closest summaries with their headings", async () => {
    const gateway = new FakeGateway(undefined, () => [1, 0.1, 0]);
    const index = new SimilarityIndex(gateway, { docsDir, tagsDir });

    const context = await index.relevantContext("query", "articles", 1);

    expect(context).toBe(
      "Relevant Information (articles):\n---\nArticle Title: Alpha Paper\nSummary:\nAbout alpha\n---\n"
    );
    expect(gateway.embedded).toEqual(["query"]);
  });

  it("should join several matches with the delimiter in score order", async () => {
    const gateway = new FakeGateway(undefined, () => [0.2, 1, 0]);
    const index = new SimilarityIndex(gateway, { docsDir, tagsDir });

    const context = await index.relevantContext("query", "articles", 5);

    expect(context).toBe(
      "Relevant Information (articles):\n---\n" +
        "Article Title: Beta Paper\nSummary:\nAbout beta\n---\n" +
        "Article Title: Alpha Paper\nSummary:\nAbout alpha\n---\n"
    );
  });

  it("should exclude the querying article", async () => {
    const gateway = new FakeGateway(undefined, () => [1, 0, 0]);
    const index = new SimilarityIndex(gateway, { docsDir, tagsDir });

    const context = await index.relevantContext("query", "articles", 1, "alpha-paper");

    expect(context).toContain("Article Title: Beta Paper");
    expect(context).not.toContain("Alpha Paper");
  });

  it("should search tag descriptions", async () => {
    const gateway = new FakeGateway(undefined, () => [0, 0, 1]);
    const index = new SimilarityIndex(gateway, { docsDir, tagsDir });

    expect(await index.relevantContext("query", "tags", 3)).toBe(
      "Relevant Information (tags):\n---\nTag: Graph Models\nDescription:\nGraphs\n---\n"
    );
  });

  it("should not embed the query when the corpus is empty", async () => {
    const gateway = new FakeGateway();
    const index = new SimilarityIndex(gateway, { docsDir: path.join(vault, "missing"), tagsDir });

    expect(await index.relevantContext("query", "articles", 3)).toBe(NO_CONTEXT);
    expect(gateway.embedded).toEqual([]);
  });

  it("should give no context when the query cannot be embedded", async () => {
    const gateway = new FakeGateway(undefined, () => null);
    const index = new SimilarityIndex(gateway, { docsDir, tagsDir });

    expect(await index.relevantContext("query", "articles", 3)).toBe(NO_CONTEXT);
  });

  it("should mark only real context as usable", () => {
    expect(isUsableContext(NO_CONTEXT)).toBe(false);
    expect(isUsableContext("")).toBe(false);
    expect(isUsableContext("Relevant Information (tags):")).toBe(true);
  });
});

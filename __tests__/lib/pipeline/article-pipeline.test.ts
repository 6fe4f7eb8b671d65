/**
 * Tests for the per-article pipeline
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import path from "path";
import {
  articleOutcome,
  extractTags,
  loadExtracted,
  processArticle,
} from "../../../src/lib/pipeline/article-pipeline";
import { createRunContext, type RunContext } from "../../../src/lib/pipeline/run-context";
import { SUMMARY_STAGES } from "../../../src/lib/pipeline/summary-stages";
import { saveContent } from "../../../src/lib/storage/content-store";
import { readTagList, writeTagList } from "../../../src/lib/storage/tag-list";
import type { CompletionRequest } from "../../../src/lib/llm/gateway";
import type { DiscoveredArticle } from "../../../src/lib/model";
import { FakeGateway, lastMessage } from "../../helpers/fake-gateway";
import { addArticle, exists, makeTempDir, readText, removeDir, testConfig, testPrompts } from "../../helpers/vault";

interface SystemPrompts {
  summary: string;
  short: string;
  tldr: string;
  extract: string;
  prune: string;
}

let system: SystemPrompts;
const SYSTEM_KEYS: Array<keyof SystemPrompts> = ["summary", "short", "tldr", "extract", "prune"];

beforeAll(async () => {
  const prompts = testPrompts();
  system = {
    summary: await prompts.get("articleSummarySystem"),
    short: await prompts.get("shortSummarySystem"),
    tldr: await prompts.get("tldrSystem"),
    extract: await prompts.get("extractTagsSystem"),
    prune: await prompts.get("pruneTagsSystem"),
  };
});

function scripted(overrides: Partial<Record<keyof SystemPrompts, (req: CompletionRequest) => string | null>> = {}) {
  return (request: CompletionRequest): string | null => {
    for (const key of SYSTEM_KEYS) {
      if (request.systemPrompt === system[key]) {
        const override = overrides[key];
        if (override) return override(request);
      }
    }
    switch (request.systemPrompt) {
      case system.summary:
        return "Summary text";
      case system.short:
        return "Short summary";
      case system.tldr:
        return " One line. ";
      case system.extract:
        return "Deep Learning, RAG";
      case system.prune:
        return lastMessage(request);
      default:
        return null;
    }
  };
}

describe("article pipeline", () => {
  let vault: string;
  let gateway: FakeGateway;
  let ctx: RunContext;
  let article: DiscoveredArticle;

  function buildContext(env: Record<string, string> = {}, gw: FakeGateway = gateway): RunContext {
    return createRunContext(testConfig(vault, env), { gateway: gw, prompts: testPrompts() });
  }

  beforeEach(async () => {
    vault = await makeTempDir("article-");
    const dir = await addArticle(vault, "test-paper", "# Test Paper\n\nBody of the paper.");
    article = { title: "Test Paper", slug: "test-paper", directoryPath: dir };
    gateway = new FakeGateway(scripted());
    ctx = buildContext();
  });

  afterEach(async () => {
    await removeDir(vault);
  });

  it("should produce every artifact for a fresh article", async () => {
    const record = await processArticle(ctx, article);

    expect(record).not.toBeNull();
    expect(record?.summary?.text).toBe("Summary text");
    expect(record?.shortSummary?.text).toBe("Short summary");
    expect(record?.tldr?.text).toBe("One line.");
    expect(record?.tags).toEqual(["deep-learning", "rag"]);
    expect(articleOutcome(record)).toBe("complete");

    for (const file of ["summarized.md", "summarized.vec", "short_summarized.md", "tldr.md", "extracted.vec"]) {
      expect(await exists(path.join(article.directoryPath, file))).toBe(true);
    }
    expect(await readTagList(article.directoryPath)).toEqual(["deep-learning", "rag"]);
  });

  it("should run one call per summary stage plus the merge", async () => {
    await processArticle(ctx, article);

    const summaryCalls = gateway.callsWithSystemPrompt(system.summary);
    expect(summaryCalls).toHaveLength(SUMMARY_STAGES.length + 1);
    expect(summaryCalls.slice(0, -1).every((call) => call.model === "model-default")).toBe(true);
    expect(summaryCalls[summaryCalls.length - 1].model).toBe("model-fast");
  });

  it("should make no LLM or embedding calls on a warm rerun", async () => {
    await processArticle(ctx, article);
    gateway.reset();

    const record = await processArticle(ctx, article);

    expect(gateway.calls).toEqual([]);
    expect(gateway.embedded).toEqual([]);
    expect(articleOutcome(record)).toBe("complete");
  });

  it("should embed extracted text that has no vector without rewriting it", async () => {
    const before = await readText(path.join(article.directoryPath, "extracted.md"));

    const extracted = await loadExtracted(ctx, article.directoryPath);

    expect(extracted?.embedding).toBeDefined();
    expect(await exists(path.join(article.directoryPath, "extracted.vec"))).toBe(true);
    expect(await readText(path.join(article.directoryPath, "extracted.md"))).toBe(before);
    expect(gateway.embedded).toEqual([before]);
  });

  it("should return null when extracted.md is missing", async () => {
    const missing = { title: "Missing", slug: "missing", directoryPath: path.join(vault, "docs", "missing") };

    expect(await processArticle(ctx, missing)).toBeNull();
    expect(gateway.calls).toEqual([]);
  });

  it("should stop after a failed summary stage without caching", async () => {
    let summaryCalls = 0;
    gateway = new FakeGateway(
      scripted({ summary: () => (++summaryCalls === 3 ? null : "Stage output") })
    );
    ctx = buildContext();

    const record = await processArticle(ctx, article);

    expect(record?.summary).toBeUndefined();
    expect(articleOutcome(record)).toBe("partial");
    expect(await exists(path.join(article.directoryPath, "summarized.md"))).toBe(false);
    expect(summaryCalls).toBe(3);
  });

  it("should keep the summary when the short summary fails", async () => {
    gateway = new FakeGateway(scripted({ short: () => null }));
    ctx = buildContext();

    const record = await processArticle(ctx, article);

    expect(record?.summary?.text).toBe("Summary text");
    expect(record?.shortSummary).toBeUndefined();
    expect(record?.tldr).toBeUndefined();
    expect(record?.tags).toEqual([]);
    expect(gateway.callsWithSystemPrompt(system.tldr)).toEqual([]);
  });

  it("should add retrieved articles to the conversation after the introduction", async () => {
    await saveContent(path.join(vault, "docs", "other-paper"), "summarized.md", "Other findings", [1, 1, 1]);

    await processArticle(ctx, article);

    const summaryCalls = gateway.callsWithSystemPrompt(system.summary);
    const introduction = summaryCalls[0].messages.map((m) => m.content);
    const firstPass = summaryCalls[1].messages.map((m) => m.content);
    expect(introduction.some((c) => c.startsWith("Relevant Information"))).toBe(false);
    expect(
      firstPass.some((c) => c.startsWith("Relevant Information (articles):") && c.includes("Other findings"))
    ).toBe(true);
  });

  it("should not retrieve anything when RAG is disabled", async () => {
    await saveContent(path.join(vault, "docs", "other-paper"), "summarized.md", "Other findings", [1, 1, 1]);
    ctx = buildContext({ ENABLE_RAG: "false" });

    await processArticle(ctx, article);

    const contents = gateway.calls.flatMap((call) => call.messages.map((m) => m.content));
    expect(contents.some((c) => c.includes("Relevant Information"))).toBe(false);
  });

  it("should seed a rebuild with the previous summary", async () => {
    await saveContent(article.directoryPath, "summarized.md", "Old summary");
    ctx = buildContext({ REBUILD: "true" });

    const record = await processArticle(ctx, article);

    const first = gateway.callsWithSystemPrompt(system.summary)[0];
    expect(first.messages[1].content).toBe("<!-- This is the Previous Summary -->\n\nOld summary");
    expect(record?.summary?.text).toBe("Summary text");
  });

  it("should ignore previous content when starting from scratch", async () => {
    await saveContent(article.directoryPath, "summarized.md", "Old summary");
    ctx = buildContext({ REBUILD: "true", FROM_SCRATCH: "true" });

    await processArticle(ctx, article);

    const first = gateway.callsWithSystemPrompt(system.summary)[0];
    expect(first.messages[1].content).toBe("<!-- This is the Previous Summary -->\n\nN/A");
  });

  it("should reuse cached summaries without a rebuild", async () => {
    await saveContent(article.directoryPath, "summarized.md", "Cached summary", [1, 0, 0]);

    const record = await processArticle(ctx, article);

    expect(record?.summary?.text).toBe("Cached summary");
    expect(gateway.callsWithSystemPrompt(system.summary)).toEqual([]);
  });
});

describe("extractTags", () => {
  let vault: string;
  let article: DiscoveredArticle;

  beforeEach(async () => {
    vault = await makeTempDir("tags-");
    const dir = await addArticle(vault, "test-paper", "# Test Paper");
    article = { title: "Test Paper", slug: "test-paper", directoryPath: dir };
  });

  afterEach(async () => {
    await removeDir(vault);
  });

  it("should prune freshly extracted tags", async () => {
    const gateway = new FakeGateway(
      scripted({ extract: () => "Neural Nets, neural networks", prune: () => "neural-networks" })
    );
    const ctx = createRunContext(testConfig(vault), { gateway, prompts: testPrompts() });

    const tags = await extractTags(ctx, article, { text: "Short" });

    expect(tags).toEqual(["neural-networks"]);
    expect(gateway.callsWithSystemPrompt(system.prune)[0].messages[0].content).toBe("neural-nets,neural-networks");
  });

  it("should skip pruning when it is disabled", async () => {
    const gateway = new FakeGateway(scripted());
    const ctx = createRunContext(testConfig(vault, { PRUNE_TAGS: "false" }), { gateway, prompts: testPrompts() });

    expect(await extractTags(ctx, article, { text: "Short" })).toEqual(["deep-learning", "rag"]);
    expect(gateway.callsWithSystemPrompt(system.prune)).toEqual([]);
  });

  it("should pass previous tags to a rebuild", async () => {
    await writeTagList(article.directoryPath, ["old-tag"]);
    const gateway = new FakeGateway(scripted());
    const ctx = createRunContext(testConfig(vault, { REBUILD: "true" }), { gateway, prompts: testPrompts() });

    await extractTags(ctx, article, { text: "Short" });

    const call = gateway.callsWithSystemPrompt(system.extract)[0];
    expect(call.messages[1].content).toBe("<!-- These are the Previous Tags -->\n\nold-tag");
    expect(call.thinking).toBe(false);
  });

  it("should leave tags.json alone when extraction fails", async () => {
    const gateway = new FakeGateway(scripted({ extract: () => null }));
    const ctx = createRunContext(testConfig(vault), { gateway, prompts: testPrompts() });

    expect(await extractTags(ctx, article, { text: "Short" })).toEqual([]);
    expect(await readTagList(article.directoryPath)).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import { buildKnowledgeContext, buildSystemPrompt } from "./context.js";

const item = (id: string, title: string, content: string, isActive = true) => ({
  id,
  tenantId: "t1",
  title,
  content,
  isActive,
});

describe("buildKnowledgeContext", () => {
  it("renders active items under the header", () => {
    const context = buildKnowledgeContext([
      item("k1", "Hours", "Mon-Fri 9-17"),
      item("k2", "Old", "ignored", false),
      item("k3", "Parking", "Free behind the shop"),
    ]);
    expect(context).toBe(
      "Knowledge base:\n\n- Hours: Mon-Fri 9-17\n\n- Parking: Free behind the shop"
    );
  });

  it("is empty without active items", () => {
    expect(buildKnowledgeContext([item("k1", "Old", "x", false)])).toBe("");
  });
});

describe("buildSystemPrompt", () => {
  it("falls back to the default prompt", () => {
    expect(buildSystemPrompt(null)).toBe("You are a helpful assistant.");
    expect(buildSystemPrompt({ systemPrompt: "   " })).toBe("You are a helpful assistant.");
  });

  it("appends the knowledge block after a blank line", () => {
    expect(buildSystemPrompt({ systemPrompt: "Be brief." }, "Knowledge base:\n\n- A: B")).toBe(
      "Be brief.\n\nKnowledge base:\n\n- A: B"
    );
  });
});

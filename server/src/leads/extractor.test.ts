import { describe, expect, it } from "vitest";
import type { CompletionClient } from "../ai/completion.js";
import { InMemoryChatStore } from "../store/memory.js";
import { createFakeAdapter } from "../../test/helpers/fakeHttp.js";
import {
  buildLeadSummary,
  createLeadExtractor,
  extractLeadInfo,
  parseLlmExtraction,
} from "./extractor.js";
import { createLeadNotifier } from "./notifier.js";

const offlineCompletion: CompletionClient = {
  complete: async () => "unused",
  completeJson: async () => null,
  isConfigured: () => false,
};

const jsonCompletion = (content: string): CompletionClient => ({
  complete: async () => "unused",
  completeJson: async () => content,
  isConfigured: () => true,
});

describe("extractLeadInfo", () => {
  it("finds name and phone number", () => {
    expect(extractLeadInfo("Hi, I am John Smith, call me at 555-123-4567")).toEqual({
      customerName: "John Smith",
      phoneNumber: "555-123-4567",
    });
  });

  it("title-cases and collapses whitespace in names", () => {
    expect(extractLeadInfo("my name is   mary   o'neil 555 123 4567")?.customerName).toBe(
      "Mary O'Neil"
    );
  });

  it("returns null without a phone-number-shaped value", () => {
    expect(extractLeadInfo("Hello, my name is Anna")).toBeNull();
  });
});

describe("parseLlmExtraction", () => {
  it("reads fenced JSON", () => {
    expect(
      parseLlmExtraction('```json\n{"customer_name":"Ann Lee","phone_number":"+32 470 11 22 33"}\n```')
    ).toEqual({ customerName: "Ann Lee", phoneNumber: "+32 470 11 22 33" });
  });

  it("rejects missing or implausible phone numbers", () => {
    expect(parseLlmExtraction('{"customer_name":"Ann","phone_number":""}')).toBeNull();
    expect(parseLlmExtraction('{"customer_name":"Ann","phone_number":"12"}')).toBeNull();
    expect(parseLlmExtraction("not json")).toBeNull();
  });
});

describe("buildLeadSummary", () => {
  it("lists name, phone and email", () => {
    expect(
      buildLeadSummary({ customerName: "Ann", phoneNumber: "555-123-4567", email: "ann@example.com" })
    ).toBe("Captured lead: name=Ann, phone=555-123-4567, email=ann@example.com");
  });
});

describe("detectAndSaveLead", () => {
  it("stores the lead and posts the tenant webhook", async () => {
    const store = new InMemoryChatStore({
      tenants: [{ id: "t1", name: "Shop", webhookUrl: "https://hooks.test/lead" }],
    });
    const fake = createFakeAdapter(() => ({ status: 200 }));
    const extractor = createLeadExtractor({
      store,
      completion: offlineCompletion,
      notifier: createLeadNotifier({ timeoutMs: 5_000, adapter: fake.adapter }),
    });

    const message = "Hi, I am John Smith, call me at 555-123-4567";
    const leadId = await extractor.detectAndSaveLead({ tenantId: "t1", userMessage: message });

    const stored = await store.getLead("t1", "555-123-4567");
    expect(stored?.id).toBe(leadId);
    expect(stored?.customerName).toBe("John Smith");
    expect(fake.requests).toHaveLength(1);
    expect(fake.requests[0]?.url).toBe("https://hooks.test/lead");
    expect(fake.requests[0]?.timeout).toBe(5_000);
    expect(fake.requests[0]?.body).toEqual({
      lead_id: leadId,
      tenant_id: "t1",
      customer_name: "John Smith",
      phone_number: "555-123-4567",
      summary: "Captured lead: name=John Smith, phone=555-123-4567",
      source_message: message,
    });
  });

  it("records nothing without a phone number, sender id or LLM key", async () => {
    const store = new InMemoryChatStore({ tenants: [{ id: "t1", name: "Shop" }] });
    const extractor = createLeadExtractor({
      store,
      completion: offlineCompletion,
      notifier: createLeadNotifier({ timeoutMs: 5_000 }),
    });

    expect(await extractor.detectAndSaveLead({ tenantId: "t1", userMessage: "just browsing" })).toBeNull();
    expect(store.leads.size).toBe(0);
  });

  it("uses the channel sender id as identity when the text has no phone", async () => {
    const store = new InMemoryChatStore({ tenants: [{ id: "t1", name: "Shop" }] });
    const extractor = createLeadExtractor({
      store,
      completion: offlineCompletion,
      notifier: createLeadNotifier({ timeoutMs: 5_000 }),
    });

    await extractor.detectAndSaveLead({
      tenantId: "t1",
      userMessage: "this is Bob",
      senderId: "tg-42",
    });
    const stored = await store.getLead("t1", "tg-42");
    expect(stored?.customerName).toBeNull();
    expect(stored?.summary).toBe("Captured lead: phone=tg-42");
  });

  it("falls back to the LLM extraction", async () => {
    const store = new InMemoryChatStore({ tenants: [{ id: "t1", name: "Shop" }] });
    const extractor = createLeadExtractor({
      store,
      completion: jsonCompletion('{"customer_name":"Ann Lee","phone_number":"+15551234567"}'),
      notifier: createLeadNotifier({ timeoutMs: 5_000 }),
    });

    await extractor.detectAndSaveLead({ tenantId: "t1", userMessage: "reach me on my cell" });
    expect((await store.getLead("t1", "+15551234567"))?.customerName).toBe("Ann Lee");
  });

  it("backfills a missing name but keeps an existing one", async () => {
    const store = new InMemoryChatStore({ tenants: [{ id: "t1", name: "Shop" }] });
    await store.createLead("t1", "555-123-4567");
    const extractor = createLeadExtractor({
      store,
      completion: offlineCompletion,
      notifier: createLeadNotifier({ timeoutMs: 5_000 }),
    });

    await extractor.detectAndSaveLead({ tenantId: "t1", userMessage: "I am Kim, 555-123-4567" });
    await extractor.detectAndSaveLead({ tenantId: "t1", userMessage: "I am Lou, 555-123-4567" });
    expect((await store.getLead("t1", "555-123-4567"))?.customerName).toBe("Kim");
  });

  it("swallows webhook failures", async () => {
    const store = new InMemoryChatStore({
      tenants: [{ id: "t1", name: "Shop", webhookUrl: "https://hooks.test/down" }],
    });
    const extractor = createLeadExtractor({
      store,
      completion: offlineCompletion,
      notifier: createLeadNotifier({
        timeoutMs: 5_000,
        adapter: createFakeAdapter(() => ({ timeout: true })).adapter,
      }),
    });

    const leadId = await extractor.detectAndSaveLead({
      tenantId: "t1",
      userMessage: "call 555-123-4567",
    });
    expect(leadId).not.toBeNull();
  });
});

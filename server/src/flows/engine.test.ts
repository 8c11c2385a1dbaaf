import { describe, expect, it } from "vitest";
import { InMemoryChatStore } from "../store/memory.js";
import type { Lead } from "../shared/types.js";
import type { FlowRecord } from "./types.js";
import {
  END_OF_FLOW,
  createFlowEngine,
  hasActiveFlow,
  indexFlowNodes,
  renderTemplate,
} from "./engine.js";

const baseLead = (overrides: Partial<Lead> = {}): Lead => ({
  id: "lead-1",
  tenantId: "t1",
  phoneNumber: "+100",
  customerName: null,
  summary: null,
  currentFlowId: null,
  currentStepId: null,
  flowContext: {},
  ...overrides,
});

const signupFlow = (overrides: Partial<FlowRecord> = {}): FlowRecord => ({
  id: "f1",
  tenantId: "t1",
  name: "Signup",
  triggerKeyword: "signup",
  isActive: true,
  definition: {
    nodes: [
      { id: "start", type: "message", content: "Welcome!", next: "ask" },
      { id: "ask", type: "question", content: "What is your name?", variable: "name", next: "bye" },
      { id: "bye", type: "message", content: "Hi {name}", next: null },
    ],
  },
  ...overrides,
});

describe("renderTemplate", () => {
  it("substitutes known variables", () => {
    expect(renderTemplate("Hi {name}, from {city}", { name: "Sam", city: "Ghent" })).toBe(
      "Hi Sam, from Ghent"
    );
  });

  it("returns the raw template when a variable is missing", () => {
    expect(renderTemplate("Hi {name}, from {city}", { name: "Sam" })).toBe(
      "Hi {name}, from {city}"
    );
  });
});

describe("indexFlowNodes", () => {
  it("prefers the node with id 'start'", () => {
    const flow = signupFlow({
      definition: {
        nodes: [
          { id: "a", type: "message", content: "A", next: null },
          { id: "start", type: "message", content: "S", next: null },
        ],
      },
    });
    const start = indexFlowNodes(flow).startNode();
    expect(start !== END_OF_FLOW && start.id).toBe("start");
  });

  it("maps null and unknown ids to END_OF_FLOW", () => {
    const index = indexFlowNodes(signupFlow());
    expect(index.lookup(null)).toBe(END_OF_FLOW);
    expect(index.lookup("missing")).toBe(END_OF_FLOW);
  });
});

describe("flow engine", () => {
  it("starts a flow and stops at the first question", async () => {
    const store = new InMemoryChatStore({ flows: [signupFlow()] });
    const engine = createFlowEngine({ store });
    const lead = baseLead();

    const reply = await engine.startFlow(lead, signupFlow());

    expect(reply).toBe("Welcome!\n\nWhat is your name?");
    expect(lead.currentFlowId).toBe("f1");
    expect(lead.currentStepId).toBe("ask");
    const stored = await store.getLead("t1", "+100");
    expect(stored?.currentStepId).toBe("ask");
  });

  it("stores the answer, renders it and clears state at the end", async () => {
    const store = new InMemoryChatStore({ flows: [signupFlow()] });
    const engine = createFlowEngine({ store });
    const lead = baseLead();

    await engine.startFlow(lead, signupFlow());
    const reply = await engine.processFlow(lead, "Sam");

    expect(reply).toBe("Hi Sam");
    expect(lead.currentFlowId).toBeNull();
    expect(lead.currentStepId).toBeNull();
    expect(lead.flowContext).toEqual({});
    expect(hasActiveFlow(lead)).toBe(false);
  });

  it("treats a dangling next pointer as the end of the flow", async () => {
    const flow = signupFlow({
      definition: {
        nodes: [{ id: "start", type: "message", content: "Only step", next: "ghost" }],
      },
    });
    const store = new InMemoryChatStore({ flows: [flow] });
    const engine = createFlowEngine({ store });
    const lead = baseLead();

    expect(await engine.startFlow(lead, flow)).toBe("Only step");
    expect(lead.currentFlowId).toBeNull();
  });

  it("returns nothing for an empty flow", async () => {
    const flow = signupFlow({ definition: { nodes: [] } });
    const store = new InMemoryChatStore({ flows: [flow] });
    const engine = createFlowEngine({ store });
    const lead = baseLead();

    expect(await engine.startFlow(lead, flow)).toBeNull();
    expect(lead.currentFlowId).toBeNull();
    expect(lead.currentStepId).toBeNull();
  });

  it("clears state when the active flow was deactivated", async () => {
    const store = new InMemoryChatStore({ flows: [signupFlow({ isActive: false })] });
    const engine = createFlowEngine({ store });
    const lead = baseLead({ currentFlowId: "f1", currentStepId: "ask", flowContext: { a: "b" } });

    expect(await engine.processFlow(lead, "Sam")).toBeNull();
    expect(lead.currentFlowId).toBeNull();
    expect(lead.flowContext).toEqual({});
  });

  it("clears state when the current node was removed", async () => {
    const store = new InMemoryChatStore({ flows: [signupFlow()] });
    const engine = createFlowEngine({ store });
    const lead = baseLead({ currentFlowId: "f1", currentStepId: "removed" });

    expect(await engine.processFlow(lead, "Sam")).toBeNull();
    expect(lead.currentStepId).toBeNull();
  });

  it("ends a loop of message nodes instead of spinning", async () => {
    const flow = signupFlow({
      definition: {
        nodes: [
          { id: "a", type: "message", content: "A", next: "b" },
          { id: "b", type: "message", content: "B", next: "a" },
        ],
      },
    });
    const store = new InMemoryChatStore({ flows: [flow] });
    const engine = createFlowEngine({ store });

    expect(await engine.startFlow(baseLead(), flow)).toBe("A\n\nB");
  });

  it("keeps a name captured while the flow step was running", async () => {
    const store = new InMemoryChatStore({ flows: [signupFlow()] });
    const engine = createFlowEngine({ store });
    const lead = await store.createLead("t1", "+100");

    await store.upsertLeadContact({ tenantId: "t1", phoneNumber: "+100", customerName: "Sam", summary: null });
    await engine.startFlow(lead, signupFlow());

    const stored = await store.getLead("t1", "+100");
    expect(stored?.customerName).toBe("Sam");
    expect(stored?.currentStepId).toBe("ask");
  });

  it("does nothing for a lead without an active flow", async () => {
    const store = new InMemoryChatStore();
    const engine = createFlowEngine({ store });
    expect(await engine.processFlow(baseLead(), "hello")).toBeNull();
  });
});

import type { ChatStore } from "../store/types.js";
import { compileRules, type CompiledRule } from "./matcher.js";

type CacheEntry = { rules: CompiledRule[]; loadedAt: number };

export type RuleCache = {
  get: (tenantId: string) => Promise<CompiledRule[]>;
  invalidate: (tenantId?: string) => void;
};

/**
 * Per-tenant cache of compiled rules. A TTL of 0 compiles on every call.
 */
export const createRuleCache = (deps: {
  store: ChatStore;
  ttlMs: number;
  now?: () => number;
}): RuleCache => {
  const entries = new Map<string, CacheEntry>();
  const now = deps.now ?? Date.now;

  const get = async (tenantId: string) => {
    const cached = entries.get(tenantId);
    if (cached && deps.ttlMs > 0 && now() - cached.loadedAt < deps.ttlMs) {
      return cached.rules;
    }
    const rules = compileRules(await deps.store.listActiveRules(tenantId));
    entries.set(tenantId, { rules, loadedAt: now() });
    return rules;
  };

  const invalidate = (tenantId?: string) => {
    if (tenantId === undefined) {
      entries.clear();
      return;
    }
    entries.delete(tenantId);
  };

  return { get, invalidate };
};

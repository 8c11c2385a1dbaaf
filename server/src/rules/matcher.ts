import type { ScriptedResponse } from "../shared/types.js";

export const REGEX_TRIGGER_PREFIX = "re:";

export type CompiledRule =
  | { kind: "literal"; rule: ScriptedResponse; needle: string }
  | { kind: "regex"; rule: ScriptedResponse; pattern: RegExp };

const compileRule = (rule: ScriptedResponse): CompiledRule | null => {
  const trigger = (rule.triggerKeyword ?? "").trim();
  if (!trigger) return null;

  if (trigger.toLowerCase().startsWith(REGEX_TRIGGER_PREFIX)) {
    const source = trigger.slice(REGEX_TRIGGER_PREFIX.length).trim();
    if (!source) return null;
    try {
      return { kind: "regex", rule, pattern: new RegExp(source, "i") };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Skipping rule ${rule.id}: invalid pattern /${source}/ (${message})`);
      return null;
    }
  }

  return { kind: "literal", rule, needle: trigger.toLowerCase() };
};

/** Compiles active rules once, keeping their listing order. */
export const compileRules = (rules: ScriptedResponse[]): CompiledRule[] =>
  rules
    .filter((rule) => rule.isActive)
    .map(compileRule)
    .filter((rule): rule is CompiledRule => rule !== null);

export const ruleMatches = (compiled: CompiledRule, message: string) =>
  compiled.kind === "regex"
    ? compiled.pattern.test(message)
    : message.toLowerCase().includes(compiled.needle);

/** First matching rule in listing order, or null. */
export const matchRule = (compiled: CompiledRule[], message: string): ScriptedResponse | null => {
  for (const candidate of compiled) {
    if (ruleMatches(candidate, message)) return candidate.rule;
  }
  return null;
};

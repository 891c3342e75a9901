import type { RewriteRule } from "./types.js";

export type RewriteResult = {
  content: string;
  matched: number;
  unmatched: string[];
};

function withFlag(flags: string, flag: string): string {
  return flags.includes(flag) ? flags : `${flags}${flag}`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function patternOf(pattern: string, regex: boolean | undefined, flags: string): RegExp {
  return new RegExp(regex ? pattern : escapeRegExp(pattern), flags);
}

export function describeRule(rule: RewriteRule): string {
  switch (rule.kind) {
    case "replace":
      return `replace ${rule.find}`;
    case "insert_after":
      return `insert after ${rule.anchor}`;
    case "insert_before":
      return `insert before ${rule.anchor}`;
    case "first_of":
      return `first of [${rule.rules.map(describeRule).join("; ")}]`;
  }
}

/** Applies one rule. `matched` is false when the pattern was not found. */
export function applyRule(content: string, rule: RewriteRule): { content: string; matched: boolean } {
  switch (rule.kind) {
    case "replace": {
      const re = patternOf(rule.find, rule.regex, withFlag(rule.flags ?? "m", "g"));
      if (!re.test(content)) return { content, matched: false };
      re.lastIndex = 0;
      const next = rule.regex ? content.replace(re, rule.replace) : content.replace(re, () => rule.replace);
      return { content: next, matched: true };
    }
    case "insert_after":
    case "insert_before": {
      const m = patternOf(rule.anchor, rule.regex, "m").exec(content);
      if (!m) return { content, matched: false };
      const at = rule.kind === "insert_after" ? m.index + m[0].length : m.index;
      return { content: content.slice(0, at) + rule.text + content.slice(at), matched: true };
    }
    case "first_of": {
      for (const sub of rule.rules) {
        const r = applyRule(content, sub);
        if (r.matched) return r;
      }
      return { content, matched: false };
    }
  }
}

export function applyRules(content: string, rules: RewriteRule[]): RewriteResult {
  let current = content;
  let matched = 0;
  const unmatched: string[] = [];
  for (const rule of rules) {
    const r = applyRule(current, rule);
    current = r.content;
    if (r.matched) matched += 1;
    else unmatched.push(describeRule(rule));
  }
  return { content: current, matched, unmatched };
}

export function ensureMarker(content: string, marker: string): string {
  if (content.includes(marker)) return content;
  const sep = content === "" || content.endsWith("\n") ? "" : "\n";
  return `${content}${sep}${marker}\n`;
}

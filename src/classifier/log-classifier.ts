import type { SignatureCatalog, SignatureRule } from "./catalog.js";

export interface SignatureMatch {
  name: string;
  /** Every rule of the signature that fired, in declaration order. */
  rules: SignatureRule[];
}

function ruleMatches(rule: SignatureRule, logText: string): boolean {
  switch (rule.kind) {
    case "regex":
      return rule.pattern.test(logText);
    case "literal":
      return logText.includes(rule.text);
  }
}

/**
 * Return the names of every catalog signature that fires on the log text.
 *
 * Callers only pass logs of builds that did not succeed; the function itself
 * never looks at build status. An empty set means "unclassified".
 */
export function classifyLog(logText: string, catalog: SignatureCatalog): Set<string> {
  const matched = new Set<string>();
  for (const signature of catalog.signatures) {
    if (signature.rules.some(rule => ruleMatches(rule, logText))) {
      matched.add(signature.name);
    }
  }
  return matched;
}

/**
 * Like classifyLog, but keeps every firing rule so a signature that trips on
 * several rules can be diagnosed.
 */
export function explainLog(logText: string, catalog: SignatureCatalog): SignatureMatch[] {
  const matches: SignatureMatch[] = [];
  for (const signature of catalog.signatures) {
    const rules = signature.rules.filter(rule => ruleMatches(rule, logText));
    if (rules.length) {
      matches.push({ name: signature.name, rules });
    }
  }
  return matches;
}

/**
 * Rule-based entity extraction and query classification.
 *
 * Everything the classifier knows comes from the rule table: category terms
 * and patterns, which backend owns a category, roles (aggregation, join,
 * realtime, ...) and formula triggers. There is no learned state, so the same
 * text under the same table always classifies the same way.
 */

import type { CategoryRule, RuleTable } from '../rules/schema.js';
import type {
  Classification,
  Complexity,
  EntityMap,
  QueryAnalysis,
} from '../types/models.js';

interface CompiledCategory {
  rule: CategoryRule;
  index: number;
  terms: Array<{ term: string; regex: RegExp }>;
  patterns: RegExp[];
}

interface CompiledFormula {
  id: string;
  triggers: RegExp[];
}

interface CompiledRuleTable {
  table: RuleTable;
  categories: CompiledCategory[];
  formulas: CompiledFormula[];
}

/**
 * Case-insensitive whole-word matcher for a vocabulary term. Tolerates a
 * plural `s`/`es` and any whitespace between the words of a phrase.
 */
export function termMatcher(term: string): RegExp {
  const body = term
    .trim()
    .split(/\s+/)
    .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?:s|es)?(?![\\p{L}\\p{N}])`, 'iu');
}

function compile(table: RuleTable): CompiledRuleTable {
  return {
    table,
    categories: table.categories.map((rule, index) => ({
      rule,
      index,
      terms: rule.terms.map((term) => ({ term: term.toLowerCase(), regex: termMatcher(term) })),
      patterns: rule.patterns.map((p) => new RegExp(p.source, `${p.flags}g`)),
    })),
    formulas: table.formulas.map((f) => ({
      id: f.id,
      triggers: f.triggers.map(termMatcher),
    })),
  };
}

export class EntityClassifier {
  private compiled: CompiledRuleTable;

  constructor(table: RuleTable) {
    this.compiled = compile(table);
  }

  get ruleTable(): RuleTable {
    return this.compiled.table;
  }

  /** Swap in a new rule table. In-flight calls finish on the table they started with. */
  setRuleTable(table: RuleTable): void {
    this.compiled = compile(table);
  }

  analyze(text: string): QueryAnalysis {
    const compiled = this.compiled;
    const entities: EntityMap = {};
    const matched: CompiledCategory[] = [];

    for (const category of compiled.categories) {
      const found = matchCategory(category, text);
      if (found.length > 0) {
        entities[category.rule.name] = found;
        matched.push(category);
      }
    }

    return {
      entities,
      classification: classify(compiled, matched, entities, text),
    };
  }
}

function matchCategory(category: CompiledCategory, text: string): string[] {
  const found: string[] = [];
  const add = (value: string) => {
    if (!found.includes(value)) found.push(value);
  };

  for (const { term, regex } of category.terms) {
    if (regex.test(text)) add(term);
  }
  for (const pattern of category.patterns) {
    for (const match of text.matchAll(pattern)) {
      add(category.rule.uppercase ? match[0].toUpperCase() : match[0]);
    }
  }
  return found;
}

function classify(
  compiled: CompiledRuleTable,
  matched: CompiledCategory[],
  entities: EntityMap,
  text: string
): Classification {
  const hasRole = (role: CategoryRule['role']) => matched.some((c) => c.rule.role === role);

  const aggregationTerms = matched
    .filter((c) => c.rule.role === 'aggregation')
    .reduce((n, c) => n + (entities[c.rule.name]?.length ?? 0), 0);

  const formulaHints = compiled.formulas
    .filter((f) => f.triggers.some((t) => t.test(text)))
    .map((f) => f.id);

  const isAnalytical = hasRole('analytical') || aggregationTerms > 0;

  const owners = matched.filter((c) => c.rule.backend !== undefined);
  const targetBackends: string[] = [];
  for (const c of owners) {
    if (c.rule.backend !== undefined && !targetBackends.includes(c.rule.backend)) {
      targetBackends.push(c.rule.backend);
    }
  }

  const requiresFusion = targetBackends.length > 1;
  let type: string;
  let ambiguous = false;

  if (requiresFusion) {
    type = 'hybrid';
  } else if (owners.length > 0) {
    const decider = [...owners].sort(
      (a, b) => a.rule.priority - b.rule.priority || a.index - b.index
    )[0];
    type = decider?.rule.queryType ?? 'general';
  } else if (matched.length > 0) {
    type = isAnalytical ? 'analytical' : 'general';
    ambiguous = true;
    targetBackends.push(compiled.table.defaultBackend);
  } else {
    type = 'unknown';
  }

  let complexity: Complexity = 'simple';
  if (aggregationTerms >= 2 || hasRole('join') || requiresFusion) {
    complexity = 'complex';
  } else if (aggregationTerms === 1) {
    complexity = 'moderate';
  }

  return {
    type,
    complexity,
    targetBackends,
    requiresFusion,
    isAnalytical,
    isRealTime: hasRole('realtime'),
    formulaHints,
    requiresFormulaHint: formulaHints.length > 0,
    ambiguous,
  };
}

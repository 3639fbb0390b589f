/**
 * Assembles the general-backend prompt.
 * Sections: backend routing guidance, schema, detected entities,
 * classification, domain hints, similar solved questions, the question.
 */

import type { RuleTable } from '../rules/schema.js';
import type { QueryAnalysis, ScoredPattern } from '../types/models.js';
import { formatSchemaContext, type SchemaContext } from '../providers/ISchemaContextProvider.js';

export interface PromptInput {
  question: string;
  analysis: QueryAnalysis;
  /** Nearest cached entries, best first. */
  candidates: ScoredPattern[];
  schema: SchemaContext | null;
  rules: RuleTable;
}

export class PromptBuilder {
  constructor(private readonly exampleCount: number) {}

  build(input: PromptInput): string {
    const { question, analysis, candidates, schema, rules } = input;
    const { classification, entities } = analysis;
    const sections: string[] = [];

    const targets = classification.targetBackends.length > 0
      ? classification.targetBackends
      : [rules.defaultBackend];
    sections.push(
      `Translate the question into a single read-only query for: ${targets.join(', ')}.`
    );

    const backendLines: string[] = [];
    for (const [name, backend] of Object.entries(rules.backends)) {
      backendLines.push(`- ${name}: ${backend.description}`);
      for (const line of backend.guidance) backendLines.push(`  - ${line}`);
    }
    sections.push(`## Backends\n${backendLines.join('\n')}`);

    sections.push(`## Schema\n${schema ? formatSchemaContext(schema) : '(schema unavailable)'}`);

    const entityLines = Object.entries(entities).map(
      ([category, terms]) => `- ${category}: ${terms.join(', ')}`
    );
    if (entityLines.length > 0) {
      sections.push(`## Detected entities\n${entityLines.join('\n')}`);
    }

    sections.push(
      [
        '## Classification',
        `Type: ${classification.type}`,
        `Complexity: ${classification.complexity}`,
        `Fusion required: ${classification.requiresFusion ? 'yes' : 'no'}`,
      ].join('\n')
    );

    const hints = this.collectHints(input);
    if (hints.length > 0) {
      sections.push(`## Domain hints\n${hints.map((h) => `- ${h}`).join('\n')}`);
    }

    const examples = candidates.slice(0, this.exampleCount);
    if (examples.length > 0) {
      const blocks = examples.map(
        (c) => `Q: ${c.entry.question}\nA: ${c.entry.artifact}`
      );
      sections.push(`## Similar solved questions\n${blocks.join('\n\n')}`);
    }

    sections.push(`## Question\n${question.trim()}`);
    sections.push('Return only the query, without explanation or code fences.');

    return sections.join('\n\n');
  }

  private collectHints(input: PromptInput): string[] {
    const { analysis, rules } = input;
    const hints: string[] = [];
    const add = (hint: string) => {
      if (!hints.includes(hint)) hints.push(hint);
    };

    for (const category of rules.categories) {
      if (category.name in analysis.entities) {
        category.hints.forEach(add);
      }
    }
    for (const formula of rules.formulas) {
      if (analysis.classification.formulaHints.includes(formula.id)) {
        add(formula.hint);
      }
    }
    return hints;
  }
}

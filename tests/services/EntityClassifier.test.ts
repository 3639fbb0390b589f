import { describe, it, expect, beforeEach } from 'vitest';
import { EntityClassifier, termMatcher } from '../../src/services/EntityClassifier.js';
import { parseRuleTable } from '../../src/rules/RuleTableSource.js';
import { loadDefaultRules } from '../mocks/testContainer.js';

describe('EntityClassifier', () => {
  let classifier: EntityClassifier;

  beforeEach(() => {
    classifier = new EntityClassifier(loadDefaultRules());
  });

  // ── Scenarios ──

  it('should route personnel questions to the document store', () => {
    const { entities, classification } = classifier.analyze('List all staff');

    expect(entities).toEqual({ personnel: ['staff'] });
    expect(entities.infrastructure).toBeUndefined();
    expect(classification).toEqual({
      type: 'personnel',
      complexity: 'simple',
      targetBackends: ['document_store'],
      requiresFusion: false,
      isAnalytical: false,
      isRealTime: false,
      formulaHints: [],
      requiresFormulaHint: false,
      ambiguous: false,
    });
  });

  it('should extract infrastructure terms and upper-cased project codes', () => {
    const { entities, classification } = classifier.analyze('Show drops in LAW-001');

    expect(entities).toEqual({ infrastructure: ['drop'], project_codes: ['LAW-001'] });
    expect(classification.type).toBe('infrastructure');
    expect(classification.targetBackends).toEqual(['relational']);
  });

  it('should require a formula hint for PON utilization', () => {
    const { entities, classification } = classifier.analyze('Calculate PON utilization');

    expect(entities).toEqual({ equipment: ['pon'] });
    expect(classification.formulaHints).toEqual(['pon_utilization']);
    expect(classification.requiresFormulaHint).toBe(true);
  });

  // ── Type ──

  it('should mark questions spanning two backends as hybrid', () => {
    const { classification } = classifier.analyze('Which technician installed drops in Lawley');

    expect(classification.type).toBe('hybrid');
    expect(classification.requiresFusion).toBe(true);
    expect(classification.complexity).toBe('complex');
    expect(classification.targetBackends).toEqual(['document_store', 'relational']);
  });

  it('should flag unowned analytical vocabulary as ambiguous', () => {
    const { entities, classification } = classifier.analyze('How many are active');

    expect(entities).toEqual({ aggregations: ['how many'], status_values: ['active'] });
    expect(classification.type).toBe('analytical');
    expect(classification.ambiguous).toBe(true);
    expect(classification.complexity).toBe('moderate');
    expect(classification.targetBackends).toEqual(['relational']);
  });

  it('should fall back to general for unowned non-analytical matches', () => {
    const { classification } = classifier.analyze('Show everything that is pending');

    expect(classification.type).toBe('general');
    expect(classification.ambiguous).toBe(true);
  });

  it('should classify unmatched text as unknown with no targets', () => {
    const { entities, classification } = classifier.analyze('Hello there');

    expect(entities).toEqual({});
    expect(classification.type).toBe('unknown');
    expect(classification.targetBackends).toEqual([]);
    expect(classification.ambiguous).toBe(false);
  });

  // ── Complexity and flags ──

  it('should treat two aggregation terms as complex', () => {
    const { entities, classification } = classifier.analyze('Count drops and average splice loss');

    expect(entities.aggregations).toEqual(['count', 'average']);
    expect(entities.measurements).toEqual(['splice loss']);
    expect(classification.complexity).toBe('complex');
    expect(classification.isAnalytical).toBe(true);
  });

  it('should detect temporal and real-time vocabulary', () => {
    const temporal = classifier.analyze('Drops installed last month');
    expect(temporal.entities.temporal).toEqual(['last month']);

    const live = classifier.analyze('Current staff on site');
    expect(live.classification.isRealTime).toBe(true);
  });

  // ── Matching rules ──

  it('should match case-insensitively and report declared terms', () => {
    expect(classifier.analyze('LIST ALL STAFF').entities).toEqual({ personnel: ['staff'] });
  });

  it('should match multi-word terms across any whitespace', () => {
    expect(classifier.analyze('how   many\ndrops').entities.aggregations).toEqual(['how many']);
  });

  it('should not match inside longer words', () => {
    expect(classifier.analyze('Which country did they ponder').entities).toEqual({});
  });

  it('should de-duplicate repeated matches', () => {
    const { entities } = classifier.analyze('Compare LAW-001 with law-001 and LAW-002');
    expect(entities.project_codes).toEqual(['LAW-001', 'LAW-002']);
  });

  it('should be deterministic for identical input', () => {
    const text = 'Total drops per technician in Mamelodi this week';
    expect(classifier.analyze(text)).toEqual(classifier.analyze(text));
  });

  // ── Tie-breaks and reloads ──

  it('should pick the lowest priority owning category, then declaration order', () => {
    const rules = parseRuleTable({
      version: 't',
      defaultBackend: 'sql',
      backends: { sql: { description: 'SQL' } },
      categories: [
        { name: 'first', backend: 'sql', queryType: 'first', priority: 5, terms: ['alpha'] },
        { name: 'second', backend: 'sql', queryType: 'second', priority: 5, terms: ['beta'] },
        { name: 'urgent', backend: 'sql', queryType: 'urgent', priority: 1, terms: ['gamma'] },
      ],
    });
    const custom = new EntityClassifier(rules);

    expect(custom.analyze('beta alpha').classification.type).toBe('first');
    expect(custom.analyze('alpha gamma').classification.type).toBe('urgent');
  });

  it('should use a swapped rule table for subsequent calls', () => {
    classifier.setRuleTable(
      parseRuleTable({
        version: 'next',
        defaultBackend: 'sql',
        backends: { sql: { description: 'SQL' } },
        categories: [{ name: 'assets', backend: 'sql', queryType: 'asset', terms: ['staff'] }],
      })
    );

    expect(classifier.ruleTable.version).toBe('next');
    expect(classifier.analyze('List all staff').classification.type).toBe('asset');
  });
});

describe('termMatcher', () => {
  it('should accept s and es plurals', () => {
    expect(termMatcher('crew').test('two crews')).toBe(true);
    expect(termMatcher('box').test('three boxes')).toBe(true);
  });

  it('should escape regex metacharacters in terms', () => {
    expect(termMatcher('c++').test('uses c++ daily')).toBe(true);
    expect(termMatcher('a.b').test('axb')).toBe(false);
  });
});

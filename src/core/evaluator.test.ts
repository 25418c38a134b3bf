import { describeRules, evaluate, isApplicable, isSelected, knownRuleIds, unknownRuleIds } from './evaluator';
import { RULES, findRule, violation } from './rules';
import { CROSS_CHECK_RULES } from './cross-check';
import { graphOf } from '../../tests/helpers/graph';
import { Rule, VocabularyFlavour } from '../types';

describe('evaluator', () => {
  const bare = graphOf({ terms: [{ id: 'bare' }] });

  describe('evaluate', () => {
    it('should run only the selected rules', () => {
      const found = evaluate(bare, { only: ['term-label'] });
      expect(found.map((v) => v.message)).toEqual(['Term bare has no label.']);
    });

    it('should leave out skipped rules', () => {
      const found = evaluate(bare, { skip: ['term-label'] });
      expect(found.map((v) => v.ruleId)).toEqual(['term-description']);
    });

    it('should treat an empty selection as all rules', () => {
      expect(evaluate(bare, { only: [] })).toEqual(evaluate(bare));
    });

    it('should accept a custom rule list', () => {
      const always: Rule = {
        id: 'always',
        description: 'Always complains',
        appliesTo: 'all',
        check: () => [violation('always', 'warning', 'Complaint')],
      };

      expect(evaluate(bare, {}, [always])).toEqual([
        { ruleId: 'always', message: 'Complaint', severity: 'warning' },
      ]);
    });
  });

  describe('isApplicable', () => {
    const singleWider = findRule('single-wider-term');
    const cleanFlavour = findRule('clean-flavour');
    const termLabel = findRule('term-label');

    it('should apply flavour lists to the listed flavours only', () => {
      expect(singleWider && isApplicable(singleWider, VocabularyFlavour.RdfProperty)).toBe(true);
      expect(singleWider && isApplicable(singleWider, VocabularyFlavour.Skos)).toBe(false);
    });

    it('should skip flavour-dependent rules without a known flavour', () => {
      expect(cleanFlavour && isApplicable(cleanFlavour, undefined)).toBe(false);
      expect(cleanFlavour && isApplicable(cleanFlavour, VocabularyFlavour.Skos)).toBe(true);
      expect(termLabel && isApplicable(termLabel, undefined)).toBe(true);
    });
  });

  describe('rule selection', () => {
    it('should combine only and skip', () => {
      expect(isSelected('term-label', { only: ['term-label'], skip: ['term-label'] })).toBe(false);
      expect(isSelected('term-label', { only: ['label-unique'] })).toBe(false);
      expect(isSelected('term-label', {})).toBe(true);
    });

    it('should know the cross-check rules', () => {
      expect(knownRuleIds()).toHaveLength(RULES.length + CROSS_CHECK_RULES.length);
      expect(unknownRuleIds(['term-label', 'turtle-base', 'nope'])).toEqual(['nope']);
    });
  });

  describe('describeRules', () => {
    it('should print one aligned line per rule', () => {
      const lines = describeRules();

      expect(lines).toHaveLength(RULES.length + CROSS_CHECK_RULES.length);
      expect(lines[0]).toBe(
        `${'vocabulary-flavour'.padEnd(25)}  Exactly one known ivoasem:vocflavour is declared (all flavours)`
      );
      expect(lines[lines.length - 1]).toBe(
        `${'desise-consistency'.padEnd(25)}  The desise term list has the same terms with the same labels as the RDF (with --cross-check)`
      );
    });
  });
});

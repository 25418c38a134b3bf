import { EvaluateOptions, Rule, TermGraph, Violation, VocabularyFlavour } from '../types';
import { RULES } from './rules';
import { CROSS_CHECK_RULES } from './cross-check';

export function isApplicable(rule: Rule, flavour: VocabularyFlavour | undefined): boolean {
  if (rule.appliesTo === 'all') return true;
  // Flavour-specific rules cannot run without a known flavour;
  // vocabulary-flavour reports that case.
  if (flavour === undefined) return false;
  if (rule.appliesTo === 'known') return true;
  return rule.appliesTo.includes(flavour);
}

export function isSelected(ruleId: string, options: EvaluateOptions): boolean {
  if (options.only && options.only.length > 0 && !options.only.includes(ruleId)) return false;
  return !(options.skip ?? []).includes(ruleId);
}

/**
 * Apply the checklist to a graph. Every selected, applicable rule runs;
 * none depends on the outcome of another.
 */
export function evaluate(
  graph: TermGraph,
  options: EvaluateOptions = {},
  rules: readonly Rule[] = RULES
): Violation[] {
  return rules
    .filter((rule) => isSelected(rule.id, options) && isApplicable(rule, graph.flavour))
    .flatMap((rule) => rule.check(graph));
}

/**
 * Every rule id that may be named in --only or --skip
 */
export function knownRuleIds(): string[] {
  return [...RULES.map((rule) => rule.id), ...CROSS_CHECK_RULES.map((rule) => rule.id)];
}

export function unknownRuleIds(ids: string[]): string[] {
  const known = new Set(knownRuleIds());
  return ids.filter((id) => !known.has(id));
}

function describeScope(appliesTo: Rule['appliesTo']): string {
  if (appliesTo === 'all') return 'all flavours';
  if (appliesTo === 'known') return 'declared flavour';
  return appliesTo.join(', ');
}

/**
 * One line per rule for --list-rules
 */
export function describeRules(): string[] {
  const entries = [
    ...RULES.map((rule) => ({ id: rule.id, scope: describeScope(rule.appliesTo), description: rule.description })),
    ...CROSS_CHECK_RULES.map((rule) => ({ ...rule, scope: 'with --cross-check' })),
  ];
  const width = Math.max(...entries.map((e) => e.id.length));
  return entries.map((e) => `${e.id.padEnd(width)}  ${e.description} (${e.scope})`);
}

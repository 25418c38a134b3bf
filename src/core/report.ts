import { Report, ReportEntry, Violation, VocabularyReference } from '../types';
import { FetchError, ParseError, UnsupportedFormatError, describeError } from './errors';
import { violation } from './rules';

export function aggregate(
  reference: VocabularyReference,
  violations: Violation[],
  termCount?: number
): ReportEntry {
  return termCount === undefined ? { reference, violations } : { reference, violations, termCount };
}

function stageOf(error: unknown): string {
  if (error instanceof FetchError) return 'fetch';
  if (error instanceof UnsupportedFormatError) return 'unsupported-format';
  if (error instanceof ParseError) return 'parse';
  return 'internal';
}

/**
 * Turn an error from fetching or parsing into a single reportable violation
 */
export function stageViolation(error: unknown, context?: string): Violation {
  const message = describeError(error);
  return violation(stageOf(error), 'error', context ? `${context}: ${message}` : message);
}

export function failureEntry(reference: VocabularyReference, error: unknown): ReportEntry {
  return aggregate(reference, [stageViolation(error)]);
}

export function errorCount(entry: ReportEntry): number {
  return entry.violations.filter((v) => v.severity === 'error').length;
}

export function warningCount(entry: ReportEntry): number {
  return entry.violations.filter((v) => v.severity === 'warning').length;
}

export function hasFailed(entry: ReportEntry, strict = false): boolean {
  return errorCount(entry) > 0 || (strict && warningCount(entry) > 0);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function formatViolation(v: Violation): string {
  const severity = v.severity === 'error' ? 'ERROR' : 'warning';
  const term = v.term ? ` ${v.term}:` : '';
  return `  ${severity} [${v.ruleId}]${term} ${v.message}`;
}

export function formatEntry(entry: ReportEntry, strict = false): string[] {
  const details: string[] = [];
  if (entry.termCount !== undefined) details.push(plural(entry.termCount, 'term'));
  const errors = errorCount(entry);
  const warnings = warningCount(entry);
  if (errors > 0) details.push(plural(errors, 'error'));
  if (warnings > 0) details.push(plural(warnings, 'warning'));

  const status = hasFailed(entry, strict) ? 'FAIL' : 'PASS';
  const summary = details.length > 0 ? `${status} ${entry.reference} (${details.join(', ')})` : `${status} ${entry.reference}`;
  return [summary, ...entry.violations.map(formatViolation)];
}

/**
 * Plain-text report: one summary line per vocabulary, its violations
 * indented below it, and a closing tally.
 */
export function format(report: Report, options: { strict?: boolean } = {}): string {
  const strict = options.strict ?? false;
  const failed = report.filter((entry) => hasFailed(entry, strict)).length;
  const noun = report.length === 1 ? 'vocabulary' : 'vocabularies';

  return [
    ...report.flatMap((entry) => formatEntry(entry, strict)),
    `${report.length} ${noun} checked, ${failed} failed.`,
  ].join('\n');
}

export function exitCode(report: Report, strict = false): 0 | 1 {
  return report.some((entry) => hasFailed(entry, strict)) ? 1 : 0;
}

import {
  aggregate,
  exitCode,
  failureEntry,
  format,
  formatViolation,
  hasFailed,
  stageViolation,
} from './report';
import { FetchError, ParseError, UnsupportedFormatError } from './errors';
import { violation } from './rules';
import { Report } from '../types';

const A = 'http://www.ivoa.net/rdf/a';
const B = 'http://www.ivoa.net/rdf/b';
const C = 'http://www.ivoa.net/rdf/c';

describe('report', () => {
  const labelError = violation('term-label', 'error', 'Term x has no label.', 'x');
  const uriWarning = violation('vocabulary-uri', 'warning', 'Hierarchy below the root.');

  const report: Report = [
    aggregate(A, [], 5),
    aggregate(B, [labelError, uriWarning], 3),
    failureEntry(C, new FetchError(C, `HTTP 404 Not Found from ${C}`, 404)),
  ];

  describe('format', () => {
    it('should print a summary per vocabulary followed by its violations', () => {
      expect(format(report).split('\n')).toEqual([
        `PASS ${A} (5 terms)`,
        `FAIL ${B} (3 terms, 1 error, 1 warning)`,
        '  ERROR [term-label] x: Term x has no label.',
        '  warning [vocabulary-uri] Hierarchy below the root.',
        `FAIL ${C} (1 error)`,
        `  ERROR [fetch] HTTP 404 Not Found from ${C}`,
        '3 vocabularies checked, 2 failed.',
      ]);
    });

    it('should fail vocabularies with warnings in strict mode', () => {
      const warned = [aggregate(A, [uriWarning], 1)];

      expect(format(warned)).toBe(
        [`PASS ${A} (1 term, 1 warning)`, '  warning [vocabulary-uri] Hierarchy below the root.', '1 vocabulary checked, 0 failed.'].join('\n')
      );
      expect(format(warned, { strict: true })).toBe(
        [`FAIL ${A} (1 term, 1 warning)`, '  warning [vocabulary-uri] Hierarchy below the root.', '1 vocabulary checked, 1 failed.'].join('\n')
      );
    });

    it('should print a bare summary when there is nothing to count', () => {
      expect(format([aggregate(A, [])])).toBe(`PASS ${A}\n1 vocabulary checked, 0 failed.`);
      expect(format([])).toBe('0 vocabularies checked, 0 failed.');
    });
  });

  describe('exitCode', () => {
    it('should be 1 when any vocabulary failed', () => {
      expect(exitCode(report)).toBe(1);
      expect(exitCode([aggregate(A, [], 5)])).toBe(0);
    });

    it('should count warnings only in strict mode', () => {
      const warned = [aggregate(A, [uriWarning])];
      expect(exitCode(warned)).toBe(0);
      expect(exitCode(warned, true)).toBe(1);
      expect(hasFailed(warned[0], true)).toBe(true);
    });
  });

  describe('stageViolation', () => {
    it('should name the stage that failed', () => {
      expect(stageViolation(new FetchError(A, 'offline')).ruleId).toBe('fetch');
      expect(stageViolation(new UnsupportedFormatError('text/html', 'html')).ruleId).toBe('unsupported-format');
      expect(stageViolation(new ParseError('bad')).ruleId).toBe('parse');
      expect(stageViolation(new Error('boom'))).toEqual({ ruleId: 'internal', message: 'boom', severity: 'error' });
    });

    it('should prefix the message with a context', () => {
      expect(stageViolation(new ParseError('bad'), 'Turtle serialization').message).toBe('Turtle serialization: bad');
    });

    it('should leave the term count out of failure entries', () => {
      expect(failureEntry(A, 'weird')).toEqual({
        reference: A,
        violations: [{ ruleId: 'internal', message: 'weird', severity: 'error' }],
      });
    });
  });

  it('should format violations without a term', () => {
    expect(formatViolation(uriWarning)).toBe('  warning [vocabulary-uri] Hierarchy below the root.');
  });
});

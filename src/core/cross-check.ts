import Ajv, { ErrorObject } from 'ajv';
import { RdfDocument, RdfMediaType, Term, TermGraph, VocabularyReference, Violation } from '../types';
import { ParseError, describeError } from './errors';
import { DESISE_MEDIA_TYPE } from './fetcher';
import { violation } from './rules';

export const SERIALIZATION_NAMES: Record<RdfMediaType, string> = {
  [RdfMediaType.RdfXml]: 'RDF/XML',
  [RdfMediaType.Turtle]: 'Turtle',
  [RdfMediaType.NTriples]: 'N-Triples',
};

export const CROSS_CHECK_RULES = [
  { id: 'turtle-base', description: 'The Turtle serialization starts by declaring the vocabulary URI as @base' },
  {
    id: 'serialization-consistency',
    description: 'All serializations define the same terms with the same labels',
  },
  {
    id: 'desise-consistency',
    description: 'The desise term list has the same terms with the same labels as the RDF',
  },
] as const;

export type CrossCheckRuleId = (typeof CROSS_CHECK_RULES)[number]['id'];

export const DESISE_NAME = 'desise';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The Turtle served for a vocabulary must open with `@base <uri>.`
 */
export function checkTurtleBase(document: RdfDocument, vocabularyUri: string): Violation[] {
  const expected = new RegExp(`^@base\\s+<${escapeRegExp(vocabularyUri)}>\\s*\\.`);
  if (expected.test(document.body.trimStart())) return [];
  return [
    violation('turtle-base', 'error', `Turtle source does not declare the right base URI (expected @base <${vocabularyUri}>).`),
  ];
}

function labelKey(labels: string[]): string {
  return [...labels].map((l) => l.trim()).sort().join(' | ');
}

/**
 * Compare the terms and labels of two renderings of the same vocabulary
 */
export function compareSerializations(
  primary: TermGraph,
  primaryName: string,
  secondary: TermGraph,
  secondaryName: string,
  ruleId: CrossCheckRuleId = 'serialization-consistency'
): Violation[] {
  const found: Violation[] = [];

  for (const term of primary.terms.values()) {
    const other = secondary.terms.get(term.id);
    if (!other) {
      found.push(violation(ruleId, 'error', `Term ${term.id} is missing from the ${secondaryName} serialization.`, term.id));
    } else if (labelKey(term.labels) !== labelKey(other.labels)) {
      found.push(
        violation(
          ruleId,
          'error',
          `Term ${term.id} is labelled "${labelKey(term.labels)}" in ${primaryName} but "${labelKey(other.labels)}" in ${secondaryName}.`,
          term.id
        )
      );
    }
  }

  for (const term of secondary.terms.values()) {
    if (!primary.terms.has(term.id)) {
      found.push(violation(ruleId, 'error', `Term ${term.id} only appears in the ${secondaryName} serialization.`, term.id));
    }
  }

  return found;
}

interface DesiseDocument {
  terms: Record<string, { label?: string }>;
}

const DESISE_SCHEMA = {
  type: 'object',
  required: ['terms'],
  properties: {
    terms: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        properties: { label: { type: 'string' } },
      },
    },
  },
};

const validateDesise = new Ajv().compile<DesiseDocument>(DESISE_SCHEMA);

function describeSchemaError(error: ErrorObject): string {
  return `${error.instancePath.slice(1) || 'document'} ${error.message ?? 'is invalid'}`;
}

/**
 * Read a desise term list into a term graph holding identifiers and labels
 */
export function parseDesise(body: string, reference: VocabularyReference): TermGraph {
  const fail = (reason: string): ParseError =>
    new ParseError(`Malformed ${DESISE_MEDIA_TYPE} in ${reference}: ${reason}`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw fail(describeError(error));
  }
  if (!validateDesise(parsed)) {
    const [first] = validateDesise.errors ?? [];
    throw fail(first ? describeSchemaError(first) : 'not a desise document');
  }

  const terms = new Map<string, Term>();
  for (const [id, props] of Object.entries(parsed.terms)) {
    terms.set(id, {
      id,
      uri: `${reference}#${id}`,
      types: [],
      labels: props.label === undefined ? [] : [props.label],
      descriptions: [],
      wider: [],
      deprecated: false,
      useInstead: [],
      preliminary: false,
    });
  }

  return {
    uri: reference,
    declaredFlavours: [],
    terms,
    metadata: { title: [], description: [], created: [], creator: [], label: [] },
    triples: [],
  };
}

import { Parser } from 'n3';
import { RdfXmlParser } from 'rdfxml-streaming-parser';
import type { Quad, Term as RdfTerm } from '@rdfjs/types';
import { RdfDocument, RdfMediaType, Term, TermGraph, Triple, VocabularyMetadata } from '../types';
import { ParseError, describeError } from './errors';
import { FLAVOUR_PROPERTIES, compact, isFlavour, localIdentifier } from './namespaces';

function parseRdfXml(body: string, baseIRI: string): Promise<Quad[]> {
  return new Promise((resolve, reject) => {
    const quads: Quad[] = [];
    const parser = new RdfXmlParser({ baseIRI });

    parser.on('data', (quad: Quad) => quads.push(quad));
    parser.on('error', reject);
    parser.on('end', () => resolve(quads));

    try {
      parser.write(body);
      parser.end();
    } catch (error) {
      reject(error);
    }
  });
}

async function parseQuads(document: RdfDocument): Promise<Quad[]> {
  switch (document.mediaType) {
    case RdfMediaType.RdfXml:
      return parseRdfXml(document.body, document.location);
    case RdfMediaType.Turtle:
    case RdfMediaType.NTriples:
      return new Parser({ baseIRI: document.location, format: document.mediaType }).parse(document.body);
  }
}

function nodeValue(term: RdfTerm): string {
  switch (term.termType) {
    case 'NamedNode':
      return compact(term.value);
    case 'BlankNode':
      return `_:${term.value}`;
    default:
      return term.value;
  }
}

export function toTriple(quad: Quad): Triple {
  return {
    subject: nodeValue(quad.subject),
    predicate: nodeValue(quad.predicate),
    object: nodeValue(quad.object),
    objectKind:
      quad.object.termType === 'Literal'
        ? 'literal'
        : quad.object.termType === 'BlankNode'
          ? 'blank'
          : 'iri',
  };
}

function quadKey(quad: Quad): string {
  const { subject, predicate, object } = quad;
  const literal = object.termType === 'Literal' ? [object.datatype.value, object.language] : [];
  return [subject.termType, subject.value, predicate.value, object.termType, object.value, ...literal].join('\u0000');
}

/**
 * Drop repeated statements; a graph is a set of triples, but parsers
 * report a statement as often as the source states it.
 */
export function distinctQuads(quads: Quad[]): Quad[] {
  const seen = new Set<string>();
  return quads.filter((quad) => {
    const key = quadKey(quad);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function groupByPredicate(triples: Triple[]): Map<string, Triple[]> {
  const byProperty = new Map<string, Triple[]>();
  for (const triple of triples) {
    const group = byProperty.get(triple.predicate);
    if (group) {
      group.push(triple);
    } else {
      byProperty.set(triple.predicate, [triple]);
    }
  }
  return byProperty;
}

const METADATA_PROPERTIES: Record<string, keyof VocabularyMetadata> = {
  'dc:title': 'title',
  'dc:description': 'description',
  'dc:created': 'created',
  'dc:creator': 'creator',
  'rdfs:label': 'label',
};

/**
 * Build a term graph from triples.
 *
 * This never rejects a vocabulary: a missing or unknown flavour, untyped
 * resources and dangling references are all left for the rules to report.
 */
export function buildGraph(triples: Triple[]): TermGraph {
  const byProperty = groupByPredicate(triples);

  const flavourDeclarations = byProperty.get('ivoasem:vocflavour') ?? [];
  const declaredFlavours = flavourDeclarations.map((t) => t.object);
  const firstFlavour = declaredFlavours[0];
  const flavour = firstFlavour !== undefined && isFlavour(firstFlavour) ? firstFlavour : undefined;

  let uri: string | undefined =
    flavourDeclarations[0]?.subject ??
    (byProperty.get('rdf:type') ?? []).find((t) => t.object === 'owl:Ontology')?.subject;
  if (uri !== undefined && uri.endsWith('#')) {
    uri = uri.slice(0, -1);
  }

  const metadata: VocabularyMetadata = { title: [], description: [], created: [], creator: [], label: [] };
  const terms = new Map<string, Term>();

  if (uri === undefined) {
    return { uri, flavour, declaredFlavours, terms, metadata, triples };
  }

  const namespace = `${uri}#`;
  const localName = localIdentifier(uri);
  const toTerm = (value: string): string => localName(value) ?? value;

  const properties = flavour ? [FLAVOUR_PROPERTIES[flavour]] : Object.values(FLAVOUR_PROPERTIES);
  const termTypes = new Set(properties.map((p) => p.termType));
  const labelProperties = new Set(properties.map((p) => p.label));
  const descriptionProperties = new Set(properties.map((p) => p.description));
  const widerProperties = new Set(properties.map((p) => p.wider));

  for (const typing of byProperty.get('rdf:type') ?? []) {
    const id = localName(typing.subject);
    if (id !== undefined && termTypes.has(typing.object) && !terms.has(id)) {
      terms.set(id, {
        id,
        uri: namespace + id,
        types: [],
        labels: [],
        descriptions: [],
        wider: [],
        deprecated: false,
        useInstead: [],
        preliminary: false,
      });
    }
  }

  for (const triple of triples) {
    if (triple.subject === uri || triple.subject === namespace) {
      const key = METADATA_PROPERTIES[triple.predicate];
      if (key !== undefined) {
        metadata[key].push(triple.object);
      }
      continue;
    }

    const id = localName(triple.subject);
    const term = id === undefined ? undefined : terms.get(id);
    if (!term) continue;

    const { predicate, object } = triple;
    if (predicate === 'rdf:type') {
      term.types.push(object);
    } else if (labelProperties.has(predicate)) {
      term.labels.push(object);
    } else if (descriptionProperties.has(predicate)) {
      term.descriptions.push(object);
    } else if (widerProperties.has(predicate)) {
      term.wider.push(toTerm(object));
    } else if (predicate === 'ivoasem:deprecated') {
      term.deprecated = true;
    } else if (predicate === 'ivoasem:useInstead') {
      term.useInstead.push(toTerm(object));
    } else if (predicate === 'ivoasem:preliminary') {
      term.preliminary = true;
    }
  }

  return { uri, flavour, declaredFlavours, terms, metadata, triples };
}

/**
 * Parse one serialization into a term graph
 */
export async function parse(document: RdfDocument): Promise<TermGraph> {
  let quads: Quad[];
  try {
    quads = await parseQuads(document);
  } catch (error) {
    throw new ParseError(
      `Malformed ${document.mediaType} in ${document.reference}: ${describeError(error)}`
    );
  }
  return buildGraph(distinctQuads(quads).map(toTriple));
}

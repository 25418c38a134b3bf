import { VocabularyFlavour } from '../types';

/**
 * Namespace URIs mapped to the canonical prefixes used throughout the
 * validator. No URI in here may be a prefix of another.
 */
export const PREFIXES: Readonly<Record<string, string>> = {
  'http://purl.org/dc/terms/': 'dc',
  'http://www.w3.org/1999/02/22-rdf-syntax-ns#': 'rdf',
  'http://www.w3.org/2000/01/rdf-schema#': 'rdfs',
  'http://www.w3.org/2002/07/owl#': 'owl',
  'http://www.w3.org/2004/02/skos/core#': 'skos',
  'http://www.ivoa.net/rdf/ivoasem#': 'ivoasem',
};

const NAMESPACES = Object.keys(PREFIXES).sort((a, b) => b.length - a.length);

/**
 * Returns the CURIE form of a URI in a known namespace, the URI otherwise
 */
export function compact(uri: string): string {
  for (const ns of NAMESPACES) {
    if (uri.startsWith(ns)) {
      return `${PREFIXES[ns]}:${uri.slice(ns.length)}`;
    }
  }
  return uri;
}

/**
 * The properties that carry labels, descriptions and hierarchy per flavour
 */
export interface FlavourProperties {
  label: string;
  description: string;
  wider: string;
  termType: string;
}

export const FLAVOUR_PROPERTIES: Readonly<Record<VocabularyFlavour, FlavourProperties>> = {
  [VocabularyFlavour.RdfClass]: {
    label: 'rdfs:label',
    description: 'rdfs:comment',
    wider: 'rdfs:subClassOf',
    termType: 'rdfs:Class',
  },
  [VocabularyFlavour.RdfProperty]: {
    label: 'rdfs:label',
    description: 'rdfs:comment',
    wider: 'rdfs:subPropertyOf',
    termType: 'rdf:Property',
  },
  [VocabularyFlavour.Skos]: {
    label: 'skos:prefLabel',
    description: 'skos:definition',
    wider: 'skos:broader',
    termType: 'skos:Concept',
  },
};

export const TERM_TYPES: readonly string[] = Object.values(FLAVOUR_PROPERTIES).map(
  (p) => p.termType
);

export function isFlavour(value: string): value is VocabularyFlavour {
  return Object.values(VocabularyFlavour).some((flavour) => flavour === value);
}

/**
 * Root below which IVOA vocabularies are published
 */
export const IVOA_VOCABULARY_ROOT = 'http://www.ivoa.net/rdf/';

/**
 * Returns a function giving the local identifier of a URI in the
 * vocabulary namespace, or undefined for URIs outside it. Terms of the
 * ivoasem vocabulary itself come out of compact() prefixed, so the
 * compacted namespace matches as well.
 */
export function localIdentifier(vocabularyUri: string): (value: string) => string | undefined {
  const namespace = `${vocabularyUri}#`;
  const forms = [...new Set([namespace, compact(namespace)])];
  return (value) => {
    const form = forms.find((f) => value.startsWith(f));
    return form === undefined ? undefined : value.slice(form.length);
  };
}

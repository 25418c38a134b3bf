/**
 * Vocabulary flavours as declared through ivoasem:vocflavour.
 *
 * RDF Class and RDF Property vocabularies are strict hierarchies (at most
 * one wider term per term); SKOS vocabularies are informal word lists that
 * may have several wider terms.
 */
export enum VocabularyFlavour {
  RdfClass = 'RDF Class',
  RdfProperty = 'RDF Property',
  Skos = 'SKOS',
}

/**
 * A vocabulary URI, or a path to a local RDF file
 */
export type VocabularyReference = string;

/**
 * Media types the validator knows how to parse
 */
export enum RdfMediaType {
  RdfXml = 'application/rdf+xml',
  Turtle = 'text/turtle',
  NTriples = 'application/n-triples',
}

/**
 * One retrieved serialization of a vocabulary
 */
export interface RdfDocument {
  reference: VocabularyReference;
  /** Where the body actually came from (after redirects) */
  location: string;
  mediaType: RdfMediaType;
  body: string;
}

export type ObjectKind = 'iri' | 'literal' | 'blank';

/**
 * A triple with IRIs in well-known namespaces compacted to CURIEs
 */
export interface Triple {
  subject: string;
  predicate: string;
  object: string;
  objectKind: ObjectKind;
}

/**
 * A term of a vocabulary.
 *
 * `wider` and `useInstead` hold term identifiers when the target lies in
 * the vocabulary namespace and full URIs otherwise.
 */
export interface Term {
  id: string;
  uri: string;
  types: string[];
  labels: string[];
  descriptions: string[];
  wider: string[];
  deprecated: boolean;
  useInstead: string[];
  preliminary: boolean;
}

/**
 * Metadata attached to the vocabulary resource itself
 */
export interface VocabularyMetadata {
  title: string[];
  description: string[];
  created: string[];
  creator: string[];
  label: string[];
}

/**
 * The parsed form of one vocabulary
 */
export interface TermGraph {
  /** Vocabulary URI, without the trailing '#' */
  uri?: string;
  /** The first declared flavour, when it is a known one */
  flavour?: VocabularyFlavour;
  /** Every ivoasem:vocflavour value found, in document order */
  declaredFlavours: string[];
  terms: Map<string, Term>;
  metadata: VocabularyMetadata;
  triples: Triple[];
}

export type Severity = 'error' | 'warning';

/**
 * One failed requirement
 */
export interface Violation {
  readonly ruleId: string;
  readonly term?: string;
  readonly message: string;
  readonly severity: Severity;
}

/**
 * A structural check over a whole term graph
 */
export interface Rule {
  id: string;
  description: string;
  /** 'all', 'known' (any recognised flavour) or an explicit flavour list */
  appliesTo: 'all' | 'known' | VocabularyFlavour[];
  check(graph: TermGraph): Violation[];
}

export interface EvaluateOptions {
  only?: string[];
  skip?: string[];
}

/**
 * The findings for one vocabulary
 */
export interface ReportEntry {
  reference: VocabularyReference;
  violations: Violation[];
  termCount?: number;
}

export type Report = ReportEntry[];

/**
 * Validator configuration
 */
export interface ValidatorConfig {
  registryUrl: string;
  vocabularyRoot: string;
  timeoutMs: number;
  strict: boolean;
  crossCheck: boolean;
  skipRules: string[];
}

/**
 * The subset of the fetch API the validator relies on
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

import {
  EvaluateOptions,
  FetchFn,
  RdfDocument,
  RdfMediaType,
  Report,
  ReportEntry,
  TermGraph,
  ValidatorConfig,
  Violation,
  VocabularyReference,
} from '../types';
import { discoverVocabularies } from './discovery';
import { VocabularyFetcher, isRemote } from './fetcher';
import { parse } from './graph-builder';
import { evaluate, isSelected } from './evaluator';
import { DESISE_NAME, checkTurtleBase, compareSerializations, parseDesise, SERIALIZATION_NAMES } from './cross-check';
import { aggregate, failureEntry, hasFailed, stageViolation } from './report';
import { Logger, defaultLogger } from './logger';

export interface ValidatorOptions {
  config: ValidatorConfig;
  /** Restrict the run to these rule ids */
  only?: string[];
  fetch?: FetchFn;
  logger?: Logger;
}

/**
 * Runs the fetch, parse and evaluate pipeline over a list of vocabularies,
 * one at a time, in the order given.
 */
export class VocabularyValidator {
  private config: ValidatorConfig;
  private fetcher: VocabularyFetcher;
  private doFetch?: FetchFn;
  private logger: Logger;
  private selection: EvaluateOptions;

  constructor(options: ValidatorOptions) {
    this.config = options.config;
    this.doFetch = options.fetch;
    this.logger = options.logger ?? defaultLogger;
    this.fetcher = new VocabularyFetcher({
      timeoutMs: this.config.timeoutMs,
      fetch: options.fetch,
      logger: this.logger,
    });
    this.selection = { only: options.only, skip: this.config.skipRules };
  }

  /**
   * The references to check: those given, or every registered vocabulary.
   * Throws DiscoveryError when the registry listing cannot be read.
   */
  async resolveReferences(references: VocabularyReference[]): Promise<VocabularyReference[]> {
    if (references.length > 0) return references;
    return discoverVocabularies({
      registryUrl: this.config.registryUrl,
      vocabularyRoot: this.config.vocabularyRoot,
      timeoutMs: this.config.timeoutMs,
      fetch: this.doFetch,
      logger: this.logger,
    });
  }

  /**
   * Validate a single vocabulary. Any failure, from fetching to a rule
   * giving up on the graph, is reported as a violation; none propagates.
   */
  async validate(reference: VocabularyReference): Promise<ReportEntry> {
    try {
      const document = await this.fetcher.fetch(reference);
      const graph = await parse(document);
      const violations = evaluate(graph, this.selection);

      if (this.config.crossCheck && isRemote(reference)) {
        violations.push(...(await this.crossCheck(reference, document, graph)));
      }
      return aggregate(reference, violations, graph.terms.size);
    } catch (error) {
      this.logger.log(`${reference}: ${stageViolation(error).message}`);
      return failureEntry(reference, error);
    }
  }

  /**
   * Fetch the other serializations as well and compare them with the
   * primary one
   */
  private async crossCheck(
    reference: VocabularyReference,
    primaryDocument: RdfDocument,
    primary: TermGraph
  ): Promise<Violation[]> {
    const found: Violation[] = [];
    const checkBase = isSelected('turtle-base', this.selection);
    const compareTurtle = isSelected('serialization-consistency', this.selection);

    if (primaryDocument.mediaType !== RdfMediaType.Turtle && (checkBase || compareTurtle)) {
      found.push(...(await this.checkTurtle(reference, primaryDocument, primary, checkBase, compareTurtle)));
    }
    if (isSelected('desise-consistency', this.selection)) {
      found.push(...(await this.checkDesise(reference, primaryDocument, primary)));
    }
    return found;
  }

  private async checkTurtle(
    reference: VocabularyReference,
    primaryDocument: RdfDocument,
    primary: TermGraph,
    checkBase: boolean,
    compareTurtle: boolean
  ): Promise<Violation[]> {
    let turtle: RdfDocument;
    let secondary: TermGraph;
    try {
      turtle = await this.fetcher.fetch(reference, RdfMediaType.Turtle);
      secondary = await parse(turtle);
    } catch (error) {
      return [stageViolation(error, `${SERIALIZATION_NAMES[RdfMediaType.Turtle]} serialization`)];
    }

    const found: Violation[] = [];
    if (checkBase) {
      found.push(...checkTurtleBase(turtle, primary.uri ?? reference));
    }
    if (compareTurtle) {
      found.push(
        ...compareSerializations(
          primary,
          SERIALIZATION_NAMES[primaryDocument.mediaType],
          secondary,
          SERIALIZATION_NAMES[turtle.mediaType]
        )
      );
    }
    return found;
  }

  private async checkDesise(
    reference: VocabularyReference,
    primaryDocument: RdfDocument,
    primary: TermGraph
  ): Promise<Violation[]> {
    let desise: TermGraph;
    try {
      desise = parseDesise(await this.fetcher.fetchDesise(reference), reference);
    } catch (error) {
      return [stageViolation(error, `${DESISE_NAME} serialization`)];
    }
    return compareSerializations(
      primary,
      SERIALIZATION_NAMES[primaryDocument.mediaType],
      desise,
      DESISE_NAME,
      'desise-consistency'
    );
  }

  /**
   * Validate every reference in turn
   */
  async run(references: VocabularyReference[]): Promise<Report> {
    const report: Report = [];
    for (const reference of references) {
      const entry = await this.validate(reference);
      this.logger.log(`${reference}: ${hasFailed(entry, this.config.strict) ? 'failed' : 'passed'}`);
      report.push(entry);
    }
    return report;
  }
}

export function createValidator(options: ValidatorOptions): VocabularyValidator {
  return new VocabularyValidator(options);
}

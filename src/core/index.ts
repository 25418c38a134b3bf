export { VocabularyValidator, createValidator } from './validator';
export { VocabularyFetcher } from './fetcher';
export { discoverVocabularies, parseListing } from './discovery';
export { parse, buildGraph } from './graph-builder';
export { evaluate, describeRules } from './evaluator';
export { RULES } from './rules';
export { aggregate, format, exitCode } from './report';
export {
  ValidatorError,
  FetchError,
  UnsupportedFormatError,
  ParseError,
  DiscoveryError,
  ConfigError,
} from './errors';
export { Logger, ConsoleLogger, SilentLogger } from './logger';

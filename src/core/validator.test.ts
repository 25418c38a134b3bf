import { VocabularyValidator, createValidator } from './validator';
import * as evaluator from './evaluator';
import { SilentLogger } from './logger';
import { getDefaultConfig } from '../config';
import { fakeFetch, Route } from '../../tests/helpers/fake-fetch';
import { CLASS_DESISE, CLASS_TURTLE, TEST_VOCABULARY, classVocabulary } from '../../tests/helpers/vocabulary';
import { ValidatorConfig } from '../types';

const MISSING = 'http://www.ivoa.net/rdf/missing';
const BROKEN = 'http://www.ivoa.net/rdf/broken';

function validatorFor(
  routes: Record<string, Route>,
  overrides: Partial<ValidatorConfig> = {},
  only?: string[]
): { validator: VocabularyValidator; requests: Array<{ url: string; accept: string | null }> } {
  const fetch = fakeFetch(routes);
  const validator = createValidator({
    config: { ...getDefaultConfig(), ...overrides },
    only,
    fetch,
    logger: new SilentLogger(),
  });
  return { validator, requests: fetch.requests };
}

describe('VocabularyValidator', () => {
  const good: Route = { rdfXml: classVocabulary(), turtle: CLASS_TURTLE, desise: CLASS_DESISE };

  describe('validate', () => {
    it('should pass a clean vocabulary', async () => {
      const { validator } = validatorFor({ [TEST_VOCABULARY]: good });

      expect(await validator.validate(TEST_VOCABULARY)).toEqual({
        reference: TEST_VOCABULARY,
        violations: [],
        termCount: 5,
      });
    });

    it('should report fetch failures as a single violation', async () => {
      const { validator } = validatorFor({});

      expect(await validator.validate(MISSING)).toEqual({
        reference: MISSING,
        violations: [{ ruleId: 'fetch', message: `HTTP 404 Not Found from ${MISSING}`, severity: 'error' }],
      });
    });

    it('should report malformed RDF as a parse violation', async () => {
      const { validator } = validatorFor({ [BROKEN]: { rdfXml: '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"><oops></rdf:RDF>' } });

      const entry = await validator.validate(BROKEN);

      expect(entry.violations.map((v) => v.ruleId)).toEqual(['parse']);
      expect(entry.violations[0].message).toMatch(/^Malformed application\/rdf\+xml in http:\/\/www\.ivoa\.net\/rdf\/broken: /);
    });

    it('should honour only and skipRules', async () => {
      const routes = { [TEST_VOCABULARY]: { rdfXml: classVocabulary([['tv:extra', 'rdfs:label', 'Extra']]) } };

      const all = await validatorFor(routes).validator.validate(TEST_VOCABULARY);
      const skipped = await validatorFor(routes, { skipRules: ['term-description'] }).validator.validate(TEST_VOCABULARY);
      const only = await validatorFor(routes, {}, ['term-label']).validator.validate(TEST_VOCABULARY);

      expect(all.violations.map((v) => v.message)).toEqual(['Term extra has no definition.']);
      expect(skipped.violations).toEqual([]);
      expect(only.violations).toEqual([]);
    });
  });

  describe('cross-checking', () => {
    it('should fetch Turtle as well and find consistent serializations', async () => {
      const { validator, requests } = validatorFor({ [TEST_VOCABULARY]: good }, { crossCheck: true });

      const entry = await validator.validate(TEST_VOCABULARY);

      expect(entry.violations).toEqual([]);
      expect(requests.map((r) => r.accept)).toEqual([
        'application/rdf+xml, text/turtle;q=0.9, application/n-triples;q=0.8',
        'text/turtle',
        'application/x-desise+json',
      ]);
    });

    it('should report a missing @base and relabelled terms', async () => {
      const turtle = CLASS_TURTLE.replace(`@base <${TEST_VOCABULARY}>.\n`, '').replace('"Galaxy"', '"Galaxies"');
      const { validator } = validatorFor(
        { [TEST_VOCABULARY]: { rdfXml: classVocabulary(), turtle, desise: CLASS_DESISE } },
        { crossCheck: true }
      );

      const entry = await validator.validate(TEST_VOCABULARY);

      expect(entry.violations.map((v) => v.message)).toEqual([
        `Turtle source does not declare the right base URI (expected @base <${TEST_VOCABULARY}>).`,
        'Term galaxy is labelled "Galaxy" in RDF/XML but "Galaxies" in Turtle.',
      ]);
    });

    it('should leave out deselected cross-check rules', async () => {
      const turtle = CLASS_TURTLE.replace(`@base <${TEST_VOCABULARY}>.\n`, '');
      const { validator } = validatorFor(
        { [TEST_VOCABULARY]: { rdfXml: classVocabulary(), turtle, desise: CLASS_DESISE } },
        { crossCheck: true, skipRules: ['turtle-base'] }
      );

      expect((await validator.validate(TEST_VOCABULARY)).violations).toEqual([]);
    });

    it('should report a missing Turtle serialization', async () => {
      const { validator } = validatorFor(
        { [TEST_VOCABULARY]: { rdfXml: classVocabulary(), desise: CLASS_DESISE } },
        { crossCheck: true }
      );

      const entry = await validator.validate(TEST_VOCABULARY);

      expect(entry.violations).toEqual([
        {
          ruleId: 'unsupported-format',
          message: `Turtle serialization: ${TEST_VOCABULARY} has no text/turtle serialization (received application/rdf+xml)`,
          severity: 'error',
        },
      ]);
    });

    it('should compare the desise term list with the RDF', async () => {
      const desise = CLASS_DESISE.replace('"Galaxy"', '"Galaxies"').replace('"exoplanet"', '"planet"');
      const { validator } = validatorFor(
        { [TEST_VOCABULARY]: { ...good, desise } },
        { crossCheck: true }
      );

      const entry = await validator.validate(TEST_VOCABULARY);

      expect(entry.violations.map((v) => [v.ruleId, v.message])).toEqual([
        ['desise-consistency', 'Term galaxy is labelled "Galaxy" in RDF/XML but "Galaxies" in desise.'],
        ['desise-consistency', 'Term exoplanet is missing from the desise serialization.'],
        ['desise-consistency', 'Term planet only appears in the desise serialization.'],
      ]);
    });

    it('should report a missing desise term list', async () => {
      const { validator } = validatorFor(
        { [TEST_VOCABULARY]: { rdfXml: classVocabulary(), turtle: CLASS_TURTLE } },
        { crossCheck: true }
      );

      expect((await validator.validate(TEST_VOCABULARY)).violations).toEqual([
        {
          ruleId: 'unsupported-format',
          message: `desise serialization: ${TEST_VOCABULARY} has no application/x-desise+json serialization (received application/rdf+xml)`,
          severity: 'error',
        },
      ]);
    });

    it('should only fetch what the selected cross-check rules need', async () => {
      const { validator, requests } = validatorFor(
        { [TEST_VOCABULARY]: good },
        { crossCheck: true, skipRules: ['turtle-base', 'serialization-consistency'] }
      );

      expect((await validator.validate(TEST_VOCABULARY)).violations).toEqual([]);
      expect(requests.map((r) => r.accept)).toEqual([
        'application/rdf+xml, text/turtle;q=0.9, application/n-triples;q=0.8',
        'application/x-desise+json',
      ]);
    });

    it('should compare Turtle primaries with desise only', async () => {
      const { validator, requests } = validatorFor(
        { [TEST_VOCABULARY]: { turtle: CLASS_TURTLE, desise: CLASS_DESISE } },
        { crossCheck: true }
      );

      expect((await validator.validate(TEST_VOCABULARY)).violations).toEqual([]);
      expect(requests).toHaveLength(2);
    });

    it('should not cross-check without the option', async () => {
      const { validator, requests } = validatorFor({ [TEST_VOCABULARY]: good });

      await validator.validate(TEST_VOCABULARY);

      expect(requests).toHaveLength(1);
    });
  });

  describe('run', () => {
    it('should continue after a failure and keep the input order', async () => {
      const { validator } = validatorFor({ [TEST_VOCABULARY]: good });

      const report = await validator.run([TEST_VOCABULARY, MISSING, TEST_VOCABULARY]);

      expect(report.map((entry) => [entry.reference, entry.violations.length])).toEqual([
        [TEST_VOCABULARY, 0],
        [MISSING, 1],
        [TEST_VOCABULARY, 0],
      ]);
    });
  });

  describe('unexpected failures', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should report an error inside the rules as an internal failure and carry on', async () => {
      jest.spyOn(evaluator, 'evaluate').mockImplementationOnce(() => {
        throw new RangeError('Maximum call stack size exceeded');
      });
      const { validator } = validatorFor({ [TEST_VOCABULARY]: good });

      const report = await validator.run([TEST_VOCABULARY, TEST_VOCABULARY]);

      expect(report).toEqual([
        {
          reference: TEST_VOCABULARY,
          violations: [{ ruleId: 'internal', message: 'Maximum call stack size exceeded', severity: 'error' }],
        },
        { reference: TEST_VOCABULARY, violations: [], termCount: 5 },
      ]);
    });
  });

  describe('resolveReferences', () => {
    it('should keep explicit references', async () => {
      const { validator, requests } = validatorFor({});

      expect(await validator.resolveReferences([MISSING])).toEqual([MISSING]);
      expect(requests).toEqual([]);
    });

    it('should discover vocabularies when none are given', async () => {
      const config = getDefaultConfig();
      const { validator } = validatorFor({ [config.registryUrl]: { text: '[DEFAULT]\n[test]\n[missing]\n' } });

      expect(await validator.resolveReferences([])).toEqual([TEST_VOCABULARY, MISSING]);
    });
  });
});

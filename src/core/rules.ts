import { Rule, Severity, TermGraph, Violation, VocabularyFlavour } from '../types';
import { FLAVOUR_PROPERTIES, IVOA_VOCABULARY_ROOT, TERM_TYPES, localIdentifier } from './namespaces';

export function violation(ruleId: string, severity: Severity, message: string, term?: string): Violation {
  return Object.freeze(term === undefined ? { ruleId, message, severity } : { ruleId, term, message, severity });
}

/**
 * Local identifier of a resource when it is in the vocabulary namespace
 */
function localId(graph: TermGraph, value: string): string | undefined {
  return graph.uri === undefined ? undefined : localIdentifier(graph.uri)(value);
}

function nonEmpty(values: string[]): string[] {
  return values.map((v) => v.trim()).filter((v) => v !== '');
}

const TERM_FORM_VIOLATION = /[^A-Za-z0-9_-]+/;

const ALL_TERM_PROPERTIES = new Set(
  Object.values(FLAVOUR_PROPERTIES).flatMap((p) => [p.label, p.description, p.wider])
);

const SKOS_PROPERTIES = ['skos:prefLabel', 'skos:definition', 'skos:broader'];

// rdfs:label and rdfs:comment are not flagged in SKOS vocabularies because
// they describe the vocabulary as a whole there.
const FORBIDDEN_PROPERTIES: Record<VocabularyFlavour, string[]> = {
  [VocabularyFlavour.Skos]: ['rdfs:subClassOf', 'rdfs:subPropertyOf'],
  [VocabularyFlavour.RdfClass]: ['rdfs:subPropertyOf', ...SKOS_PROPERTIES],
  [VocabularyFlavour.RdfProperty]: ['rdfs:subClassOf', ...SKOS_PROPERTIES],
};

const EXCLUDED_SKOS_FEATURES = [
  'skos:related',
  'skos:exactMatch',
  'skos:closeMatch',
  'skos:broadMatch',
  'skos:narrowMatch',
  'skos:ConceptScheme',
  'skos:inScheme',
  'skos:hasTopConcept',
  'skos:altLabel',
  'skos:hiddenLabel',
];

const flavourDeclared: Rule = {
  id: 'vocabulary-flavour',
  description: 'Exactly one known ivoasem:vocflavour is declared',
  appliesTo: 'all',
  check(graph) {
    const declared = graph.declaredFlavours;
    if (declared.length === 0) {
      return [
        violation('vocabulary-flavour', 'error', 'No ivoasem:vocflavour declared. Is this an IVOA vocabulary?'),
      ];
    }

    const found: Violation[] = [];
    if (declared.length > 1) {
      found.push(
        violation(
          'vocabulary-flavour',
          'error',
          `More than one ivoasem:vocflavour declared (${declared.join(', ')}); using '${declared[0]}'.`
        )
      );
    }
    if (graph.flavour === undefined) {
      found.push(
        violation(
          'vocabulary-flavour',
          'error',
          `Flavour '${declared[0]}' unknown. This must be one of ${Object.values(VocabularyFlavour).join(', ')}.`
        )
      );
    }
    return found;
  },
};

const vocabularyUri: Rule = {
  id: 'vocabulary-uri',
  description: 'The vocabulary URI lies directly below the IVOA vocabulary root',
  appliesTo: 'all',
  check(graph) {
    if (graph.uri === undefined) {
      return [violation('vocabulary-uri', 'error', 'No vocabulary URI found; neither ivoasem:vocflavour nor owl:Ontology is declared.')];
    }
    if (!graph.uri.startsWith(IVOA_VOCABULARY_ROOT)) {
      return [
        violation(
          'vocabulary-uri',
          'error',
          `Vocabulary URI ${graph.uri} does not start with the canonical IVOA vocabulary URI root.`
        ),
      ];
    }
    if (graph.uri.slice(IVOA_VOCABULARY_ROOT.length).includes('/')) {
      return [
        violation(
          'vocabulary-uri',
          'warning',
          `Vocabulary URIs should not introduce additional hierarchy below ${IVOA_VOCABULARY_ROOT}.`
        ),
      ];
    }
    return [];
  },
};

const REQUIRED_METADATA: Array<[keyof TermGraph['metadata'], string]> = [
  ['created', 'dc:created'],
  ['creator', 'dc:creator'],
  ['title', 'dc:title'],
  ['description', 'dc:description'],
];

const vocabularyMetadata: Rule = {
  id: 'vocabulary-metadata',
  description: 'Creation date, creator, title and description are given for the vocabulary',
  appliesTo: 'all',
  check(graph) {
    if (graph.uri === undefined) return [];
    return REQUIRED_METADATA.filter(([key]) => nonEmpty(graph.metadata[key]).length === 0).map(
      ([, property]) => violation('vocabulary-metadata', 'error', `Vocabulary has no ${property}.`)
    );
  },
};

const termIdentifier: Rule = {
  id: 'term-identifier',
  description: 'Term identifiers consist of ASCII letters, digits, underscores and dashes',
  appliesTo: 'all',
  check(graph) {
    const found: Violation[] = [];
    for (const term of graph.terms.values()) {
      if (term.id === '') {
        found.push(violation('term-identifier', 'error', `Term identifiers must not be empty (found ${term.uri}).`, term.id));
        continue;
      }
      const bad = TERM_FORM_VIOLATION.exec(term.id);
      if (bad) {
        found.push(
          violation(
            'term-identifier',
            'error',
            `IVOA terms can only contain ASCII letters, digits, underscores, and dashes; ${term.id} has '${bad[0]}'`,
            term.id
          )
        );
      }
    }
    return found;
  },
};

const termLabel: Rule = {
  id: 'term-label',
  description: 'Every term has exactly one non-empty label',
  appliesTo: 'all',
  check(graph) {
    const found: Violation[] = [];
    for (const term of graph.terms.values()) {
      if (nonEmpty(term.labels).length === 0) {
        found.push(violation('term-label', 'error', `Term ${term.id} has no label.`, term.id));
      } else if (term.labels.length > 1) {
        found.push(
          violation('term-label', 'error', `Term ${term.id} has ${term.labels.length} labels; exactly one is required.`, term.id)
        );
      }
    }
    return found;
  },
};

const termDescription: Rule = {
  id: 'term-description',
  description: 'Every term has a definition',
  appliesTo: 'all',
  check(graph) {
    return [...graph.terms.values()]
      .filter((term) => nonEmpty(term.descriptions).length === 0)
      .map((term) => violation('term-description', 'error', `Term ${term.id} has no definition.`, term.id));
  },
};

const labelUnique: Rule = {
  id: 'label-unique',
  description: 'No two terms share a label',
  appliesTo: 'all',
  check(graph) {
    const byLabel = new Map<string, string[]>();
    for (const term of graph.terms.values()) {
      const label: string | undefined = nonEmpty(term.labels)[0];
      if (label === undefined) continue;
      byLabel.set(label, [...(byLabel.get(label) ?? []), term.id]);
    }

    const found: Violation[] = [];
    for (const [label, ids] of byLabel) {
      for (let i = 0; i < ids.length; i++) {
        for (let j = i + 1; j < ids.length; j++) {
          found.push(
            violation('label-unique', 'error', `Terms ${ids[i]} and ${ids[j]} share the label "${label}".`, ids[j])
          );
        }
      }
    }
    return found;
  },
};

const termTypePurity: Rule = {
  id: 'term-type-purity',
  description: 'Only the term type of the declared flavour is used',
  appliesTo: 'known',
  check(graph) {
    const flavour = graph.flavour;
    if (flavour === undefined) return [];
    const forbidden = new Set(TERM_TYPES.filter((t) => t !== FLAVOUR_PROPERTIES[flavour].termType));

    return graph.triples
      .filter((t) => t.predicate === 'rdf:type' && forbidden.has(t.object))
      .map((t) =>
        violation(
          'term-type-purity',
          'error',
          `${t.subject} has type ${t.object}, which is forbidden in ${flavour} vocabularies`,
          localId(graph, t.subject) ?? t.subject
        )
      );
  },
};

const termDeclared: Rule = {
  id: 'term-declared',
  description: 'Resources described like terms are declared with the term type',
  appliesTo: 'known',
  check(graph) {
    const flavour = graph.flavour;
    if (flavour === undefined) return [];

    const typed = new Set(
      graph.triples
        .filter((t) => t.predicate === 'rdf:type' && TERM_TYPES.includes(t.object))
        .map((t) => t.subject)
    );

    const reported = new Set<string>();
    const found: Violation[] = [];
    for (const triple of graph.triples) {
      const id = localId(graph, triple.subject);
      if (id === undefined || id === '' || typed.has(triple.subject) || reported.has(triple.subject)) continue;
      if (!ALL_TERM_PROPERTIES.has(triple.predicate)) continue;

      reported.add(triple.subject);
      found.push(
        violation(
          'term-declared',
          'error',
          `Term ${id} is not declared as ${FLAVOUR_PROPERTIES[flavour].termType}.`,
          id
        )
      );
    }
    return found;
  },
};

const danglingReference: Rule = {
  id: 'dangling-reference',
  description: 'Wider terms and replacement terms exist in the vocabulary',
  appliesTo: 'all',
  check(graph) {
    const found: Violation[] = [];
    for (const term of graph.terms.values()) {
      for (const target of term.wider) {
        if (!graph.terms.has(target)) {
          found.push(
            violation(
              'dangling-reference',
              'error',
              `Term ${term.id} refers to ${target} as its wider term, but the vocabulary has no such term.`,
              term.id
            )
          );
        }
      }
      for (const target of term.useInstead) {
        if (!graph.terms.has(target)) {
          found.push(
            violation(
              'dangling-reference',
              'error',
              `Term ${term.id} is to be replaced by ${target}, but the vocabulary has no such term.`,
              term.id
            )
          );
        }
      }
    }
    return found;
  },
};

const hierarchyAcyclic: Rule = {
  id: 'hierarchy-acyclic',
  description: 'The wider-term relation has no cycles',
  appliesTo: 'all',
  check(graph) {
    const state = new Map<string, 'active' | 'done'>();
    const cycles: string[][] = [];

    // Depth-first walk with an explicit stack; hierarchies can be deep
    for (const root of graph.terms.keys()) {
      if (state.has(root)) continue;
      const stack: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
      state.set(root, 'active');

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const wider = graph.terms.get(frame.id)?.wider ?? [];
        if (frame.next >= wider.length) {
          stack.pop();
          state.set(frame.id, 'done');
          continue;
        }

        const target = wider[frame.next++];
        if (!graph.terms.has(target)) continue;
        const seen = state.get(target);
        if (seen === 'active') {
          const path = stack.map((f) => f.id);
          cycles.push(path.slice(path.indexOf(target)));
        } else if (seen === undefined) {
          state.set(target, 'active');
          stack.push({ id: target, next: 0 });
        }
      }
    }

    return cycles.map((cycle) =>
      violation('hierarchy-acyclic', 'error', `Wider-term cycle: ${[...cycle, cycle[0]].join(' -> ')}.`, cycle[0])
    );
  },
};

const singleWiderTerm: Rule = {
  id: 'single-wider-term',
  description: 'Terms of RDF Class and RDF Property vocabularies have at most one wider term',
  appliesTo: [VocabularyFlavour.RdfClass, VocabularyFlavour.RdfProperty],
  check(graph) {
    return [...graph.terms.values()]
      .filter((term) => term.wider.length > 1)
      .map((term) =>
        violation(
          'single-wider-term',
          'error',
          `Terms in non-SKOS vocabularies may only have up to one wider term, but ${term.id} has ${term.wider.join(', ')}.`,
          term.id
        )
      );
  },
};

const deprecationConsistency: Rule = {
  id: 'deprecation-consistency',
  description: 'ivoasem:useInstead is only given for deprecated terms',
  appliesTo: 'all',
  check(graph) {
    return [...graph.terms.values()]
      .filter((term) => term.useInstead.length > 0 && !term.deprecated)
      .map((term) =>
        violation('deprecation-consistency', 'error', `ivoasem:useInstead given for non-deprecated term ${term.id}.`, term.id)
      );
  },
};

const cleanFlavour: Rule = {
  id: 'clean-flavour',
  description: 'Only the properties of the declared flavour are used',
  appliesTo: 'known',
  check(graph) {
    const flavour = graph.flavour;
    if (flavour === undefined) return [];
    const forbidden = FORBIDDEN_PROPERTIES[flavour];

    const found: Violation[] = [];
    for (const property of forbidden) {
      for (const t of graph.triples.filter((triple) => triple.predicate === property)) {
        found.push(
          violation(
            'clean-flavour',
            'warning',
            `Forbidden triple in ${flavour} vocabularies: ${t.subject} ${t.predicate} ${t.object}`,
            localId(graph, t.subject)
          )
        );
      }
    }
    return found;
  },
};

const suspiciousDefinition: Rule = {
  id: 'suspicious-definition',
  description: 'Definitions do not merely repeat the label or identifier',
  appliesTo: 'all',
  check(graph) {
    const found: Violation[] = [];
    for (const term of graph.terms.values()) {
      const label: string | undefined = nonEmpty(term.labels)[0];
      const definition: string | undefined = nonEmpty(term.descriptions)[0];
      if (label === undefined || definition === undefined) continue;

      const text = definition.toLowerCase();
      if (text.includes(label.toLowerCase()) || (term.id !== '' && text.includes(term.id.toLowerCase()))) {
        found.push(
          violation('suspicious-definition', 'warning', `Term ${term.id} repeats its label or fragment in its definition.`, term.id)
        );
      }
    }
    return found;
  },
};

const extraSkosProperties: Rule = {
  id: 'extra-skos-properties',
  description: 'SKOS features outside the IVOA profile are not used',
  appliesTo: [VocabularyFlavour.Skos],
  check(graph) {
    const found: Violation[] = [];
    for (const feature of EXCLUDED_SKOS_FEATURES) {
      const uses = graph.triples.filter(
        (t) => t.predicate === feature || (t.predicate === 'rdf:type' && t.object === feature)
      ).length;
      if (uses > 0) {
        found.push(
          violation(
            'extra-skos-properties',
            'warning',
            `IVOA SKOS vocabularies should not use ${feature} for now (used here ${uses} time(s)).`
          )
        );
      }
    }
    return found;
  },
};

/**
 * The checklist, in evaluation order
 */
export const RULES: readonly Rule[] = [
  flavourDeclared,
  vocabularyUri,
  vocabularyMetadata,
  termIdentifier,
  termLabel,
  termDescription,
  labelUnique,
  termTypePurity,
  termDeclared,
  danglingReference,
  hierarchyAcyclic,
  singleWiderTerm,
  deprecationConsistency,
  cleanFlavour,
  suspiciousDefinition,
  extraSkosProperties,
];

export function findRule(id: string): Rule | undefined {
  return RULES.find((rule) => rule.id === id);
}

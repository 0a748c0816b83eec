import type {
  EntityTerm,
  KnowledgeGraph,
  Term,
} from '@graphgate/shared/src/types/graph.types.js';
import type {
  ConstraintSet,
  NodeShape,
  PropertyConstraint,
} from '@graphgate/schemas/src/constraint.schema.js';
import { namedNode, parseNumericLiteral, termKey, triple } from '@graphgate/shared/src/rdf/terms.js';
import { RDF_TYPE } from '@graphgate/shared/src/rdf/vocabulary.js';

export type ConstraintKind =
  | 'minCount'
  | 'maxCount'
  | 'datatype'
  | 'nodeKind'
  | 'class'
  | 'minInclusive'
  | 'maxInclusive'
  | 'pattern'
  | 'in';

export interface ConstraintViolation {
  readonly shapeId: string;
  readonly focusNode: string;
  readonly path: string;
  readonly constraint: ConstraintKind;
  readonly message: string;
  readonly value?: string;
}

export interface ValidationReport {
  readonly conforms: boolean;
  readonly violations: readonly ConstraintViolation[];
}

export interface ValidationOptions {
  /** Restrict validation to these nodes; all shape targets otherwise. */
  readonly focusNodes?: readonly EntityTerm[];
  readonly stopOnFirstViolation?: boolean;
}

export interface ConstraintValidator {
  validate(
    graph: KnowledgeGraph,
    constraints: ConstraintSet,
    options?: ValidationOptions,
  ): ValidationReport;
}

type ValueCheck = (value: Term, graph: KnowledgeGraph) => string | null;

function valueChecks(property: PropertyConstraint): Array<[ConstraintKind, ValueCheck]> {
  const checks: Array<[ConstraintKind, ValueCheck]> = [];
  const { datatype, nodeKind, pattern, minInclusive, maxInclusive } = property;
  const targetClass = property.class;
  const allowed = property.in;

  if (datatype !== undefined) {
    checks.push([
      'datatype',
      (value) =>
        value.kind === 'literal' && value.datatype === datatype
          ? null
          : `expected datatype ${datatype}`,
    ]);
  }
  if (nodeKind !== undefined) {
    checks.push([
      'nodeKind',
      (value) => {
        const ok = nodeKind === 'IRI' ? value.kind === 'iri' : value.kind === 'literal';
        return ok ? null : `expected node kind ${nodeKind}`;
      },
    ]);
  }
  if (targetClass !== undefined) {
    checks.push([
      'class',
      (value, graph) => {
        if (value.kind === 'literal') return `expected an instance of ${targetClass}`;
        return graph.has(triple(value, RDF_TYPE, targetClass))
          ? null
          : `expected an instance of ${targetClass}`;
      },
    ]);
  }
  if (minInclusive !== undefined) {
    checks.push([
      'minInclusive',
      (value) => {
        const n = parseNumericLiteral(value);
        return n !== undefined && n >= minInclusive ? null : `expected a number >= ${String(minInclusive)}`;
      },
    ]);
  }
  if (maxInclusive !== undefined) {
    checks.push([
      'maxInclusive',
      (value) => {
        const n = parseNumericLiteral(value);
        return n !== undefined && n <= maxInclusive ? null : `expected a number <= ${String(maxInclusive)}`;
      },
    ]);
  }
  if (pattern !== undefined) {
    const regex = new RegExp(pattern, 'u');
    checks.push(['pattern', (value) => (regex.test(value.value) ? null : `expected to match /${pattern}/`)]);
  }
  if (allowed !== undefined) {
    checks.push([
      'in',
      (value) => (allowed.includes(value.value) ? null : `expected one of ${allowed.join(', ')}`),
    ]);
  }

  return checks;
}

function shapeTargets(
  graph: KnowledgeGraph,
  shape: NodeShape,
  focusNodes: readonly EntityTerm[] | undefined,
): readonly EntityTerm[] {
  if (!focusNodes) {
    return graph.subjectsOfType(shape.targetClass);
  }
  const type = namedNode(RDF_TYPE);
  const targetClass = namedNode(shape.targetClass);
  return focusNodes.filter((node) => graph.has({ subject: node, predicate: type, object: targetClass }));
}

/**
 * Validates node shapes keyed by target class. Every constraint only looks
 * at the focus node's own property values, so checking the nodes touched by
 * an addition is enough to validate that addition.
 */
export function createShapeValidator(): ConstraintValidator {
  return {
    validate(
      graph: KnowledgeGraph,
      constraints: ConstraintSet,
      options: ValidationOptions = {},
    ): ValidationReport {
      const violations: ConstraintViolation[] = [];
      const stopEarly = options.stopOnFirstViolation ?? false;
      const seenFocus = new Set<string>();

      for (const shape of constraints.shapes) {
        for (const focus of shapeTargets(graph, shape, options.focusNodes)) {
          const focusKey = `${shape.id} ${termKey(focus)}`;
          if (seenFocus.has(focusKey)) continue;
          seenFocus.add(focusKey);

          for (const property of shape.properties) {
            const checks = valueChecks(property);
            const values = graph.objects(focus, namedNode(property.path));
            const report = (constraint: ConstraintKind, message: string, value?: Term): void => {
              violations.push({
                shapeId: shape.id,
                focusNode: focus.value,
                path: property.path,
                constraint,
                message,
                value: value?.value,
              });
            };

            if (property.minCount !== undefined && values.length < property.minCount) {
              report('minCount', `expected at least ${String(property.minCount)} value(s), found ${String(values.length)}`);
            }
            if (property.maxCount !== undefined && values.length > property.maxCount) {
              report('maxCount', `expected at most ${String(property.maxCount)} value(s), found ${String(values.length)}`);
            }
            if (stopEarly && violations.length > 0) {
              return { conforms: false, violations };
            }

            for (const value of values) {
              for (const [kind, check] of checks) {
                const failure = check(value, graph);
                if (failure === null) continue;
                report(kind, failure, value);
                if (stopEarly) {
                  return { conforms: false, violations };
                }
              }
            }
          }
        }
      }

      return { conforms: violations.length === 0, violations };
    },
  };
}

import type { EntityTerm, RetrievedFact, Term } from '@graphgate/shared/src/types/graph.types.js';
import type { RetrievalConfig } from '@graphgate/schemas/src/oracle-config.schema.js';
import { extractLabel, localName, namedNode, parseNumericLiteral, termKey } from '@graphgate/shared/src/rdf/terms.js';

/** Hop tag for attribute facts of related entities; outside any BFS hop range. */
export const RELATED_ENTITY_HOP = -1;

export const EMPTY_CONTEXT = 'No relevant graph context found.';

export type FormatterConfig = Pick<
  RetrievalConfig,
  | 'rootLabel'
  | 'descriptionPredicate'
  | 'maxDescriptionLength'
  | 'categories'
  | 'numericKeywords'
  | 'unitScales'
  | 'largeNumberThreshold'
>;

interface SubjectGroup {
  readonly subject: EntityTerm;
  readonly facts: RetrievedFact[];
}

function groupBySubject(facts: readonly RetrievedFact[]): Map<string, SubjectGroup> {
  const groups = new Map<string, SubjectGroup>();
  for (const fact of facts) {
    const key = termKey(fact.triple.subject);
    const group = groups.get(key);
    if (group) {
      group.facts.push(fact);
    } else {
      groups.set(key, { subject: fact.triple.subject, facts: [fact] });
    }
  }
  return groups;
}

function displayName(term: Term): string {
  return term.kind === 'literal' ? term.value : extractLabel(term.value);
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function formatValue(relation: string, object: Term, config: FormatterConfig): string {
  const relationLower = relation.toLowerCase();
  const numeric = config.numericKeywords.some((k) => relationLower.includes(k.toLowerCase()));
  if (!numeric) {
    return displayName(object);
  }

  const value = parseNumericLiteral(object);
  if (value === undefined) {
    return displayName(object);
  }

  const scale = config.unitScales.find(
    (s) => relationLower.includes(s.keyword.toLowerCase()) && value > s.threshold,
  );
  if (scale) {
    return `${(value / scale.divisor).toFixed(scale.fractionDigits)} ${scale.unit}`;
  }
  return value > config.largeNumberThreshold ? value.toFixed(0) : String(value);
}

function formatFact(fact: RetrievedFact, config: FormatterConfig): string {
  const relation = localName(fact.triple.predicate.value);
  return `  - ${relation}: ${formatValue(relation, fact.triple.object, config)}`;
}

function formatCategories(facts: readonly RetrievedFact[], config: FormatterConfig): string[] {
  const buckets: Array<{ name: string; keywords: string[]; facts: RetrievedFact[] }> =
    config.categories.map((category) => ({
      name: category.name,
      keywords: category.keywords.map((k) => k.toLowerCase()),
      facts: [],
    }));
  const other: RetrievedFact[] = [];

  for (const fact of facts) {
    const relation = localName(fact.triple.predicate.value).toLowerCase();
    const bucket = buckets.find((b) => b.keywords.some((k) => relation.includes(k)));
    (bucket ? bucket.facts : other).push(fact);
  }

  const lines: string[] = [];
  for (const { name, facts: bucketFacts } of [...buckets, { name: 'Other', facts: other }]) {
    if (bucketFacts.length === 0) continue;
    lines.push(`\n### ${name}:`);
    lines.push(...bucketFacts.map((f) => formatFact(f, config)));
  }
  return lines;
}

/**
 * Renders retrieved facts as prompt context: an optional summary of the
 * anchor, the core facts per subject (anchor first) grouped by category,
 * and the related-entity facts in their own section.
 */
export function formatContext(
  facts: readonly RetrievedFact[],
  anchor: string | null,
  config: FormatterConfig,
): string {
  if (facts.length === 0) {
    return EMPTY_CONTEXT;
  }

  const rootHeading = config.rootLabel.toUpperCase();
  const isDescription = (fact: RetrievedFact): boolean =>
    localName(fact.triple.predicate.value) === config.descriptionPredicate;

  const core = groupBySubject(facts.filter((f) => f.hop !== RELATED_ENTITY_HOP));
  const related = groupBySubject(facts.filter((f) => f.hop === RELATED_ENTITY_HOP));
  const anchorKey = anchor === null ? null : termKey(namedNode(anchor));

  const parts: string[] = [];

  const anchorGroup = anchorKey === null ? undefined : core.get(anchorKey);
  const descriptions = anchorGroup ? anchorGroup.facts.filter(isDescription) : [];
  if (descriptions.length > 0) {
    parts.push(`=== ${rootHeading} SUMMARY ===`);
    for (const description of descriptions) {
      parts.push(truncate(description.triple.object.value, config.maxDescriptionLength));
    }
    parts.push('');
  }

  parts.push('=== STRUCTURED FACTS ===');

  const subjectKeys = [...core.keys()].filter((k) => k !== anchorKey).sort();
  if (anchorGroup && anchorKey !== null) {
    subjectKeys.unshift(anchorKey);
  }

  for (const key of subjectKeys) {
    const group = core.get(key);
    if (!group) continue;
    const name = extractLabel(group.subject.value);
    parts.push(key === anchorKey ? `\n## Main ${config.rootLabel}: ${name}` : `\n## ${name}`);
    parts.push(...formatCategories(group.facts.filter((f) => !isDescription(f)), config));
  }

  if (related.size > 0) {
    parts.push('', `=== RELATED ${rootHeading}S ===`);
    for (const group of related.values()) {
      parts.push(`\n## ${extractLabel(group.subject.value)}`);
      parts.push(...group.facts.map((f) => formatFact(f, config)));
    }
  }

  return parts.join('\n');
}

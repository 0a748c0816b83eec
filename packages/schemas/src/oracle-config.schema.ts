import { z } from 'zod';
import { RDFS_LABEL } from '@graphgate/shared/src/rdf/vocabulary.js';

const UnitScaleSchema = z.object({
  keyword: z.string().min(1),
  threshold: z.number(),
  divisor: z.number().positive(),
  unit: z.string(),
  fractionDigits: z.number().int().min(0).max(6).default(1),
});

export const FactCategorySchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

export const RetrievalConfigSchema = z.object({
  rootType: z.string().url(),
  rootLabel: z.string().min(1).default('Entity'),
  labelPredicate: z.string().url().default(RDFS_LABEL),
  maxHops: z.number().int().min(0).default(3),
  minTriples: z.number().int().min(0).default(5),
  maxAlternateAnchors: z.number().int().min(0).default(2),
  anchorNouns: z.array(z.string().min(1)).default(['River', 'Creek', 'Stream']),
  relationshipPredicates: z
    .array(z.string().min(1))
    .default(['hasTributary', 'flowsInto', 'hasSource', 'hasMouth']),
  relatedAttributePredicates: z
    .array(z.string().min(1))
    .default([
      'length',
      'discharge',
      'sourceElevation',
      'mouthElevation',
      'traverses',
      'hasMouth',
      'hasSource',
      'riverName',
    ]),
  descriptionPredicate: z.string().min(1).default('abstractText'),
  maxDescriptionLength: z.number().int().positive().default(500),
  categories: z.array(FactCategorySchema).default([
    { name: 'Physical Attributes', keywords: ['length', 'discharge', 'elevation'] },
    { name: 'Geography', keywords: ['traverses', 'inCountry', 'inCounty'] },
    {
      name: 'Relationships',
      keywords: ['hasTributary', 'flowsInto', 'hasSource', 'hasMouth', 'partOfSystem'],
    },
  ]),
  numericKeywords: z.array(z.string().min(1)).default(['length', 'discharge', 'elevation']),
  unitScales: z
    .array(UnitScaleSchema)
    .default([{ keyword: 'length', threshold: 1000, divisor: 1000, unit: 'km', fractionDigits: 1 }]),
  largeNumberThreshold: z.number().default(1000),
});

export const OracleConfigSchema = z.object({
  $schema: z.string().optional(),
  graphPath: z.string().min(1),
  constraintsPath: z.string().min(1).optional(),
  audit: z
    .object({
      mode: z.enum(['membership', 'conformance']).default('membership'),
    })
    .default({}),
  linking: z
    .object({
      fuzzyThreshold: z.number().min(0).max(1).default(0.85),
    })
    .default({}),
  retrieval: RetrievalConfigSchema,
  evaluation: z
    .object({
      negationMarker: z.string().min(1).default('DOES NOT'),
    })
    .default({}),
});

export type OracleConfig = z.infer<typeof OracleConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type RetrievalConfigInput = z.input<typeof RetrievalConfigSchema>;
export type FactCategory = z.infer<typeof FactCategorySchema>;
export type UnitScale = z.infer<typeof UnitScaleSchema>;
export type AuditMode = OracleConfig['audit']['mode'];

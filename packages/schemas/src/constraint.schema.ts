import { z } from 'zod';

export const PropertyConstraintSchema = z
  .object({
    path: z.string().url(),
    minCount: z.number().int().min(0).optional(),
    maxCount: z.number().int().min(0).optional(),
    datatype: z.string().url().optional(),
    nodeKind: z.enum(['IRI', 'Literal']).optional(),
    class: z.string().url().optional(),
    minInclusive: z.number().optional(),
    maxInclusive: z.number().optional(),
    pattern: z.string().optional(),
    in: z.array(z.string()).min(1).optional(),
  })
  .refine((c) => c.minCount === undefined || c.maxCount === undefined || c.minCount <= c.maxCount, {
    message: 'minCount must not exceed maxCount',
  });

export const NodeShapeSchema = z.object({
  id: z.string().min(1),
  targetClass: z.string().url(),
  properties: z.array(PropertyConstraintSchema).min(1),
});

export const ConstraintSetSchema = z.object({
  $schema: z.string().optional(),
  name: z.string().min(1).optional(),
  shapes: z.array(NodeShapeSchema),
});

export type PropertyConstraint = z.infer<typeof PropertyConstraintSchema>;
export type NodeShape = z.infer<typeof NodeShapeSchema>;
export type ConstraintSet = z.infer<typeof ConstraintSetSchema>;

/**
 * Rule table schema.
 * The classifier's whole vocabulary lives in this declarative document so it
 * can change without a deploy.
 */

import { z } from 'zod';

export const CategoryRoleSchema = z.enum([
  'aggregation',
  'join',
  'realtime',
  'temporal',
  'status',
  'analytical',
]);

const PatternSchema = z.object({
  source: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed').default('i'),
});

export const CategorySchema = z
  .object({
    name: z.string().min(1),
    /** Backend that owns questions about this category. */
    backend: z.string().optional(),
    /** Query type reported when this category decides the classification. */
    queryType: z.string().optional(),
    /** Lower wins when several owning categories match. */
    priority: z.number().int().default(100),
    role: CategoryRoleSchema.optional(),
    terms: z.array(z.string().min(1)).default([]),
    patterns: z.array(PatternSchema).default([]),
    /** Upper-case pattern matches (project codes). */
    uppercase: z.boolean().default(false),
    /** Prompt hints included when this category matches. */
    hints: z.array(z.string()).default([]),
  })
  .refine((c) => c.terms.length > 0 || c.patterns.length > 0, {
    message: 'a category needs at least one term or pattern',
  })
  .refine((c) => c.backend === undefined || c.queryType !== undefined, {
    message: 'an owning category must declare its queryType',
  });

export const FormulaSchema = z.object({
  id: z.string().min(1),
  triggers: z.array(z.string().min(1)).min(1),
  hint: z.string().min(1),
});

export const BackendSchema = z.object({
  description: z.string(),
  /** Routing guidance shown to the general backend. */
  guidance: z.array(z.string()).default([]),
});

export const RuleTableSchema = z
  .object({
    version: z.string().min(1),
    defaultBackend: z.string().min(1),
    backends: z.record(z.string(), BackendSchema),
    categories: z.array(CategorySchema).min(1),
    formulas: z.array(FormulaSchema).default([]),
  })
  .superRefine((table, ctx) => {
    if (!(table.defaultBackend in table.backends)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaultBackend'],
        message: `unknown backend "${table.defaultBackend}"`,
      });
    }
    const seen = new Set<string>();
    table.categories.forEach((c, i) => {
      if (seen.has(c.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories', i, 'name'],
          message: `duplicate category "${c.name}"`,
        });
      }
      seen.add(c.name);
      if (c.backend !== undefined && !(c.backend in table.backends)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories', i, 'backend'],
          message: `unknown backend "${c.backend}"`,
        });
      }
      c.patterns.forEach((p, j) => {
        try {
          new RegExp(p.source, p.flags);
        } catch (err) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['categories', i, 'patterns', j, 'source'],
            message: err instanceof Error ? err.message : 'invalid pattern',
          });
        }
      });
    });
  });

export type CategoryRole = z.infer<typeof CategoryRoleSchema>;
export type CategoryRule = z.infer<typeof CategorySchema>;
export type FormulaRule = z.infer<typeof FormulaSchema>;
export type RuleTable = z.infer<typeof RuleTableSchema>;
export type RuleTableInput = z.input<typeof RuleTableSchema>;

import { z } from "zod";

export const CharSpan = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .refine((span) => span.start <= span.end, { message: "Span must not end before it starts" });

export const Unit = z.object({
  index: z.number().int().nonnegative(),
  span: CharSpan,
});

export const Nuclearity = z.enum(["Nucleus", "Satellite"]);

/**
 * Dependency tree as supplied by a corpus reader.
 *
 * Node-indexed arrays (`heads`, `labels`, ...) have one entry per unit plus
 * one for the fake root at index 0.
 */
export const DependencyTreeInput = z
  .object({
    id: z.string().min(1).optional(),
    units: z.array(Unit),
    heads: z.array(z.number().int().min(-1)).min(1),
    labels: z.array(z.string().min(1).nullable()),
    nuclearity: z.array(Nuclearity.nullable()).optional(),
    ranks: z.array(z.number().int().nonnegative()).optional(),
    sentences: z.array(z.number().int().nullable()).optional(),
    idx: z.array(z.number().int().min(-1)).optional(),
  })
  .superRefine((tree, ctx) => {
    const expected = tree.heads.length;
    const parallel = {
      labels: tree.labels,
      nuclearity: tree.nuclearity,
      ranks: tree.ranks,
      sentences: tree.sentences,
      idx: tree.idx,
    };
    for (const [key, values] of Object.entries(parallel)) {
      if (values !== undefined && values.length !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Expected ${expected} entries (one per node), received ${values.length}`,
        });
      }
    }
    if (tree.idx === undefined && tree.units.length !== expected - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["units"],
        message: `Expected ${expected - 1} units, received ${tree.units.length}`,
      });
    }
  });

export type DependencyTreeInputT = z.infer<typeof DependencyTreeInput>;
export type UnitT = z.infer<typeof Unit>;
export type CharSpanT = z.infer<typeof CharSpan>;

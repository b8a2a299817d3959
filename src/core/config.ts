import { z } from "zod";

// =============================================================================
// POLICY
// =============================================================================

export const FileCategorySchema = z.enum(["protected", "generated", "ordinary"]);
export type FileCategory = z.infer<typeof FileCategorySchema>;

export const ResolutionStrategySchema = z.enum(["FORCE_LOCAL", "REGENERATE", "MANUAL"]);
export type ResolutionStrategy = z.infer<typeof ResolutionStrategySchema>;

export const ArtifactConfigSchema = z
  .object({
    target: z.string().min(1),
    source: z.string().min(1),
    marker: z.string().min(1).default("<!DOCTYPE"),
    marker_files: z.string().min(1).default("**/*.html"),
    min_files: z.number().int().nonnegative().default(1),
    max_files: z.number().int().positive().default(20_000),
  })
  .refine((artifact) => artifact.min_files <= artifact.max_files, {
    message: "min_files must not exceed max_files",
  });
export type ArtifactConfig = z.infer<typeof ArtifactConfigSchema>;

export const PolicyEntrySchema = z
  .object({
    pattern: z.string().min(1),
    category: FileCategorySchema,
    strategy: ResolutionStrategySchema,
    artifact: ArtifactConfigSchema.optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.strategy === "REGENERATE" && !entry.artifact) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `REGENERATE entry "${entry.pattern}" needs an artifact block`,
        path: ["artifact"],
      });
    }
  });
export type PolicyEntry = z.infer<typeof PolicyEntrySchema>;

// =============================================================================
// DRIFT
// =============================================================================

export const DriftRuleConfigSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).default(""),
});
export type DriftRuleConfig = z.infer<typeof DriftRuleConfigSchema>;

export const DriftConfigSchema = z.object({
  gating_paths: z.array(z.string().min(1)).default([]),
  watched_paths: z.array(z.string().min(1)).default([]),
  include: z.array(z.string().min(1)).default(["**/*"]),
  rules: z.array(DriftRuleConfigSchema).optional(),
});
export type DriftConfig = z.infer<typeof DriftConfigSchema>;

// =============================================================================
// PROJECT CONFIG
// =============================================================================

export const ProjectConfigSchema = z.object({
  repo: z
    .object({
      main_branch: z.string().min(1).default("main"),
    })
    .default({}),
  upstream: z
    .object({
      remote: z.string().min(1).default("upstream"),
      url: z.string().min(1).optional(),
      branch: z.string().min(1).default("main"),
    })
    .default({}),
  sync: z
    .object({
      branch_prefix: z
        .string()
        .min(1)
        .regex(/^[A-Za-z0-9._/-]+$/)
        .default("fork-sync"),
      promote: z.boolean().default(true),
      commit_message: z.string().min(1).optional(),
    })
    .default({}),
  policy: z.array(PolicyEntrySchema).default([]),
  drift: DriftConfigSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

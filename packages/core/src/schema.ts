import { z } from "zod";

import { isValidPattern } from "./matcher.js";
import { OTHER_GROUP } from "./types.js";

/**
 * Zod schema for rule files
 */

/**
 * Zod schema for a regular expression that compiles
 */
const regexPatternSchema = z.string().superRefine((pattern, ctx) => {
  const result = isValidPattern(pattern);
  if (!result.valid) {
    ctx.addIssue({
      code: "custom",
      message: `Invalid regular expression: "${pattern}" - ${result.error}`,
    });
  }
});

/** Non-empty literal; an empty prefix or name would match everything or nothing */
const literalSchema = z.string().min(1, "must not be empty");

// =============================================================================
// Sections
// =============================================================================

/** Paths that never influence restart decisions */
const ignorePathsSchema = z
  .object({
    by_prefix: z.array(literalSchema).default([]),
  })
  .strict();

/** Units that are suppressed entirely. Regex only. */
const catchallUnitsSchema = z
  .object({
    by_regex: z.array(regexPatternSchema).default([]),
  })
  .strict();

const groupNameSchema = literalSchema.refine((name) => name !== OTHER_GROUP, {
  message: `"${OTHER_GROUP}" is reserved for units no group matches`,
});

/** A named risk group */
const groupServicesSchema = z
  .object({
    group: groupNameSchema,
    by_full: z.array(literalSchema).default([]),
    by_regex: z.array(regexPatternSchema).default([]),
  })
  .strict();

// =============================================================================
// Rule File
// =============================================================================

export const rulesSchema = z
  .object({
    ignore_paths: ignorePathsSchema,
    catchall_units: catchallUnitsSchema,
    group_services: z.array(groupServicesSchema),
  })
  .strict()
  .superRefine((rules, ctx) => {
    const seen = new Set<string>();
    rules.group_services.forEach((group, index) => {
      if (seen.has(group.group)) {
        ctx.addIssue({
          code: "custom",
          path: ["group_services", index, "group"],
          message: `Duplicate group name "${group.group}"`,
        });
      }
      seen.add(group.group);
    });
  });

export type RulesDocument = z.infer<typeof rulesSchema>;
export type GroupServicesEntry = RulesDocument["group_services"][number];

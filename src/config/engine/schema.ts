/**
 * Engine configuration schema.
 *
 * These are the options a caller passes to the traversal planner. The
 * alternate reading paths a handbook suggests ("under a week", "two to four
 * weeks") are just different instances of this config: nothing about them is
 * built in.
 *
 * The config is validated once per run and then treated as read-only, so
 * the same events + config always produce the same study plan.
 */

import { z } from "zod";

const NodeIdSchema = z.string().min(1, "Node ID must not be empty");

export const EngineConfigSchema = z
  .object({
    /** Total effort units available (e.g. days, hours). */
    budget: z
      .number()
      .positive("Budget must be positive")
      .finite()
      .describe("Total effort units available for the study plan"),

    /** Per-node effort overrides; every other node costs `defaultEffort`. */
    effortOverrides: z
      .record(NodeIdSchema, z.number().positive("Effort must be positive").finite())
      .default({})
      .describe("Effort cost per node ID"),

    /** Per-node priority; higher is scheduled earlier when eligible. */
    priorityOverrides: z
      .record(NodeIdSchema, z.number().finite())
      .default({})
      .describe("Scheduling priority per node ID (default 0)"),

    /** Cost of a node without an effort override. */
    defaultEffort: z
      .number()
      .positive("Default effort must be positive")
      .finite()
      .default(1)
      .describe("Effort cost of nodes without an override"),

    /**
     * Restrict the plan to these nodes, their descendants and everything
     * they transitively require. Omit to plan the whole handbook.
     */
    targets: z
      .array(NodeIdSchema)
      .min(1, "Targets must list at least one node when given")
      .optional()
      .describe("Node IDs the plan should reach"),
  })
  .strict();

/** Validated engine configuration (defaults applied). */
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Engine configuration as a caller writes it (defaults optional). */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

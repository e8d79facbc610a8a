import { z } from "zod";

import {
  ERROR_STRATEGIES,
  type ErrorStrategy,
  RECONCILE_FAILURE_POLICIES,
  type ReconcileFailurePolicy,
} from "../../commands/run/types.js";

export const errorStrategySchema = z.enum(ERROR_STRATEGIES);
export const reconcileFailurePolicySchema = z.enum(RECONCILE_FAILURE_POLICIES);

export interface RunSettings {
  revset: string;
  errStrategy: ErrorStrategy;
  reconciliation: {
    onFailure: ReconcileFailurePolicy;
  };
}

export const runSettingsSchema = z
  .object({
    revset: z.string().trim().min(1, "revset must not be empty").optional(),
    errStrategy: errorStrategySchema.optional(),
    reconciliation: z
      .object({
        onFailure: reconcileFailurePolicySchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RunSettingsDocument = z.infer<typeof runSettingsSchema>;

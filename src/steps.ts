import type { ProvisionError } from './errors.js';

export type StepOutcome = { ok: true; detail?: string } | { ok: false; error: ProvisionError };

export type Step = {
  id: string;
  description: string;
  // What the step would do, one line each; printed in dry-run mode.
  preview: readonly string[];
  // Must not have side effects. Omitted for steps that are safe to repeat.
  isApplied?: () => Promise<boolean>;
  apply: () => Promise<StepOutcome>;
};

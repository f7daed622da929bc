import { ProvisionError, describeCause } from './errors.js';
import type { Logger } from './logger.js';
import type { Step } from './steps.js';
import type { ExecutionMode } from './types.js';

export type RunReport = {
  mode: ExecutionMode;
  simulated: string[];
  succeeded: string[];
  skipped: string[];
  failed?: { step: string; error: ProvisionError };
};

function asStepError(step: Step, err: unknown): ProvisionError {
  if (err instanceof ProvisionError) return err;
  return new ProvisionError('STEP_APPLY_FAILED', `Step '${step.id}' failed: ${describeCause(err)}`, {
    subject: step.id,
    cause: err
  });
}

function simulate(step: Step, logger: Logger): void {
  logger.info({ step: step.id }, `dryrun: ${step.description}`);
  for (const line of step.preview) {
    logger.info({ step: step.id }, `dryrun: ${line}`);
  }
}

/**
 * Walks the planned steps in order. The mode only decides what happens at the point
 * of mutation; the first failure in execute mode ends the run.
 */
export async function runSteps(steps: readonly Step[], mode: ExecutionMode, opts: { logger: Logger }): Promise<RunReport> {
  const { logger } = opts;
  const report: RunReport = { mode, simulated: [], succeeded: [], skipped: [] };

  for (const step of steps) {
    if (mode === 'simulate') {
      simulate(step, logger);
      report.simulated.push(step.id);
      continue;
    }

    try {
      if (step.isApplied && (await step.isApplied())) {
        logger.info({ step: step.id }, `${step.id} already applied, skipping`);
        report.skipped.push(step.id);
        continue;
      }

      logger.debug({ step: step.id }, step.description);
      const outcome = await step.apply();
      if (!outcome.ok) {
        report.failed = { step: step.id, error: outcome.error };
        break;
      }

      logger.info({ step: step.id }, outcome.detail ?? `done: ${step.id}`);
      report.succeeded.push(step.id);
    } catch (err: unknown) {
      report.failed = { step: step.id, error: asStepError(step, err) };
      break;
    }
  }

  return report;
}

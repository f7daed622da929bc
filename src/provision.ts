import type { ProvisionConfig } from './config.js';
import { createDb, type Db } from './db.js';
import { loadEnvironment } from './environment.js';
import { ProvisionError, describeCause } from './errors.js';
import { runSteps, type RunReport } from './executor.js';
import type { Logger } from './logger.js';
import { bannerLines, detectPostgresVersion, TUTORIAL_URL } from './banner.js';
import { planSteps } from './planner.js';
import { checkPreconditions } from './preconditions.js';
import { runCommand, type CommandRunner } from './process.js';
import { createRegistrationClient, type ClusterRegistrationClient } from './registration.js';
import type { EnvironmentContext, ExecutionMode, NodeRole } from './types.js';

export type ExitCode = 0 | 1;

export type ProvisionDeps = {
  config: ProvisionConfig;
  env: NodeJS.ProcessEnv;
  logger: Logger;
  confirm: (prompt: string) => Promise<boolean>;
  runner?: CommandRunner;
  createDb?: (ctx: EnvironmentContext) => Db;
  createRegistrationClient?: (ctx: EnvironmentContext, runner: CommandRunner) => ClusterRegistrationClient;
  now?: () => Date;
};

export type ProvisionOutcome = {
  exitCode: ExitCode;
  report?: RunReport;
  error?: ProvisionError;
};

function logFailure(logger: Logger, error: ProvisionError): void {
  logger.error({ code: error.code, subject: error.subject }, error.message);
  if (error.code === 'MISSING_VARIABLE' || error.code === 'MISSING_EXECUTABLE') {
    logger.error('Please ensure you have completed the dependencies installation step before running this. Refer to:');
    logger.error(`  ${TUTORIAL_URL}`);
  }
}

function defaultRegistrationClient(env: NodeJS.ProcessEnv) {
  return (ctx: EnvironmentContext, runner: CommandRunner): ClusterRegistrationClient =>
    createRegistrationClient({
      runner,
      su: ctx.executables.su,
      repmgr: ctx.executables.repmgr,
      serviceAccount: ctx.serviceAccount,
      env
    });
}

/**
 * One full run for a role: load and validate the environment, confirm with the operator,
 * gate on preconditions, then walk the planned steps in the requested mode.
 */
export async function provision(role: NodeRole, mode: ExecutionMode, deps: ProvisionDeps): Promise<ProvisionOutcome> {
  const { config, logger } = deps;
  const runner = deps.runner ?? runCommand;

  let ctx: EnvironmentContext;
  try {
    ctx = loadEnvironment(role, deps.env, config, deps.now?.() ?? new Date());
  } catch (err: unknown) {
    if (!(err instanceof ProvisionError)) throw err;
    logFailure(logger, err);
    return { exitCode: 1, error: err };
  }

  // Informational only; repmgr itself validates the server version when it runs.
  const version = await detectPostgresVersion(ctx, runner, config.COMMAND_TIMEOUT_MS);
  if (!version.ok) {
    logger.warn(`Could not detect PostgreSQL version: ${version.error}`);
  }

  for (const line of bannerLines(ctx, mode, version.ok ? version.version : undefined)) {
    logger.info(line);
  }

  const question = role === 'replica' ? 'This is for a REPLICA. Continue?' : 'This is for a PRIMARY. Continue?';
  if (!(await deps.confirm(question))) {
    logger.info('Exiting...');
    return { exitCode: 0 };
  }

  const gate = await checkPreconditions(ctx);
  if (!gate.ok) {
    logFailure(logger, gate.error);
    return { exitCode: 1, error: gate.error };
  }
  logger.info(`Found PostgreSQL data directory at '${ctx.paths.dataDirectory}'`);
  logger.info(`Found PostgreSQL configuration file at '${ctx.paths.configFilePath}'`);

  const db = (deps.createDb ?? ((c: EnvironmentContext) => createDb(c.connection)))(ctx);
  let report: RunReport;
  try {
    const registration = (deps.createRegistrationClient ?? defaultRegistrationClient(deps.env))(ctx, runner);
    const steps = planSteps(ctx, { db, registration, runner, commandTimeoutMs: config.COMMAND_TIMEOUT_MS });
    report = await runSteps(steps, mode, { logger });
  } finally {
    try {
      await db.close();
    } catch (err: unknown) {
      logger.warn(`Failed to close database connection: ${describeCause(err)}`);
    }
  }

  if (report.failed) {
    logFailure(logger, report.failed.error);
    logger.error(
      `Stopped at step '${report.failed.step}'. Completed steps are left in place; fix the cause and re-run.`
    );
    return { exitCode: 1, report, error: report.failed.error };
  }

  if (mode === 'simulate') {
    logger.warn('Configuration complete in --dry-run mode. No changes were made');
    logger.warn('To apply changes, run without the --dry-run flag');
  } else {
    logger.info('Configuration complete');
    logger.info('Please re-deploy your Postgres service at:');
    logger.info(`  ${ctx.identity.serviceUrl}`);
    logger.info('for changes to take effect.');
  }

  return { exitCode: 0, report };
}

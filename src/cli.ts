import { Command } from 'commander';

import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { confirmOnTerminal } from './prompt.js';
import { provision, type ExitCode, type ProvisionDeps } from './provision.js';
import type { ExecutionMode, NodeRole } from './types.js';

export type CliOptions = {
  dryRun?: boolean;
  yes?: boolean;
};

type CliDeps = Partial<Pick<ProvisionDeps, 'runner' | 'createDb' | 'createRegistrationClient' | 'now'>> & {
  env?: NodeJS.ProcessEnv;
  confirm?: ProvisionDeps['confirm'];
  logger?: ProvisionDeps['logger'];
};

const DESCRIPTIONS: Record<NodeRole, string> = {
  primary: 'Configure this PostgreSQL service as the replication PRIMARY (repmgr node 1) and register it',
  replica: 'Configure this PostgreSQL service as a REPLICA (repmgr node 2) and clone it from the primary'
};

function modeOf(opts: CliOptions): ExecutionMode {
  return opts.dryRun ? 'simulate' : 'execute';
}

export async function runRole(role: NodeRole, opts: CliOptions, deps: CliDeps = {}): Promise<ExitCode> {
  const env = deps.env ?? process.env;
  const config = loadConfig(env);
  const logger = deps.logger ?? createLogger(config);
  const confirm = opts.yes ? async () => true : (deps.confirm ?? ((q: string) => confirmOnTerminal(q)));

  const outcome = await provision(role, modeOf(opts), {
    config,
    env,
    logger,
    confirm,
    runner: deps.runner,
    createDb: deps.createDb,
    createRegistrationClient: deps.createRegistrationClient,
    now: deps.now
  });
  return outcome.exitCode;
}

function withRoleOptions(cmd: Command): Command {
  return cmd
    .option('--dry-run', 'List the changes that would be applied without making any')
    .option('-y, --yes', 'Do not ask for confirmation');
}

/** Program for a single-role entry point (`configure-primary`, `configure-replica`). */
export function buildRoleProgram(role: NodeRole, onExit: (code: ExitCode) => void, deps: CliDeps = {}): Command {
  return withRoleOptions(new Command(`configure-${role}`))
    .description(DESCRIPTIONS[role])
    .action(async (opts: CliOptions) => {
      onExit(await runRole(role, opts, deps));
    });
}

/** Combined program: `replication-provision primary|replica`. */
export function buildProgram(onExit: (code: ExitCode) => void, deps: CliDeps = {}): Command {
  const program = new Command('replication-provision').description(
    'Provision a two-node PostgreSQL replication cluster managed by repmgr'
  );

  for (const role of ['primary', 'replica'] as const) {
    withRoleOptions(program.command(role))
      .description(DESCRIPTIONS[role])
      .action(async (opts: CliOptions) => {
        onExit(await runRole(role, opts, deps));
      });
  }

  return program;
}

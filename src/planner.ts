import fs from 'node:fs/promises';
import { escapeIdentifier, escapeLiteral } from 'pg';

import type { Db } from './db.js';
import { maskSecret } from './environment.js';
import { ProvisionError } from './errors.js';
import { databaseExists, directoryExists, roleExists } from './guards.js';
import { includeDirective } from './preconditions.js';
import type { CommandRunner } from './process.js';
import {
  COORDINATOR_DATABASE,
  COORDINATOR_USER,
  asServiceAccount,
  cloneFromPrimaryCommand,
  registerPrimaryCommand,
  type ClusterRegistrationClient
} from './registration.js';
import type { Step, StepOutcome } from './steps.js';
import type { EnvironmentContext, NodeRole, PrimaryContext, RegistrationConfig, ReplicaContext } from './types.js';

export type PlannerDeps = {
  db: Db;
  registration: ClusterRegistrationClient;
  runner: CommandRunner;
  commandTimeoutMs: number;
};

export const REPLICATION_SETTINGS: ReadonlyArray<readonly [string, string]> = [
  ['max_wal_senders', '10'],
  ['max_replication_slots', '10'],
  ['wal_level', 'replica'],
  ['wal_log_hints', 'on'],
  ['hot_standby', 'on'],
  ['archive_mode', 'on'],
  ['archive_command', "'/bin/true'"]
];

const NODE_IDENTITY: Record<NodeRole, { nodeId: number; nodeName: string }> = {
  primary: { nodeId: 1, nodeName: 'node1' },
  replica: { nodeId: 2, nodeName: 'node2' }
};

const SEARCH_PATH = [COORDINATOR_USER, 'railway', 'public'];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTimestamp(d: Date): string {
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

export function replicationConfigText(): string {
  return REPLICATION_SETTINGS.map(([key, value]) => `${key} = ${value}`).join('\n') + '\n';
}

export function includeBlock(ctx: EnvironmentContext): string[] {
  return [
    '',
    `# Added by replication provisioning on ${formatTimestamp(ctx.startedAt)}`,
    includeDirective(ctx.paths.replicationConfigPath)
  ];
}

export function registrationConfigFor(ctx: EnvironmentContext): RegistrationConfig {
  const { nodeId, nodeName } = NODE_IDENTITY[ctx.role];
  return {
    nodeId,
    nodeName,
    connectionInfo: `host=${ctx.connection.host} port=${ctx.connection.port} user=${COORDINATOR_USER} dbname=${COORDINATOR_DATABASE} connect_timeout=10`,
    dataDirectory: ctx.paths.dataDirectory
  };
}

// repmgr.conf follows postgresql.conf quoting: a literal quote is doubled.
export function quoteConfigValue(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function registrationConfigText(config: RegistrationConfig): string {
  return (
    [
      `node_id=${config.nodeId}`,
      `node_name=${quoteConfigValue(config.nodeName)}`,
      `conninfo=${quoteConfigValue(config.connectionInfo)}`,
      `data_directory=${quoteConfigValue(config.dataDirectory)}`
    ].join('\n') + '\n'
  );
}

function indent(lines: readonly string[]): string[] {
  return lines.map((line) => (line ? `  ${line}` : ''));
}

function createRoleSql(password: string): string {
  return `CREATE USER ${escapeIdentifier(COORDINATOR_USER)} WITH SUPERUSER PASSWORD ${escapeLiteral(password)}`;
}

function grantSql(): string[] {
  return [
    `GRANT ALL PRIVILEGES ON DATABASE ${escapeIdentifier(COORDINATOR_DATABASE)} TO ${escapeIdentifier(COORDINATOR_USER)}`,
    `ALTER USER ${escapeIdentifier(COORDINATOR_USER)} SET search_path TO ${SEARCH_PATH.map((s) => escapeIdentifier(s)).join(', ')}`
  ];
}

function applied(detail?: string): StepOutcome {
  return { ok: true, detail };
}

function registrationDirectoryStep(ctx: EnvironmentContext): Step {
  const dir = ctx.paths.registrationDirectory;
  return {
    id: 'create-registration-directory',
    description: `create directory '${dir}'`,
    preview: indent([`mkdir -p '${dir}'`]),
    isApplied: () => directoryExists(dir),
    apply: async () => {
      await fs.mkdir(dir, { recursive: true });
      return applied(`Created directory '${dir}'`);
    }
  };
}

function registrationConfigStep(ctx: EnvironmentContext, deps: PlannerDeps): Step {
  const target = ctx.paths.registrationConfigPath;
  const text = registrationConfigText(registrationConfigFor(ctx));
  const owner = `${ctx.serviceAccount}:${ctx.serviceAccount}`;
  return {
    id: 'write-registration-config',
    description: `create '${target}' (mode 0600, owner ${owner}) with content:`,
    preview: indent(text.trimEnd().split('\n')),
    apply: async () => {
      await fs.writeFile(target, text, { encoding: 'utf8', mode: 0o600 });
      // writeFile only applies the mode when it creates the file.
      await fs.chmod(target, 0o600);
      const chown = await deps.runner(ctx.executables.chown, [owner, target], {
        timeoutMs: deps.commandTimeoutMs
      });
      if (!chown.ok) {
        return {
          ok: false,
          error: new ProvisionError(
            'STEP_APPLY_FAILED',
            `Failed to change owner of '${target}' to ${owner}: ${(chown.stderr || chown.stdout).trim()}`,
            { subject: 'write-registration-config' }
          )
        };
      }
      return applied(`Created repmgr configuration at '${target}'`);
    }
  };
}

function primarySteps(ctx: PrimaryContext, deps: PlannerDeps): Step[] {
  const { configFilePath, backupConfigPath, replicationConfigPath, registrationConfigPath } = ctx.paths;
  const tuning = replicationConfigText();
  const block = includeBlock(ctx);
  const registration = registrationConfigFor(ctx);
  const repmgr = ctx.executables.repmgr;

  return [
    {
      id: 'write-replication-config',
      description: `create file '${replicationConfigPath}' with content:`,
      preview: indent(tuning.trimEnd().split('\n')),
      apply: async () => {
        await fs.writeFile(replicationConfigPath, tuning, 'utf8');
        return applied(`Created replication configuration file at '${replicationConfigPath}'`);
      }
    },
    {
      id: 'backup-config',
      description: `back up '${configFilePath}' to '${backupConfigPath}'`,
      preview: [],
      apply: async () => {
        await fs.copyFile(configFilePath, backupConfigPath);
        return applied(`Created backup of PostgreSQL configuration at '${backupConfigPath}'`);
      }
    },
    {
      // Guarded by the ALREADY_CONFIGURED precondition instead of isApplied.
      id: 'append-include-directive',
      description: `append to '${configFilePath}' these lines:`,
      preview: indent(block),
      apply: async () => {
        await fs.appendFile(configFilePath, block.join('\n') + '\n', 'utf8');
        return applied(`Added include directive to '${configFilePath}'`);
      }
    },
    {
      id: 'create-coordinator-role',
      description: `create database role '${COORDINATOR_USER}' with:`,
      preview: indent([`${createRoleSql(maskSecret(ctx.coordinatorPassword))};`]),
      isApplied: () => roleExists(deps.db, COORDINATOR_USER),
      apply: async () => {
        await deps.db.pool.query(createRoleSql(ctx.coordinatorPassword));
        return applied(`Created ${COORDINATOR_USER} user`);
      }
    },
    {
      id: 'create-coordinator-database',
      description: `create database '${COORDINATOR_DATABASE}' with:`,
      preview: indent([`CREATE DATABASE ${escapeIdentifier(COORDINATOR_DATABASE)};`]),
      isApplied: () => databaseExists(deps.db, COORDINATOR_DATABASE),
      apply: async () => {
        await deps.db.pool.query(`CREATE DATABASE ${escapeIdentifier(COORDINATOR_DATABASE)}`);
        return applied(`Created ${COORDINATOR_DATABASE} database`);
      }
    },
    {
      id: 'grant-coordinator-privileges',
      description: `configure ${COORDINATOR_USER} user and database permissions with:`,
      preview: indent(grantSql().map((sql) => `${sql};`)),
      apply: async () => {
        for (const sql of grantSql()) {
          await deps.db.pool.query(sql);
        }
        return applied(`Configured ${COORDINATOR_USER} user and database permissions`);
      }
    },
    registrationDirectoryStep(ctx),
    registrationConfigStep(ctx, deps),
    {
      id: 'register-primary',
      description: `register primary node (node_id=${registration.nodeId}) with:`,
      preview: indent([
        `export PGPASSWORD="${maskSecret(ctx.coordinatorPassword)}"`,
        `su ${asServiceAccount(ctx.serviceAccount, `"${registerPrimaryCommand(repmgr, registrationConfigPath)}"`).join(' ')}`
      ]),
      apply: async () => {
        const res = await deps.registration.registerPrimary(registration, registrationConfigPath, ctx.coordinatorPassword);
        return res.ok ? applied('Successfully registered primary node') : res;
      }
    }
  ];
}

function replicaSteps(ctx: ReplicaContext, deps: PlannerDeps): Step[] {
  const { registrationConfigPath } = ctx.paths;
  const registration = registrationConfigFor(ctx);
  const repmgr = ctx.executables.repmgr;

  return [
    registrationDirectoryStep(ctx),
    registrationConfigStep(ctx, deps),
    {
      id: 'clone-from-primary',
      description: `clone primary node ${ctx.primary.host}:${ctx.primary.port} (node_id=${registration.nodeId}) with:`,
      preview: indent([
        `export PGPASSWORD="${maskSecret(ctx.coordinatorPassword)}"`,
        `su ${asServiceAccount(ctx.serviceAccount, `"${cloneFromPrimaryCommand(repmgr, registrationConfigPath, ctx.primary)}"`).join(' ')}`
      ]),
      apply: async () => {
        const res = await deps.registration.cloneFromPrimary(
          registration,
          registrationConfigPath,
          ctx.primary,
          ctx.coordinatorPassword
        );
        return res.ok ? applied('Successfully cloned primary node') : res;
      }
    }
  ];
}

/**
 * Ordered steps for the context's role. Both execution modes walk this exact list,
 * so a dry run and a real run can only differ in whether mutations happen.
 */
export function planSteps(ctx: EnvironmentContext, deps: PlannerDeps): Step[] {
  switch (ctx.role) {
    case 'primary':
      return primarySteps(ctx, deps);
    case 'replica':
      return replicaSteps(ctx, deps);
  }
}

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { ProvisionConfig } from './config.js';
import { ProvisionError } from './errors.js';
import type { EnvironmentContext, NodePaths, NodeRole, RequiredExecutable, ServiceIdentity } from './types.js';

const COMMON_VARIABLES = [
  'RAILWAY_PROJECT_NAME',
  'RAILWAY_SERVICE_NAME',
  'RAILWAY_ENVIRONMENT',
  'RAILWAY_PROJECT_ID',
  'RAILWAY_SERVICE_ID',
  'RAILWAY_ENVIRONMENT_ID',
  'PGHOST',
  'PGPORT'
] as const;

const ROLE_VARIABLES: Record<NodeRole, readonly string[]> = {
  primary: [...COMMON_VARIABLES, 'REPMGR_USER_PASSWORD'],
  replica: [...COMMON_VARIABLES, 'PRIMARY_PGHOST', 'PRIMARY_PGPORT', 'PRIMARY_REPMGR_USER_PASSWORD']
};

export const REQUIRED_EXECUTABLES: readonly RequiredExecutable[] = ['pg_config', 'repmgr', 'su', 'chown'];

const port = z.coerce.number().int().min(1).max(65535);

export function requiredVariables(role: NodeRole): readonly string[] {
  return ROLE_VARIABLES[role];
}

export function findExecutable(name: string, pathEnv: string): string | undefined {
  for (const dir of pathEnv.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      if (fs.statSync(candidate).isFile()) return candidate;
    } catch {
      // not in this directory
    }
  }
  return undefined;
}

export function resolvePaths(volumeRoot: string, runtimeDirName: string): NodePaths {
  const dataDirectory = path.join(volumeRoot, 'pgdata');
  const runtimeDirectory = path.join(volumeRoot, runtimeDirName);
  const registrationDirectory = path.join(runtimeDirectory, 'repmgr');
  return {
    volumeRoot,
    dataDirectory,
    configFilePath: path.join(dataDirectory, 'postgresql.conf'),
    replicationConfigPath: path.join(dataDirectory, 'postgresql.replication.conf'),
    backupConfigPath: path.join(dataDirectory, 'postgresql.bak.conf'),
    runtimeDirectory,
    registrationDirectory,
    registrationConfigPath: path.join(registrationDirectory, 'repmgr.conf')
  };
}

export function serviceUrl(projectId: string, serviceId: string, environmentId: string): string {
  return `https://railway.app/project/${projectId}/service/${serviceId}?environmentId=${environmentId}`;
}

function parsePort(name: string, raw: string): number {
  const parsed = port.safeParse(raw);
  if (!parsed.success) {
    throw new ProvisionError('INVALID_VARIABLE', `Environment variable ${name} must be a port number, got '${raw}'`, {
      subject: name
    });
  }
  return parsed.data;
}

// Host names go unquoted into a libpq conninfo string.
const host = z.string().regex(/^[^\s'"\\]+$/);

function parseHost(name: string, raw: string): string {
  if (!host.safeParse(raw).success) {
    throw new ProvisionError(
      'INVALID_VARIABLE',
      `Environment variable ${name} must be a host name without spaces or quotes, got '${raw}'`,
      { subject: name }
    );
  }
  return raw;
}

function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = (env[name] ?? '').trim();
  return v || undefined;
}

/**
 * Builds the immutable context for one run. Every required variable and
 * executable is checked up front; the first missing one aborts the load.
 */
export function loadEnvironment(
  role: NodeRole,
  env: NodeJS.ProcessEnv,
  config: Pick<ProvisionConfig, 'PROVISION_VOLUME_ROOT' | 'PROVISION_RUNTIME_DIR' | 'PROVISION_SERVICE_ACCOUNT'>,
  now: Date = new Date()
): EnvironmentContext {
  const variables: Record<string, string> = {};
  for (const name of requiredVariables(role)) {
    const value = (env[name] ?? '').trim();
    if (!value) {
      throw new ProvisionError('MISSING_VARIABLE', `Missing required environment variable: ${name}`, { subject: name });
    }
    variables[name] = value;
  }

  const pathEnv = env.PATH ?? '';
  const resolve = (name: RequiredExecutable): string => {
    const resolved = findExecutable(name, pathEnv);
    if (!resolved) {
      throw new ProvisionError('MISSING_EXECUTABLE', `Required cmd '${name}' not found in PATH`, { subject: name });
    }
    return resolved;
  };
  // Same order as REQUIRED_EXECUTABLES, so the first missing one is the one reported.
  const executables: Record<RequiredExecutable, string> = {
    pg_config: resolve('pg_config'),
    repmgr: resolve('repmgr'),
    su: resolve('su'),
    chown: resolve('chown')
  };

  const v = (name: string): string => variables[name] ?? '';

  const identity: ServiceIdentity = {
    projectName: v('RAILWAY_PROJECT_NAME'),
    serviceName: v('RAILWAY_SERVICE_NAME'),
    environmentName: v('RAILWAY_ENVIRONMENT'),
    projectId: v('RAILWAY_PROJECT_ID'),
    serviceId: v('RAILWAY_SERVICE_ID'),
    environmentId: v('RAILWAY_ENVIRONMENT_ID'),
    serviceUrl: serviceUrl(v('RAILWAY_PROJECT_ID'), v('RAILWAY_SERVICE_ID'), v('RAILWAY_ENVIRONMENT_ID'))
  };

  const base = {
    variables: Object.freeze(variables),
    identity: Object.freeze(identity),
    connection: Object.freeze({
      host: parseHost('PGHOST', v('PGHOST')),
      port: parsePort('PGPORT', v('PGPORT')),
      user: optional(env, 'PGUSER'),
      password: optional(env, 'PGPASSWORD'),
      database: optional(env, 'PGDATABASE')
    }),
    paths: Object.freeze(resolvePaths(config.PROVISION_VOLUME_ROOT, config.PROVISION_RUNTIME_DIR)),
    executables: Object.freeze(executables),
    serviceAccount: config.PROVISION_SERVICE_ACCOUNT,
    startedAt: new Date(now.getTime())
  };

  if (role === 'primary') {
    return Object.freeze({ ...base, role, coordinatorPassword: v('REPMGR_USER_PASSWORD') });
  }

  return Object.freeze({
    ...base,
    role,
    primary: Object.freeze({
      host: parseHost('PRIMARY_PGHOST', v('PRIMARY_PGHOST')),
      port: parsePort('PRIMARY_PGPORT', v('PRIMARY_PGPORT'))
    }),
    coordinatorPassword: v('PRIMARY_REPMGR_USER_PASSWORD')
  });
}

export function maskSecret(value: string): string {
  return `***${value.slice(-4)}`;
}

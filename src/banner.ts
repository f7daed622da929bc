import { maskSecret } from './environment.js';
import type { CommandRunner } from './process.js';
import type { EnvironmentContext, ExecutionMode } from './types.js';

export const TUTORIAL_URL = 'https://docs.railway.com/tutorials/set-up-postgres-replication';

// "PostgreSQL 16.2 (Debian 16.2-1.pgdg120+2)" -> 16
export function parsePostgresMajorVersion(versionOutput: string): number | undefined {
  const m = versionOutput.trim().match(/^PostgreSQL (\d+)/);
  return m ? Number(m[1]) : undefined;
}

export async function detectPostgresVersion(
  ctx: EnvironmentContext,
  runner: CommandRunner,
  timeoutMs: number
): Promise<{ ok: true; version: string; major: number } | { ok: false; error: string }> {
  const res = await runner(ctx.executables.pg_config, ['--version'], { timeoutMs });
  if (!res.ok) return { ok: false, error: (res.stderr || res.stdout).trim() || 'pg_config failed' };
  const version = res.stdout.trim();
  const major = parsePostgresMajorVersion(version);
  if (major === undefined) return { ok: false, error: `unrecognized version string '${version}'` };
  return { ok: true, version, major };
}

export function bannerLines(ctx: EnvironmentContext, mode: ExecutionMode, postgresVersion?: string): string[] {
  const lines = [
    `PostgreSQL replication configuration - ${ctx.role.toUpperCase()}`,
    '',
    'Before proceeding, please ensure you have read the tutorial:',
    `  ${TUTORIAL_URL}`,
    '',
    'You are running this on the following database service:',
    `  - Project        : ${ctx.identity.projectName}`,
    `  - Service        : ${ctx.identity.serviceName}`,
    `  - Environment    : ${ctx.identity.environmentName}`,
    `  - URL            : ${ctx.identity.serviceUrl}`,
    `  - PGHOST/PGPORT  : ${ctx.connection.host} / ${ctx.connection.port}`
  ];

  if (postgresVersion) {
    lines.push(`  - PostgreSQL     : ${postgresVersion}`);
  }

  if (ctx.role === 'replica') {
    lines.push(
      `  - Primary        : ${ctx.primary.host} / ${ctx.primary.port}`,
      `  - Primary repmgr password : ${maskSecret(ctx.coordinatorPassword)}`
    );
  }

  lines.push(
    '',
    `THIS SHOULD ONLY BE RUN ON THE DATABASE YOU WISH TO DESIGNATE AS THE ${ctx.role.toUpperCase()} NODE.`,
    '',
    '  - Changes are made to the PostgreSQL configuration and repmgr is set up',
    '  - A re-deploy of the database is required for the changes to take effect',
    '  - Make sure you have a backup of your data before proceeding'
  );

  if (mode === 'simulate') {
    lines.push(
      '',
      '--dry-run enabled. You will see the list of changes that would be applied,',
      'but no changes will be made. To apply changes, run without --dry-run.'
    );
  }

  return lines;
}

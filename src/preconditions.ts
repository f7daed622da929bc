import fs from 'node:fs/promises';
import path from 'node:path';

import { ProvisionError, describeCause, type Result } from './errors.js';
import type { EnvironmentContext } from './types.js';

export function includeDirective(replicationConfigPath: string): string {
  return `include '${path.basename(replicationConfigPath)}'`;
}

const INCLUDE_LINE = /^include\s*=?\s*'([^']*)'$/;

/**
 * True when an active `include` line names the given file. Trailing comments and the
 * optional `=` are accepted the way PostgreSQL reads them; commented-out lines are not.
 */
export function hasIncludeDirective(configText: string, fileName: string): boolean {
  return configText.split(/\r?\n/).some((raw) => {
    const line = raw.replace(/#.*$/, '').trim();
    return INCLUDE_LINE.exec(line)?.[1] === fileName;
  });
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/**
 * Gate in front of every mutating step. The include directive in postgresql.conf
 * marks a node that has already been configured, so its presence refuses the run.
 */
export async function checkPreconditions(ctx: EnvironmentContext): Promise<Result> {
  const { dataDirectory, configFilePath, replicationConfigPath } = ctx.paths;

  if (!(await isDirectory(dataDirectory))) {
    return {
      ok: false,
      error: new ProvisionError('MISSING_PATH', `PostgreSQL data directory '${dataDirectory}' not found`, {
        subject: dataDirectory
      })
    };
  }

  if (!(await isFile(configFilePath))) {
    return {
      ok: false,
      error: new ProvisionError('MISSING_PATH', `PostgreSQL configuration file '${configFilePath}' not found`, {
        subject: configFilePath
      })
    };
  }

  let text: string;
  try {
    text = await fs.readFile(configFilePath, 'utf8');
  } catch (err: unknown) {
    return {
      ok: false,
      error: new ProvisionError(
        'MISSING_PATH',
        `PostgreSQL configuration file '${configFilePath}' could not be read: ${describeCause(err)}`,
        { subject: configFilePath, cause: err }
      )
    };
  }

  if (hasIncludeDirective(text, path.basename(replicationConfigPath))) {
    return {
      ok: false,
      error: new ProvisionError(
        'ALREADY_CONFIGURED',
        `Include directive already exists in '${configFilePath}'. This node has already been configured.`,
        { subject: configFilePath }
      )
    };
  }

  return { ok: true };
}

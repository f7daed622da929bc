import { ProvisionError, type Result } from './errors.js';
import { shellQuote, type CommandRunner } from './process.js';
import type { Endpoint, RegistrationConfig } from './types.js';

export const COORDINATOR_USER = 'repmgr';
export const COORDINATOR_DATABASE = 'repmgr';

export type ClusterRegistrationClient = {
  registerPrimary: (config: RegistrationConfig, configPath: string, credential: string) => Promise<Result>;
  cloneFromPrimary: (
    config: RegistrationConfig,
    configPath: string,
    primary: Endpoint,
    credential: string
  ) => Promise<Result>;
};

export type RegistrationClientOptions = {
  runner: CommandRunner;
  // Absolute paths as resolved from PATH.
  su: string;
  repmgr: string;
  serviceAccount: string;
  env: NodeJS.ProcessEnv;
};

export function registerPrimaryCommand(repmgr: string, configPath: string): string {
  return [repmgr, '-f', configPath, 'primary', 'register'].map(shellQuote).join(' ');
}

export function cloneFromPrimaryCommand(repmgr: string, configPath: string, primary: Endpoint): string {
  return [
    repmgr,
    '-h',
    primary.host,
    '-p',
    String(primary.port),
    '-U',
    COORDINATOR_USER,
    '-d',
    COORDINATOR_DATABASE,
    '-f',
    configPath,
    'standby',
    'clone',
    '--force'
  ]
    .map(shellQuote)
    .join(' ');
}

// `su -m` keeps the environment (and so PGPASSWORD) while dropping to the service account,
// which keeps everything repmgr writes owned by that account.
export function asServiceAccount(serviceAccount: string, command: string): string[] {
  return ['-m', serviceAccount, '-c', command];
}

function failureDetail(stderr: string, stdout: string, code?: number): string {
  const text = (stderr || stdout).trim();
  const exit = code === undefined ? 'unknown exit status' : `exit code ${code}`;
  return text ? `${exit}: ${text}` : exit;
}

export function createRegistrationClient(opts: RegistrationClientOptions): ClusterRegistrationClient {
  const run = async (command: string, credential: string) =>
    opts.runner(opts.su, asServiceAccount(opts.serviceAccount, command), {
      env: { ...opts.env, PGPASSWORD: credential }
    });

  return {
    async registerPrimary(config, configPath, credential) {
      const res = await run(registerPrimaryCommand(opts.repmgr, configPath), credential);
      if (res.ok) return { ok: true };
      return {
        ok: false,
        error: new ProvisionError(
          'REGISTRATION_FAILED',
          `Failed to register primary node '${config.nodeName}' (node_id=${config.nodeId}) with repmgr (${failureDetail(res.stderr, res.stdout, res.code)})`,
          { subject: config.nodeName }
        )
      };
    },

    async cloneFromPrimary(config, configPath, primary, credential) {
      const res = await run(cloneFromPrimaryCommand(opts.repmgr, configPath, primary), credential);
      if (res.ok) return { ok: true };
      return {
        ok: false,
        error: new ProvisionError(
          'CLONE_FAILED',
          `Failed to clone primary node ${primary.host}:${primary.port} into '${config.dataDirectory}' (${failureDetail(res.stderr, res.stdout, res.code)})`,
          { subject: config.nodeName }
        )
      };
    }
  };
}

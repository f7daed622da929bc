import fs from 'node:fs';
import path from 'node:path';

import { afterEach, describe, expect, it, vi } from 'vitest';

import { loadEnvironment } from '../../src/environment.js';
import { checkPreconditions } from '../../src/preconditions.js';
import { provision } from '../../src/provision.js';
import type { CommandResult } from '../../src/process.js';
import {
  FIXED_NOW,
  ORIGINAL_CONF,
  captureLogger,
  fakeDb,
  fakeRunner,
  setupNode,
  snapshotTree,
  type NodeFixture
} from '../_harness.js';

const INCLUDE = "include 'postgresql.replication.conf'";

function countIncludes(text: string): number {
  return text.split('\n').filter((line) => line.trim() === INCLUDE).length;
}

describe('integration: primary workflow', () => {
  let node: NodeFixture | undefined;

  afterEach(() => {
    node?.cleanup();
    node = undefined;
  });

  function run(
    fixture: NodeFixture,
    mode: 'simulate' | 'execute',
    opts: {
      db?: ReturnType<typeof fakeDb>;
      overrides?: Record<string, CommandResult>;
      confirm?: boolean;
      env?: Record<string, string>;
    } = {}
  ) {
    const db = opts.db ?? fakeDb();
    const runner = fakeRunner(opts.overrides);
    const log = captureLogger();
    const confirm = vi.fn(async () => opts.confirm ?? true);
    const outcome = provision('primary', mode, {
      config: fixture.config,
      env: opts.env ?? fixture.env,
      logger: log.logger,
      confirm,
      runner: runner.runner,
      createDb: () => db.db,
      now: () => FIXED_NOW
    });
    return { outcome, db, runner, log, confirm };
  }

  it('configures a fresh node and registers it as node 1', async () => {
    node = setupNode('primary');
    const { outcome, db, runner } = run(node, 'execute');
    const res = await outcome;

    expect(res.exitCode).toBe(0);
    expect(res.report?.succeeded).toHaveLength(9);

    const pgdata = path.join(node.volumeRoot, 'pgdata');
    const tuning = fs.readFileSync(path.join(pgdata, 'postgresql.replication.conf'), 'utf8');
    expect(tuning.split('\n')).toContain('wal_level = replica');

    expect(fs.readFileSync(path.join(pgdata, 'postgresql.bak.conf'), 'utf8')).toBe(ORIGINAL_CONF);

    const conf = fs.readFileSync(path.join(pgdata, 'postgresql.conf'), 'utf8');
    expect(countIncludes(conf)).toBe(1);
    expect(conf).toBe(
      `${ORIGINAL_CONF}\n# Added by replication provisioning on 2026-01-15 09:30:05\n${INCLUDE}\n`
    );

    expect(db.statements).toEqual([
      `CREATE USER "repmgr" WITH SUPERUSER PASSWORD 'test-secret'`,
      'CREATE DATABASE "repmgr"',
      'GRANT ALL PRIVILEGES ON DATABASE "repmgr" TO "repmgr"',
      'ALTER USER "repmgr" SET search_path TO "repmgr", "railway", "public"'
    ]);
    expect(db.close).toHaveBeenCalledTimes(1);

    const repmgrConf = path.join(node.volumeRoot, 'railway-runtime', 'repmgr', 'repmgr.conf');
    expect(fs.readFileSync(repmgrConf, 'utf8').split('\n')[0]).toBe('node_id=1');
    expect(fs.statSync(repmgrConf).mode & 0o777).toBe(0o600);
    expect(runner.callsTo('chown').map((c) => c.args)).toEqual([['postgres:postgres', repmgrConf]]);

    const su = runner.callsTo('su');
    expect(su).toHaveLength(1);
    expect(su[0].args).toEqual([
      '-m',
      'postgres',
      '-c',
      `${path.join(node.binDir, 'repmgr')} -f ${repmgrConf} primary register`
    ]);
    expect(su[0].opts?.env?.PGPASSWORD).toBe('test-secret');
  });

  it('closes its own gate after a successful run', async () => {
    node = setupNode('primary');
    const res = await run(node, 'execute').outcome;
    expect(res.exitCode).toBe(0);

    const ctx = loadEnvironment('primary', node.env, node.config, FIXED_NOW);
    const gate = await checkPreconditions(ctx);
    expect(gate.ok ? 'ok' : gate.error.code).toBe('ALREADY_CONFIGURED');

    const second = await run(node, 'execute').outcome;
    expect(second.exitCode).toBe(1);
    expect(second.error?.code).toBe('ALREADY_CONFIGURED');
    expect(countIncludes(fs.readFileSync(ctx.paths.configFilePath, 'utf8'))).toBe(1);
  });

  it('refuses an already configured node without running any step', async () => {
    node = setupNode('primary', { conf: `${ORIGINAL_CONF}${INCLUDE}\n` });
    const before = snapshotTree(node.volumeRoot);
    const { outcome, db, runner } = run(node, 'execute');
    const res = await outcome;

    expect(res.exitCode).toBe(1);
    expect(res.error?.code).toBe('ALREADY_CONFIGURED');
    expect(res.report).toBeUndefined();
    expect(db.query).not.toHaveBeenCalled();
    expect(runner.callsTo('su')).toHaveLength(0);
    expect(snapshotTree(node.volumeRoot)).toEqual(before);
  });

  it.each([
    ["include 'postgresql.replication.conf'  # replication"],
    ["include = 'postgresql.replication.conf'"]
  ])('refuses a node configured with %s', async (line) => {
    node = setupNode('primary', { conf: `${ORIGINAL_CONF}${line}\n` });
    const before = snapshotTree(node.volumeRoot);
    const res = await run(node, 'execute').outcome;

    expect(res.exitCode).toBe(1);
    expect(res.error?.code).toBe('ALREADY_CONFIGURED');
    expect(snapshotTree(node.volumeRoot)).toEqual(before);
  });

  it('changes nothing in dry-run mode', async () => {
    node = setupNode('primary');
    const before = snapshotTree(node.volumeRoot);
    const { outcome, db, runner, log } = run(node, 'simulate');
    const res = await outcome;

    expect(res.exitCode).toBe(0);
    expect(res.report?.simulated).toHaveLength(9);
    expect(snapshotTree(node.volumeRoot)).toEqual(before);
    expect(db.query).not.toHaveBeenCalled();
    expect(runner.callsTo('su')).toHaveLength(0);
    expect(runner.callsTo('chown')).toHaveLength(0);
    expect(log.messages()).toContain('Configuration complete in --dry-run mode. No changes were made');
    expect(log.messages().join('\n')).not.toContain('test-secret');
  });

  it('skips creating a role that already exists and carries on', async () => {
    node = setupNode('primary');
    const db = fakeDb({ roles: ['repmgr'] });
    const { outcome, runner } = run(node, 'execute', { db });
    const res = await outcome;

    expect(res.exitCode).toBe(0);
    expect(res.report?.skipped).toEqual(['create-coordinator-role']);
    expect(db.statements.some((sql) => sql.startsWith('CREATE USER'))).toBe(false);
    expect(db.statements).toContain('CREATE DATABASE "repmgr"');
    expect(runner.callsTo('su')).toHaveLength(1);
  });

  it('stops at the failing step and leaves later effects absent', async () => {
    node = setupNode('primary');
    const db = fakeDb({ failOn: /^CREATE DATABASE/ });
    const { outcome, runner, log } = run(node, 'execute', { db });
    const res = await outcome;

    expect(res.exitCode).toBe(1);
    expect(res.report?.failed?.step).toBe('create-coordinator-database');
    expect(res.error?.code).toBe('STEP_APPLY_FAILED');
    expect(res.report?.succeeded).toEqual([
      'write-replication-config',
      'backup-config',
      'append-include-directive',
      'create-coordinator-role'
    ]);

    expect(db.statements.some((sql) => sql.startsWith('GRANT'))).toBe(false);
    expect(fs.existsSync(path.join(node.volumeRoot, 'railway-runtime'))).toBe(false);
    expect(runner.callsTo('chown')).toHaveLength(0);
    expect(runner.callsTo('su')).toHaveLength(0);
    expect(db.close).toHaveBeenCalledTimes(1);
    expect(log.messages()).toContain(
      "Step 'create-coordinator-database' failed: permission denied to create database"
    );
  });

  it('fails the run when repmgr rejects the registration', async () => {
    node = setupNode('primary');
    const { outcome } = run(node, 'execute', {
      overrides: { su: { ok: false, stdout: '', stderr: 'ERROR: connection to database failed', code: 1 } }
    });
    const res = await outcome;

    expect(res.exitCode).toBe(1);
    expect(res.report?.failed?.step).toBe('register-primary');
    expect(res.error?.code).toBe('REGISTRATION_FAILED');
  });

  it('exits cleanly when the operator declines', async () => {
    node = setupNode('primary');
    const before = snapshotTree(node.volumeRoot);
    const { outcome, confirm, log } = run(node, 'execute', { confirm: false });
    const res = await outcome;

    expect(res.exitCode).toBe(0);
    expect(confirm).toHaveBeenCalledWith('This is for a PRIMARY. Continue?');
    expect(log.messages()).toContain('Exiting...');
    expect(snapshotTree(node.volumeRoot)).toEqual(before);
  });

  it('fails before prompting when a variable is missing', async () => {
    node = setupNode('primary');
    const env = { ...node.env };
    delete env.REPMGR_USER_PASSWORD;
    const { outcome, confirm, log } = run(node, 'execute', { env });
    const res = await outcome;

    expect(res.exitCode).toBe(1);
    expect(res.error?.code).toBe('MISSING_VARIABLE');
    expect(confirm).not.toHaveBeenCalled();
    expect(log.messages()[0]).toBe('Missing required environment variable: REPMGR_USER_PASSWORD');
  });
});

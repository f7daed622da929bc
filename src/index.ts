export { loadConfig, type ProvisionConfig } from './config.js';
export { createLogger, type Logger } from './logger.js';
export { ProvisionError, type ProvisionErrorCode, type Result } from './errors.js';
export { loadEnvironment, requiredVariables, REQUIRED_EXECUTABLES, resolvePaths } from './environment.js';
export { checkPreconditions, includeDirective, hasIncludeDirective } from './preconditions.js';
export {
  planSteps,
  quoteConfigValue,
  registrationConfigFor,
  registrationConfigText,
  type PlannerDeps
} from './planner.js';
export { runSteps, type RunReport } from './executor.js';
export { roleExists, databaseExists, directoryExists } from './guards.js';
export { createRegistrationClient, type ClusterRegistrationClient } from './registration.js';
export { createDb, type Db, type SqlClient } from './db.js';
export { runCommand, type CommandRunner, type CommandResult } from './process.js';
export { provision, type ProvisionDeps, type ProvisionOutcome } from './provision.js';
export { buildProgram, buildRoleProgram, runRole } from './cli.js';
export type { Step, StepOutcome } from './steps.js';
export type * from './types.js';

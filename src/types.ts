export type NodeRole = 'primary' | 'replica';

export type ExecutionMode = 'simulate' | 'execute';

export type RequiredExecutable = 'pg_config' | 'repmgr' | 'su' | 'chown';

export type RegistrationConfig = {
  nodeId: number;
  nodeName: string;
  connectionInfo: string;
  dataDirectory: string;
};

export type Endpoint = {
  host: string;
  port: number;
};

export type NodePaths = {
  volumeRoot: string;
  dataDirectory: string;
  configFilePath: string;
  replicationConfigPath: string;
  backupConfigPath: string;
  runtimeDirectory: string;
  registrationDirectory: string;
  registrationConfigPath: string;
};

export type ServiceIdentity = {
  projectName: string;
  serviceName: string;
  environmentName: string;
  projectId: string;
  serviceId: string;
  environmentId: string;
  serviceUrl: string;
};

export type LocalConnection = Endpoint & {
  user?: string;
  password?: string;
  database?: string;
};

type ContextBase = {
  readonly variables: Readonly<Record<string, string>>;
  readonly identity: Readonly<ServiceIdentity>;
  readonly connection: Readonly<LocalConnection>;
  readonly paths: Readonly<NodePaths>;
  readonly executables: Readonly<Record<RequiredExecutable, string>>;
  readonly serviceAccount: string;
  // Fixed at load time so that planning the same context twice yields identical steps.
  readonly startedAt: Date;
};

export type PrimaryContext = ContextBase & {
  readonly role: 'primary';
  // Password chosen for the local repmgr role.
  readonly coordinatorPassword: string;
};

export type ReplicaContext = ContextBase & {
  readonly role: 'replica';
  readonly primary: Readonly<Endpoint>;
  // Password of the repmgr role on the primary.
  readonly coordinatorPassword: string;
};

export type EnvironmentContext = PrimaryContext | ReplicaContext;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | AttributeTree;

export interface AttributeTree {
  [key: string]: AttributeValue;
}

// A node as reported by the directory service.
export interface NodeRecord {
  name: string;
  automatic: AttributeTree;
  normal?: AttributeTree;
  default?: AttributeTree;
  override?: AttributeTree;
  chefEnvironment?: string;
  runList?: string[];
}

// Either a node record or a literal address.
export type HostSpec = NodeRecord | string;

export type CloudProvider = 'ec2' | 'rackspace' | 'eucalyptus';

export interface HostCredentials {
  user: string;
  password?: string;
  keys: readonly string[];
}

export interface NodeTarget {
  readonly id: string;
  readonly host: string;
  readonly nodeName: string;
  readonly credentials: HostCredentials;
  readonly timeoutMs: number;
  readonly sudo: boolean;
  readonly instanceId?: string;
}

export interface ExecOptions {
  stdin?: string;
}

// Low-level session to one host. One instance per connection, never reused.
export interface Transport {
  // Commands already run as root, so sudo wrapping is skipped.
  readonly runsAsRoot: boolean;
  connect(target: NodeTarget): Promise<void>;
  exec(command: string, options?: ExecOptions): Promise<CommandResult>;
  // Force-close; safe to call more than once.
  dispose(): void;
}

export type TransportType = 'ssh' | 'ssm';

export interface TransportFactory {
  readonly type: TransportType;
  create(target: NodeTarget): Transport;
}

// What an operation callback sees of an open connection.
export interface HostSession {
  readonly target: NodeTarget;
  run(command: string): Promise<CommandResult>;
  upload(content: string | Buffer, remotePath: string, mode?: string): Promise<CommandResult>;
}

export type HostOperation = (session: HostSession) => Promise<CommandResult>;

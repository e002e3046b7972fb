import { NodeSSH } from 'node-ssh';
import type { CommandResult, ExecOptions, NodeTarget, Transport, TransportFactory } from './executor-interface.js';

// Exit status reported when the remote process died from a signal.
const SIGNAL_EXIT_CODE = -1;

const CLOSED_DURING_HANDSHAKE = 'SSH session was closed during the handshake';

export interface SshConnectConfig {
  host: string;
  username: string;
  password?: string;
  privateKeyPath?: string;
  readyTimeout?: number;
}

// The part of node-ssh's NodeSSH this transport relies on.
export interface SshClient {
  connect(config: SshConnectConfig): Promise<unknown>;
  execCommand(command: string, options?: { stdin?: string }): Promise<{
    stdout: string;
    stderr: string;
    code: number | null;
  }>;
  dispose(): void;
}

export type SshClientFactory = () => SshClient;

export class SSHTransport implements Transport {
  readonly runsAsRoot = false;
  private client: SshClient | null = null;
  private disposed = false;

  constructor(private readonly createClient: SshClientFactory = () => new NodeSSH()) {}

  // Keys take precedence over a password and are tried in order.
  async connect(target: NodeTarget): Promise<void> {
    const { user, password, keys } = target.credentials;
    const base: SshConnectConfig = {
      host: target.host,
      username: user,
      readyTimeout: target.timeoutMs,
    };

    if (keys.length === 0) {
      await this.attempt({ ...base, password });
      return;
    }

    let lastError: unknown = null;
    for (const keyPath of keys) {
      if (this.disposed) {
        throw new Error(CLOSED_DURING_HANDSHAKE);
      }
      try {
        await this.attempt({ ...base, privateKeyPath: keyPath });
        return;
      } catch (err) {
        if (!isAuthFailure(err)) {
          throw err;
        }
        lastError = err;
      }
    }
    throw lastError;
  }

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    if (!this.client) {
      throw new Error('SSH session is not connected');
    }

    const response = await this.client.execCommand(
      command,
      options.stdin !== undefined ? { stdin: options.stdin } : {},
    );
    return {
      stdout: response.stdout,
      stderr: response.stderr,
      exitCode: response.code ?? SIGNAL_EXIT_CODE,
    };
  }

  dispose(): void {
    this.disposed = true;
    this.client?.dispose();
    this.client = null;
  }

  private async attempt(config: SshConnectConfig): Promise<void> {
    const client = this.createClient();
    try {
      await client.connect(config);
    } catch (err) {
      client.dispose();
      throw err;
    }

    // dispose() may have run while the handshake was in flight.
    if (this.disposed) {
      client.dispose();
      throw new Error(CLOSED_DURING_HANDSHAKE);
    }
    this.client = client;
  }
}

function isAuthFailure(err: unknown): boolean {
  return err instanceof Error && /authentication/i.test(err.message);
}

export function createSSHTransportFactory(createClient?: SshClientFactory): TransportFactory {
  return {
    type: 'ssh',
    create: () => new SSHTransport(createClient),
  };
}

import * as path from 'path';
import { UNKNOWN_ADDRESS } from './address-resolver.js';
import {
  ConnectError,
  HostConnectorError,
  InternalError,
  TargetUnreachableError,
  TimeoutError,
} from './errors.js';
import type { CommandResult, ExecOptions, HostSession, NodeTarget, Transport } from './executor-interface.js';
import { noopLogger, type Logger } from './logger.js';
import { shellQuote } from './shell.js';

// setTimeout fires at once for any delay above this.
const MAX_TIMER_MS = 2 ** 31 - 1;

type ConnectionState = 'idle' | 'open' | 'busy' | 'closed';

export interface ConnectionOptions {
  logger?: Logger;
}

/**
 * One transport session to one host. The timeout is counted from the start
 * of the handshake, so it bounds the whole lifetime of the connection rather
 * than each command.
 */
export class Connection implements HostSession {
  private state: ConnectionState = 'idle';
  private readonly deadline: number;
  private timedOut: TimeoutError | null = null;

  private constructor(
    readonly target: NodeTarget,
    private readonly transport: Transport,
    private readonly logger: Logger,
  ) {
    this.deadline = Date.now() + target.timeoutMs;
  }

  static async open(target: NodeTarget, transport: Transport, options: ConnectionOptions = {}): Promise<Connection> {
    const connection = new Connection(target, transport, options.logger ?? noopLogger);
    try {
      await connection.handshake();
      return connection;
    } catch (err) {
      connection.close();
      throw err;
    }
  }

  get isOpen(): boolean {
    return this.state === 'open' || this.state === 'busy';
  }

  run(command: string): Promise<CommandResult> {
    return this.execute(command, command);
  }

  // The payload is left out of the log; it may be key material.
  upload(content: string | Buffer, remotePath: string, mode = '0600'): Promise<CommandResult> {
    const encoded = (typeof content === 'string' ? Buffer.from(content, 'utf-8') : content).toString('base64');
    const dest = shellQuote(remotePath);
    return this.execute(
      `mkdir -p ${shellQuote(path.posix.dirname(remotePath))} && ` +
      `printf '%s' ${shellQuote(encoded)} | base64 -d > ${dest} && ` +
      `chmod ${mode} ${dest}`,
      `upload ${remotePath} (${mode})`,
    );
  }

  close(): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.transport.dispose();
    this.logger.debug(`[${this.target.host}] connection closed`, { host: this.target.host });
  }

  private async execute(command: string, description: string): Promise<CommandResult> {
    this.assertUsable();

    const { wrapped, exec } = this.wrap(command);
    this.state = 'busy';
    this.logger.debug(`[${this.target.host}] $ ${description}`, { host: this.target.host, sudo: this.target.sudo });

    try {
      const result = await this.withinDeadline('exec', () => this.transport.exec(wrapped, exec));
      this.logger.debug(`[${this.target.host}] exit ${result.exitCode}`, {
        host: this.target.host,
        exitCode: result.exitCode,
      });
      return result;
    } catch (err) {
      if (err instanceof HostConnectorError) {
        throw err;
      }
      throw new ConnectError(this.target, err);
    } finally {
      if (this.state === 'busy') {
        this.state = 'open';
      }
    }
  }

  private async handshake(): Promise<void> {
    if (this.target.host === UNKNOWN_ADDRESS) {
      throw new TargetUnreachableError(this.target);
    }

    this.logger.debug(`[${this.target.host}] connecting as ${this.target.credentials.user}`, {
      host: this.target.host,
    });

    try {
      await this.withinDeadline('connect', () => this.transport.connect(this.target));
    } catch (err) {
      if (err instanceof HostConnectorError) {
        throw err;
      }
      throw new ConnectError(this.target, err);
    }
    this.state = 'open';
  }

  private assertUsable(): void {
    if (this.timedOut) {
      throw this.timedOut;
    }
    if (this.state === 'busy') {
      throw new InternalError(`Connection to ${this.target.host} is already running a command`);
    }
    if (this.state !== 'open') {
      throw new InternalError(`Connection to ${this.target.host} is ${this.state}`);
    }
  }

  // Key auth never gets a password prompt; the key identity must already be allowed to sudo.
  private wrap(command: string): { wrapped: string; exec: ExecOptions } {
    if (!this.target.sudo || this.transport.runsAsRoot) {
      return { wrapped: command, exec: {} };
    }

    const { password, keys } = this.target.credentials;
    if (password !== undefined && keys.length === 0) {
      return {
        wrapped: `sudo -S -p '' sh -c ${shellQuote(command)}`,
        exec: { stdin: `${password}\n` },
      };
    }
    return { wrapped: `sudo -n sh -c ${shellQuote(command)}`, exec: {} };
  }

  private withinDeadline<T>(phase: 'connect' | 'exec', operation: () => Promise<T>): Promise<T> {
    const remaining = this.deadline - Date.now();
    if (remaining <= 0) {
      return Promise.reject(this.expire(phase));
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(this.expire(phase)), Math.min(remaining, MAX_TIMER_MS));

      operation().then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  private expire(phase: 'connect' | 'exec'): TimeoutError {
    const error = new TimeoutError(this.target, phase);
    this.timedOut = error;
    this.logger.warn(error.message, { host: this.target.host, phase });
    this.close();
    return error;
  }
}

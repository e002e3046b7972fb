import {
  CancelCommandCommand,
  DescribeInstanceInformationCommand,
  GetCommandInvocationCommand,
  SendCommandCommand,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { describeError } from './errors.js';
import type { CommandResult, ExecOptions, NodeTarget, Transport, TransportFactory } from './executor-interface.js';
import { noopLogger, type Logger } from './logger.js';

const POLL_INTERVAL_MS = 500;
const PENDING_STATUSES = new Set(['Pending', 'InProgress', 'Delayed', 'Cancelling']);

export interface InvocationState {
  status: string;
  stdout: string;
  stderr: string;
  exitCode: number;
}

// The handful of SSM calls the transport makes, so tests can stand in for AWS.
export interface SsmApi {
  pingStatus(instanceId: string): Promise<string | undefined>;
  sendCommand(instanceId: string, script: string): Promise<string>;
  getInvocation(commandId: string, instanceId: string): Promise<InvocationState>;
  cancelCommand(commandId: string, instanceId: string): Promise<void>;
}

export function createSsmApi(client: SSMClient): SsmApi {
  return {
    async pingStatus(instanceId) {
      const response = await client.send(new DescribeInstanceInformationCommand({
        Filters: [{ Key: 'InstanceIds', Values: [instanceId] }],
      }));
      return response.InstanceInformationList?.[0]?.PingStatus;
    },

    async sendCommand(instanceId, script) {
      const response = await client.send(new SendCommandCommand({
        InstanceIds: [instanceId],
        DocumentName: 'AWS-RunShellScript',
        Parameters: { commands: [script] },
      }));
      const commandId = response.Command?.CommandId;
      if (!commandId) {
        throw new Error(`SSM did not return a command id for ${instanceId}`);
      }
      return commandId;
    },

    async getInvocation(commandId, instanceId) {
      const response = await client.send(new GetCommandInvocationCommand({
        CommandId: commandId,
        InstanceId: instanceId,
      }));
      return {
        status: response.Status ?? 'Pending',
        stdout: (response.StandardOutputContent ?? '').trim(),
        stderr: (response.StandardErrorContent ?? '').trim(),
        exitCode: response.ResponseCode ?? -1,
      };
    },

    async cancelCommand(commandId, instanceId) {
      await client.send(new CancelCommandCommand({ CommandId: commandId, InstanceIds: [instanceId] }));
    },
  };
}

/**
 * Runs commands through SSM Run Command. The node is addressed by its EC2
 * instance id rather than a network address, and SSM runs scripts as root.
 */
export class SSMTransport implements Transport {
  readonly runsAsRoot = true;
  private instanceId: string | null = null;
  private inflight: string | null = null;
  private disposed = false;

  constructor(
    private readonly api: SsmApi,
    private readonly logger: Logger = noopLogger,
    private readonly pollIntervalMs: number = POLL_INTERVAL_MS,
  ) {}

  async connect(target: NodeTarget): Promise<void> {
    if (!target.instanceId) {
      throw new Error(`Node ${target.nodeName} has no ec2.instance_id attribute`);
    }

    const status = await this.api.pingStatus(target.instanceId);
    if (status !== 'Online') {
      throw new Error(`SSM agent on ${target.instanceId} is ${status ?? 'not registered'}`);
    }
    this.instanceId = target.instanceId;
  }

  async exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    const instanceId = this.instanceId;
    if (!instanceId || this.disposed) {
      throw new Error('SSM session is not connected');
    }

    // Run Command has no stdin, and anything inlined into the script is kept in the command history.
    if (options.stdin !== undefined) {
      throw new Error('SSM Run Command cannot pass stdin to a command');
    }

    const commandId = await this.api.sendCommand(instanceId, command);
    this.inflight = commandId;

    try {
      for (;;) {
        await sleep(this.pollIntervalMs);
        if (this.disposed) {
          throw new Error(`SSM command ${commandId} was abandoned`);
        }

        let state: InvocationState;
        try {
          state = await this.api.getInvocation(commandId, instanceId);
        } catch (err) {
          // The invocation is not visible for a short while after SendCommand.
          if (err instanceof Error && err.name === 'InvocationDoesNotExist') {
            continue;
          }
          throw err;
        }

        if (!PENDING_STATUSES.has(state.status)) {
          return { stdout: state.stdout, stderr: state.stderr, exitCode: state.exitCode };
        }
      }
    } finally {
      this.inflight = null;
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    const commandId = this.inflight;
    const instanceId = this.instanceId;
    if (commandId && instanceId) {
      void this.api.cancelCommand(commandId, instanceId).catch((err: unknown) => {
        this.logger.warn(`Failed to cancel SSM command ${commandId}: ${describeError(err)}`, { instanceId });
      });
    }
  }
}

export interface SSMTransportFactoryOptions {
  region: string;
  logger?: Logger;
  api?: SsmApi;
}

// All connections share one SSM client for the region.
export function createSSMTransportFactory(options: SSMTransportFactoryOptions): TransportFactory {
  const api = options.api ?? createSsmApi(new SSMClient({ region: options.region }));
  return {
    type: 'ssm',
    create: () => new SSMTransport(api, options.logger),
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

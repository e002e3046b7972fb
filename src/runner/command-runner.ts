import { buildTarget } from './address-resolver.js';
import { parseConnectorOptions, type ConnectorOptions, type ConnectorOptionsInput } from './config.js';
import { Connection } from './connection.js';
import { HostConnectorError, InternalError, RemoteExecutionFailure } from './errors.js';
import type {
  CommandResult,
  HostOperation,
  HostSpec,
  NodeTarget,
  TransportFactory,
} from './executor-interface.js';
import { noopLogger, type Logger } from './logger.js';
import { ResponseSet } from './response-set.js';
import { WorkerPool } from './worker-pool.js';

export interface CommandRunnerOptions {
  logger?: Logger;
}

// Handed to the block of CommandRunner.start; every call targets the same host set.
export interface SessionGroup {
  readonly targets: readonly NodeTarget[];
  run(operation: string | HostOperation): Promise<ResponseSet>;
}

type HostOutcome =
  | { ok: true; result: CommandResult }
  | { ok: false; error: HostConnectorError };

function toOperation(operation: string | HostOperation): HostOperation {
  return typeof operation === 'string' ? session => session.run(operation) : operation;
}

/**
 * Fans an operation out over a set of hosts and collects one outcome per
 * host. Host-level problems (unreachable, refused, timed out, nonzero exit)
 * become failures in the returned ResponseSet; only contract violations
 * reject the run.
 */
export class CommandRunner {
  readonly options: ConnectorOptions;
  protected readonly logger: Logger;
  private readonly pool: WorkerPool;

  constructor(
    private readonly transports: TransportFactory,
    options: ConnectorOptionsInput,
    runnerOptions: CommandRunnerOptions = {},
  ) {
    this.options = parseConnectorOptions(options, transports.type);
    this.pool = new WorkerPool(this.options.maxConcurrency);
    this.logger = runnerOptions.logger ?? noopLogger;
  }

  // Resolve hosts to targets, dropping repeats of the same target.
  targetsFor(hosts: readonly HostSpec[]): NodeTarget[] {
    const targets = new Map<string, NodeTarget>();
    for (const host of hosts) {
      const target = buildTarget(host, this.options);
      if (!targets.has(target.id)) {
        targets.set(target.id, target);
      }
    }
    return Array.from(targets.values());
  }

  run(hosts: readonly HostSpec[], operation: string | HostOperation): Promise<ResponseSet> {
    return this.execute(this.targetsFor(hosts), toOperation(operation));
  }

  async start<T>(hosts: readonly HostSpec[], block?: (group: SessionGroup) => Promise<T> | T): Promise<T> {
    if (typeof block !== 'function') {
      throw new InternalError('A block must be given to start an interactive session');
    }

    const targets = this.targetsFor(hosts);
    const group: SessionGroup = {
      targets,
      run: operation => this.execute(targets, toOperation(operation)),
    };
    return block(group);
  }

  protected async execute(targets: readonly NodeTarget[], operation: HostOperation): Promise<ResponseSet> {
    const responses = new ResponseSet();
    if (targets.length === 0) {
      return responses.seal();
    }

    this.logger.info(`Running on ${targets.length} host(s)`, {
      transport: this.transports.type,
      maxConcurrency: this.pool.maxConcurrency,
    });

    const outcomes = this.pool.run(targets, target => this.runOnHost(target, operation));
    for await (const { item: target, value: outcome } of outcomes) {
      if (outcome.ok) {
        responses.addSuccess(target, outcome.result);
      } else {
        responses.addFailure(target, outcome.error);
      }
    }

    this.logger.info(
      `Finished: ${responses.successes().size} succeeded, ${responses.failures().size} failed`,
    );
    return responses.seal();
  }

  private async runOnHost(target: NodeTarget, operation: HostOperation): Promise<HostOutcome> {
    let connection: Connection | null = null;
    try {
      connection = await Connection.open(target, this.transports.create(target), { logger: this.logger });
      const result = await operation(connection);
      if (result.exitCode !== 0) {
        return this.failed(target, new RemoteExecutionFailure(target, result));
      }
      return { ok: true, result };
    } catch (err) {
      if (err instanceof InternalError) {
        throw err;
      }
      return this.failed(
        target,
        err instanceof HostConnectorError ? err : new RemoteExecutionFailure(target, undefined, err),
      );
    } finally {
      connection?.close();
    }
  }

  private failed(target: NodeTarget, error: HostConnectorError): HostOutcome {
    this.logger.warn(`[${target.host}] ${error.message}`, { host: target.host, kind: error.kind });
    return { ok: false, error };
  }
}

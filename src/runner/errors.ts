import type { CommandResult, NodeTarget } from './executor-interface.js';

export type HostErrorKind =
  | 'TargetUnreachable'
  | 'ConnectError'
  | 'Timeout'
  | 'RemoteExecutionFailure'
  | 'StepFailure';

/**
 * Base class for everything that can go wrong on a single host. These are
 * recovered at the per-host boundary and end up in the failure partition of
 * a ResponseSet; they never abort a run.
 */
export abstract class HostConnectorError extends Error {
  abstract readonly kind: HostErrorKind;

  constructor(
    readonly targetId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TargetUnreachableError extends HostConnectorError {
  readonly kind = 'TargetUnreachable';

  constructor(target: NodeTarget) {
    super(target.id, `No usable address for node ${target.nodeName}`);
  }
}

export class ConnectError extends HostConnectorError {
  readonly kind = 'ConnectError';

  constructor(target: NodeTarget, cause: unknown) {
    super(target.id, `Failed to connect to ${target.host}: ${describeError(cause)}`, { cause });
  }
}

export class TimeoutError extends HostConnectorError {
  readonly kind = 'Timeout';

  constructor(target: NodeTarget, readonly phase: 'connect' | 'exec') {
    super(target.id, `${target.host} exceeded the ${target.timeoutMs}ms timeout during ${phase}`);
  }
}

export class RemoteExecutionFailure extends HostConnectorError {
  readonly kind = 'RemoteExecutionFailure';

  constructor(target: NodeTarget, readonly result?: CommandResult, cause?: unknown) {
    super(
      target.id,
      result
        ? `Command on ${target.host} exited with status ${result.exitCode}`
        : `Operation on ${target.host} failed: ${describeError(cause)}`,
      { cause },
    );
  }
}

export class StepFailure extends HostConnectorError {
  readonly kind = 'StepFailure';

  constructor(readonly step: string, readonly error: HostConnectorError) {
    super(error.targetId, `Bootstrap step ${step} failed: ${error.message}`, { cause: error });
  }
}

/**
 * A broken programming contract (missing callback, bad pool size, double
 * write). Always fatal; never recorded as a host failure.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
  }
}

// Options that cannot produce a working run. Raised before any connection.
export class InvalidOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionsError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

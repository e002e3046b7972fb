import { InternalError, type HostConnectorError } from './errors.js';
import type { CommandResult, NodeTarget } from './executor-interface.js';

export interface HostSuccess {
  target: NodeTarget;
  result: CommandResult;
}

export interface HostFailure {
  target: NodeTarget;
  error: HostConnectorError;
}

/**
 * Per-host outcomes of one run, split into successes and failures. Entries
 * keep the order hosts finished in. Each target is written exactly once, and
 * nothing can be written after the run seals the set.
 */
export class ResponseSet {
  private readonly successMap = new Map<string, HostSuccess>();
  private readonly failureMap = new Map<string, HostFailure>();
  private sealed = false;

  addSuccess(target: NodeTarget, result: CommandResult): void {
    this.assertWritable(target);
    this.successMap.set(target.id, Object.freeze({ target, result: Object.freeze({ ...result }) }));
  }

  addFailure(target: NodeTarget, error: HostConnectorError): void {
    this.assertWritable(target);
    this.failureMap.set(target.id, Object.freeze({ target, error }));
  }

  successes(): ReadonlyMap<string, HostSuccess> {
    return this.successMap;
  }

  failures(): ReadonlyMap<string, HostFailure> {
    return this.failureMap;
  }

  isOk(): boolean {
    return this.failureMap.size === 0;
  }

  get size(): number {
    return this.successMap.size + this.failureMap.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  private assertWritable(target: NodeTarget): void {
    if (this.sealed) {
      throw new InternalError(`ResponseSet is sealed; cannot record ${target.id}`);
    }
    if (this.successMap.has(target.id) || this.failureMap.has(target.id)) {
      throw new InternalError(`Outcome for ${target.id} was already recorded`);
    }
  }
}

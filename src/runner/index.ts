export {
  buildTarget,
  cloudProvider,
  ec2InstanceId,
  isCloud,
  isEc2,
  isEucalyptus,
  isRackspace,
  publicHostname,
  publicIpv4,
  resolveAddress,
  UNKNOWN_ADDRESS,
} from './address-resolver.js';
export { getAttribute, setAttribute } from './attributes.js';
export { CommandRunner } from './command-runner.js';
export type { CommandRunnerOptions, SessionGroup } from './command-runner.js';
export {
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_TIMEOUT_SECONDS,
  loadConfig,
  MAX_TIMEOUT_SECONDS,
  parseBootstrapOptions,
  parseConfig,
  parseConnectorOptions,
} from './config.js';
export type {
  BootstrapOptions,
  BootstrapOptionsInput,
  ConnectorOptions,
  ConnectorOptionsInput,
  FleetConfig,
} from './config.js';
export { Connection } from './connection.js';
export {
  ConnectError,
  HostConnectorError,
  InternalError,
  InvalidOptionsError,
  RemoteExecutionFailure,
  StepFailure,
  TargetUnreachableError,
  TimeoutError,
} from './errors.js';
export type { HostErrorKind } from './errors.js';
export { createTransportFactory } from './executor-factory.js';
export type {
  AttributeTree,
  AttributeValue,
  CloudProvider,
  CommandResult,
  HostOperation,
  HostSession,
  HostSpec,
  NodeRecord,
  NodeTarget,
  Transport,
  TransportFactory,
  TransportType,
} from './executor-interface.js';
export { createLogger, noopLogger } from './logger.js';
export type { Logger } from './logger.js';
export { ResponseSet } from './response-set.js';
export type { HostFailure, HostSuccess } from './response-set.js';
export { createSSHTransportFactory, SSHTransport } from './ssh-executor.js';
export { createSSMTransportFactory, createSsmApi, SSMTransport } from './ssm-executor.js';
export { WorkerPool } from './worker-pool.js';

export { Bootstrapper, BOOTSTRAP_STEPS } from '../bootstrap/sequencer.js';
export type { BootstrapStep, BootstrapStepName } from '../bootstrap/sequencer.js';
export { loadBootstrapContext } from '../bootstrap/context.js';
export type { BootstrapContext } from '../bootstrap/context.js';
export { chefClientCommand, runChefClient, runChefSolo } from '../actions/chef-client.js';

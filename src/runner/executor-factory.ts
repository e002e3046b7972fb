import { InvalidOptionsError } from './errors.js';
import type { TransportFactory, TransportType } from './executor-interface.js';
import type { Logger } from './logger.js';
import { createSSHTransportFactory } from './ssh-executor.js';
import { createSSMTransportFactory } from './ssm-executor.js';

export interface TransportSelection {
  transport: TransportType;
  region?: string;
  logger?: Logger;
}

export function createTransportFactory({ transport, region, logger }: TransportSelection): TransportFactory {
  switch (transport) {
    case 'ssh':
      return createSSHTransportFactory();
    case 'ssm':
      if (!region) {
        throw new InvalidOptionsError('The ssm transport needs a region');
      }
      return createSSMTransportFactory({ region, logger });
    default:
      throw new InvalidOptionsError(`Unknown transport type: ${String(transport)}`);
  }
}

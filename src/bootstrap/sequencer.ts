import { CommandRunner } from '../runner/command-runner.js';
import {
  HostConnectorError,
  InternalError,
  RemoteExecutionFailure,
  StepFailure,
} from '../runner/errors.js';
import type { CommandResult, HostSession, HostSpec } from '../runner/executor-interface.js';
import type { ResponseSet } from '../runner/response-set.js';
import {
  CLIENT_CONFIG_PATH,
  FIRST_BOOT_PATH,
  SECRET_PATH,
  VALIDATOR_KEY_PATH,
  type BootstrapContext,
} from './context.js';
import { agentRunCommand, renderClientConfig, renderFirstBoot } from './templates.js';

export type BootstrapStepName = 'config_render' | 'key_transfer' | 'secret_transfer' | 'agent_run';

export interface BootstrapStep {
  name: BootstrapStepName;
  // Resolves to null when the context gives the step nothing to do.
  run(session: HostSession, context: BootstrapContext): Promise<CommandResult | null>;
}

export const BOOTSTRAP_STEPS: readonly BootstrapStep[] = [
  {
    name: 'config_render',
    async run(session, context) {
      const config = await session.upload(renderClientConfig(context, session.target), CLIENT_CONFIG_PATH, '0644');
      if (config.exitCode !== 0) {
        return config;
      }
      return session.upload(renderFirstBoot(context), FIRST_BOOT_PATH, '0644');
    },
  },
  {
    name: 'key_transfer',
    async run(session, context) {
      return context.validatorKey === undefined
        ? null
        : session.upload(context.validatorKey, VALIDATOR_KEY_PATH);
    },
  },
  {
    name: 'secret_transfer',
    async run(session, context) {
      return context.encryptedDataBagSecret === undefined
        ? null
        : session.upload(context.encryptedDataBagSecret, SECRET_PATH);
    },
  },
  {
    name: 'agent_run',
    run: (session, context) => session.run(agentRunCommand(context)),
  },
];

/**
 * First-time setup of nodes. The steps run in order over one connection per
 * host; the first failing step ends that host's bootstrap with a StepFailure
 * while other hosts carry on.
 */
export class Bootstrapper extends CommandRunner {
  bootstrap(hosts: readonly HostSpec[], context: BootstrapContext): Promise<ResponseSet> {
    return this.execute(this.targetsFor(hosts), session => this.runSteps(session, context));
  }

  private async runSteps(session: HostSession, context: BootstrapContext): Promise<CommandResult> {
    let last: CommandResult = { stdout: '', stderr: '', exitCode: 0 };

    for (const step of BOOTSTRAP_STEPS) {
      let result: CommandResult | null;
      try {
        result = await step.run(session, context);
      } catch (err) {
        if (err instanceof InternalError) {
          throw err;
        }
        throw new StepFailure(
          step.name,
          err instanceof HostConnectorError ? err : new RemoteExecutionFailure(session.target, undefined, err),
        );
      }

      if (result === null) {
        this.logger.debug(`[${session.target.host}] skipping ${step.name}`, { host: session.target.host });
        continue;
      }
      if (result.exitCode !== 0) {
        throw new StepFailure(step.name, new RemoteExecutionFailure(session.target, result));
      }
      this.logger.info(`[${session.target.host}] ${step.name} done`, { host: session.target.host });
      last = result;
    }

    return last;
  }
}

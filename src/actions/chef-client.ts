import type { CommandRunner } from '../runner/command-runner.js';
import type { HostSpec } from '../runner/executor-interface.js';
import type { ResponseSet } from '../runner/response-set.js';
import { shellQuote } from '../runner/shell.js';

export interface ChefClientOptions {
  // Limit the run to these recipes instead of the node's run list.
  overrideRunList?: string[];
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

export function chefClientCommand(options: ChefClientOptions = {}): string {
  const args = ['chef-client'];
  if (options.overrideRunList?.length) {
    args.push('-o', shellQuote(options.overrideRunList.join(',')));
  }
  if (options.logLevel) {
    args.push('-l', options.logLevel);
  }
  return args.join(' ');
}

export function runChefClient(
  runner: CommandRunner,
  hosts: readonly HostSpec[],
  options: ChefClientOptions = {},
): Promise<ResponseSet> {
  return runner.run(hosts, chefClientCommand(options));
}

export function runChefSolo(
  runner: CommandRunner,
  hosts: readonly HostSpec[],
  configPath = '/etc/chef/solo.rb',
): Promise<ResponseSet> {
  return runner.run(hosts, `chef-solo -c ${shellQuote(configPath)}`);
}

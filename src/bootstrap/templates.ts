import { shellQuote } from '../runner/shell.js';
import type { NodeTarget } from '../runner/executor-interface.js';
import { FIRST_BOOT_PATH, SECRET_PATH, VALIDATOR_KEY_PATH, type BootstrapContext } from './context.js';

const INSTALL_SCRIPT_URL = 'https://omnitruck.chef.io/install.sh';

function quoted(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function renderClientConfig(context: BootstrapContext, target: NodeTarget): string {
  const lines = [
    'log_level        :info',
    'log_location     STDOUT',
    `chef_server_url  ${quoted(context.serverUrl)}`,
    `validation_client_name ${quoted(context.validatorClient)}`,
    `validation_key   ${quoted(VALIDATOR_KEY_PATH)}`,
    `node_name        ${quoted(target.nodeName)}`,
  ];
  if (context.encryptedDataBagSecret !== undefined) {
    lines.push(`encrypted_data_bag_secret ${quoted(SECRET_PATH)}`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderFirstBoot(context: BootstrapContext): string {
  return `${JSON.stringify({ ...context.attributes, run_list: context.runList }, null, 2)}\n`;
}

export function agentRunCommand(context: BootstrapContext): string {
  const version = context.chefVersion ? ` -s -- -v ${shellQuote(context.chefVersion)}` : '';
  const install = `command -v chef-client >/dev/null 2>&1 || (curl -sL ${INSTALL_SCRIPT_URL} | bash${version})`;
  return `${install} && chef-client -j ${FIRST_BOOT_PATH} -E ${shellQuote(context.environment)}`;
}

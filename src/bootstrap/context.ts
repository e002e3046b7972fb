import * as fs from 'fs';
import { isAttributeTree } from '../runner/attributes.js';
import { parseBootstrapOptions, type BootstrapOptionsInput } from '../runner/config.js';
import { InvalidOptionsError } from '../runner/errors.js';
import type { AttributeTree, AttributeValue } from '../runner/executor-interface.js';

export const CHEF_DIR = '/etc/chef';
export const CLIENT_CONFIG_PATH = `${CHEF_DIR}/client.rb`;
export const FIRST_BOOT_PATH = `${CHEF_DIR}/first-boot.json`;
export const VALIDATOR_KEY_PATH = `${CHEF_DIR}/validation.pem`;
export const SECRET_PATH = `${CHEF_DIR}/encrypted_data_bag_secret`;

/**
 * Everything a bootstrap needs that is the same for every host. Built once
 * per run and frozen, so concurrent hosts can share it without locking.
 */
export interface BootstrapContext {
  readonly serverUrl: string;
  readonly validatorClient: string;
  readonly environment: string;
  readonly runList: readonly string[];
  readonly attributes: Readonly<AttributeTree>;
  readonly validatorKey?: string;
  readonly encryptedDataBagSecret?: string;
  readonly chefVersion?: string;
}

export function loadBootstrapContext(input: BootstrapOptionsInput): BootstrapContext {
  const options = parseBootstrapOptions(input);

  const validatorKey = options.validatorPath
    ? readRequiredFile(options.validatorPath, 'Validator key')
    : undefined;

  // Trailing newlines are not part of the secret.
  const encryptedDataBagSecret = options.encryptedDataBagSecretPath
    ? readRequiredFile(options.encryptedDataBagSecretPath, 'Encrypted data bag secret').replace(/\r?\n$/, '')
    : undefined;

  return Object.freeze({
    serverUrl: options.serverUrl,
    validatorClient: options.validatorClient,
    environment: options.environment,
    runList: Object.freeze([...options.runList]),
    attributes: deepFreeze(structuredClone(options.attributes)),
    ...(validatorKey !== undefined ? { validatorKey } : {}),
    ...(encryptedDataBagSecret !== undefined ? { encryptedDataBagSecret } : {}),
    ...(options.chefVersion !== undefined ? { chefVersion: options.chefVersion } : {}),
  });
}

function readRequiredFile(filePath: string, label: string): string {
  if (!fs.existsSync(filePath)) {
    throw new InvalidOptionsError(`${label} provided but not found at '${filePath}'`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

function deepFreeze(tree: AttributeTree): AttributeTree {
  for (const value of Object.values(tree)) {
    freezeValue(value);
  }
  return Object.freeze(tree);
}

function freezeValue(value: AttributeValue): void {
  if (Array.isArray(value)) {
    value.forEach(freezeValue);
    Object.freeze(value);
  } else if (isAttributeTree(value)) {
    deepFreeze(value);
  }
}

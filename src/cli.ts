#!/usr/bin/env node

import { parseArgs } from 'util';
import { runChefClient, runChefSolo } from './actions/chef-client.js';
import { loadBootstrapContext } from './bootstrap/context.js';
import { Bootstrapper } from './bootstrap/sequencer.js';
import { setAttribute } from './runner/attributes.js';
import { CommandRunner } from './runner/command-runner.js';
import { loadConfig, type FleetConfig } from './runner/config.js';
import { describeError } from './runner/errors.js';
import { createTransportFactory } from './runner/executor-factory.js';
import type { AttributeTree, AttributeValue, TransportFactory } from './runner/executor-interface.js';
import { createLogger, isLogLevel, type Logger } from './runner/logger.js';
import type { ResponseSet } from './runner/response-set.js';

const USAGE = `
Usage: fleetshell [options] <command>

Options:
  -c, --config <path>       Path to hosts.yaml config file (default: hosts.yaml)
  -h, --help                Show this help message
  --log-level <level>       error | warn | info | debug (default: warn)
  --concurrency <n>         Maximum hosts worked on at once (overrides config)
  --attr <path=value>       First-boot attribute for bootstrap (repeatable)

Commands:
  check                     Verify connectivity to all nodes
  exec <command>            Execute a command on all nodes
  chef-client               Run chef-client on all nodes
  chef-solo                 Run chef-solo on all nodes
  bootstrap                 Install and register the agent on all nodes

Examples:
  fleetshell --config hosts.yaml check
  fleetshell exec "systemctl status chef-client"
  fleetshell bootstrap --attr app.port=8080
`;

interface CliContext {
  config: FleetConfig;
  logger: Logger;
  transports: TransportFactory;
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      config: { type: 'string', short: 'c', default: 'hosts.yaml' },
      help: { type: 'boolean', short: 'h' },
      'log-level': { type: 'string', default: 'warn' },
      concurrency: { type: 'string' },
      attr: { type: 'string', multiple: true },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    process.exit(0);
  }

  const level = values['log-level'] ?? 'warn';
  if (!isLogLevel(level)) {
    console.error(`Error: unknown log level: ${level}`);
    process.exit(1);
  }

  const config = loadConfig(values.config ?? 'hosts.yaml');
  if (values.concurrency !== undefined) {
    config.connector.maxConcurrency = Number(values.concurrency);
  }

  const logger = createLogger(level);
  const context: CliContext = {
    config,
    logger,
    transports: createTransportFactory({ transport: config.transport, region: config.region, logger }),
  };

  const [command, ...args] = positionals;
  let ok: boolean;

  switch (command) {
    case 'check':
      ok = await checkConnectivity(context);
      break;

    case 'exec':
      if (args.length === 0) {
        console.error('Error: exec requires a command argument');
        process.exit(1);
      }
      ok = await execOnAll(context, args.join(' '));
      break;

    case 'chef-client':
      ok = report(await runChefClient(runnerFor(context), config.nodes), 'chef-client');
      break;

    case 'chef-solo':
      ok = report(await runChefSolo(runnerFor(context), config.nodes), 'chef-solo');
      break;

    case 'bootstrap':
      ok = await bootstrapAll(context, values.attr ?? []);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error('Run with --help for usage information');
      process.exit(1);
  }

  if (!ok) {
    process.exit(1);
  }
}

function runnerFor({ config, logger, transports }: CliContext): CommandRunner {
  return new CommandRunner(transports, config.connector, { logger });
}

async function checkConnectivity(context: CliContext): Promise<boolean> {
  console.log('Checking connectivity to all nodes...\n');

  const responses = await runnerFor(context).run(context.config.nodes, 'echo "ok"');
  for (const { target } of responses.successes().values()) {
    console.log(`  ✓ ${target.nodeName} (${target.host}): connected`);
  }
  for (const { target, error } of responses.failures().values()) {
    console.log(`  ✗ ${target.nodeName} (${target.host}): ${error.kind}: ${error.message}`);
  }

  console.log('');
  console.log(responses.isOk() ? 'All nodes reachable.' : 'Some nodes failed connectivity check.');
  return responses.isOk();
}

async function execOnAll(context: CliContext, command: string): Promise<boolean> {
  console.log(`Executing on all nodes: ${command}\n`);

  const responses = await runnerFor(context).run(context.config.nodes, command);

  for (const { target, result } of responses.successes().values()) {
    console.log(`--- ${target.nodeName} (exit ${result.exitCode}) ---`);
    if (result.stdout) console.log(result.stdout);
    if (result.stderr) console.log(`stderr: ${result.stderr}`);
    console.log('');
  }
  for (const { target, error } of responses.failures().values()) {
    console.log(`--- ${target.nodeName} (${error.kind}) ---`);
    console.log(error.message);
    console.log('');
  }
  return responses.isOk();
}

async function bootstrapAll(context: CliContext, attrs: string[]): Promise<boolean> {
  const options = context.config.bootstrap;
  if (!options) {
    console.error('Error: bootstrap requires a bootstrap section in the config');
    return false;
  }

  const attributes: AttributeTree = structuredClone(options.attributes ?? {});
  for (const assignment of attrs) {
    const eq = assignment.indexOf('=');
    if (eq <= 0) {
      console.error(`Error: --attr expects path=value, got "${assignment}"`);
      return false;
    }
    setAttribute(attributes, assignment.slice(0, eq), parseAttributeValue(assignment.slice(eq + 1)));
  }

  const bootstrapContext = loadBootstrapContext({ ...options, attributes });
  const bootstrapper = new Bootstrapper(context.transports, context.config.connector, { logger: context.logger });

  console.log(`Bootstrapping ${context.config.nodes.length} node(s)...\n`);
  return report(await bootstrapper.bootstrap(context.config.nodes, bootstrapContext), 'bootstrap');
}

function report(responses: ResponseSet, label: string): boolean {
  for (const { target } of responses.successes().values()) {
    console.log(`  ✓ ${target.nodeName}: ok`);
  }
  for (const { target, error } of responses.failures().values()) {
    console.log(`  ✗ ${target.nodeName}: ${error.message}`);
  }

  console.log('');
  console.log(responses.isOk()
    ? `${label} completed successfully on all nodes.`
    : `${label} failed on ${responses.failures().size} of ${responses.size} node(s).`);
  return responses.isOk();
}

function parseAttributeValue(raw: string): AttributeValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.trim() !== '' && !Number.isNaN(Number(raw))) return Number(raw);
  return raw;
}

main().catch((err: unknown) => {
  console.error('Error:', describeError(err));
  process.exit(1);
});

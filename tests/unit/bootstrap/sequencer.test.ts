import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { loadBootstrapContext, type BootstrapContext } from '../../../src/bootstrap/context.js';
import { Bootstrapper } from '../../../src/bootstrap/sequencer.js';
import { StepFailure } from '../../../src/runner/errors.js';
import { FakeFleet } from '../../support/fake-transport.js';

const credentials = { user: 'deploy', password: 'test-secret', sudo: false };

describe('Bootstrapper', () => {
  let dir: string;
  let context: BootstrapContext;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bootstrap-'));
    const validatorPath = path.join(dir, 'validator.pem');
    const secretPath = path.join(dir, 'secret');
    fs.writeFileSync(validatorPath, 'test-validator-key\n');
    fs.writeFileSync(secretPath, 'test-secret\n');

    context = loadBootstrapContext({
      serverUrl: 'https://chef.example/organizations/acme',
      validatorPath,
      encryptedDataBagSecretPath: secretPath,
      environment: 'staging',
      runList: ['role[web]'],
    });
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('runs every step in order on each host', async () => {
    const fleet = new FakeFleet();
    const responses = await new Bootstrapper(fleet, credentials).bootstrap(['web.example'], context);

    expect(responses.isOk()).toBe(true);
    const commands = fleet.commandsFor('web.example');
    expect(commands).toHaveLength(5);
    expect(commands[0]).toContain(`> '/etc/chef/client.rb'`);
    expect(commands[1]).toContain(`> '/etc/chef/first-boot.json'`);
    expect(commands[2]).toContain(`> '/etc/chef/validation.pem' && chmod 0600`);
    expect(commands[3]).toContain(`> '/etc/chef/encrypted_data_bag_secret'`);
    expect(commands[4]).toBe(
      `command -v chef-client >/dev/null 2>&1 || (curl -sL https://omnitruck.chef.io/install.sh | bash) && ` +
      `chef-client -j /etc/chef/first-boot.json -E 'staging'`,
    );
  });

  it('stops a host at the failing step without affecting other hosts', async () => {
    const fleet = new FakeFleet({
      'bad.example': {
        exec: command => command.includes('/etc/chef/validation.pem')
          ? { stdout: '', stderr: 'permission denied', exitCode: 1 }
          : { stdout: 'ok', stderr: '', exitCode: 0 },
      },
    });

    const responses = await new Bootstrapper(fleet, credentials).bootstrap(['bad.example', 'good.example'], context);

    expect(responses.successes().size).toBe(1);
    expect(responses.successes().has('good.example')).toBe(true);
    expect(responses.failures().size).toBe(1);

    const error = responses.failures().get('bad.example')?.error;
    expect(error).toBeInstanceOf(StepFailure);
    expect(error).toMatchObject({ step: 'key_transfer', error: { kind: 'RemoteExecutionFailure' } });

    const badCommands = fleet.commandsFor('bad.example');
    expect(badCommands).toHaveLength(3);
    expect(badCommands.some(c => c.includes('/etc/chef/encrypted_data_bag_secret'))).toBe(false);
    expect(badCommands.some(c => c.includes('chef-client -j'))).toBe(false);
    expect(fleet.commandsFor('good.example')).toHaveLength(5);
  });

  it('skips the key and secret steps when they are not configured', async () => {
    const fleet = new FakeFleet();
    const minimal = loadBootstrapContext({ serverUrl: 'https://chef.example' });

    const responses = await new Bootstrapper(fleet, credentials).bootstrap(['web.example'], minimal);

    expect(responses.isOk()).toBe(true);
    expect(fleet.commandsFor('web.example')).toHaveLength(3);
  });

  it('wraps a timeout inside a step', async () => {
    const fleet = new FakeFleet({ 'slow.example': { execDelayMs: 300 } });
    const responses = await new Bootstrapper(fleet, { ...credentials, timeout: 0.05 })
      .bootstrap(['slow.example'], context);

    expect(responses.failures().get('slow.example')?.error).toMatchObject({
      kind: 'StepFailure',
      step: 'config_render',
      error: { kind: 'Timeout' },
    });
  });

  it('records a connection failure without a step', async () => {
    const fleet = new FakeFleet({ 'down.example': { connectError: new Error('connection refused') } });
    const responses = await new Bootstrapper(fleet, credentials).bootstrap(['down.example'], context);

    expect(responses.failures().get('down.example')?.error.kind).toBe('ConnectError');
    expect(fleet.commands).toEqual([]);
  });
});

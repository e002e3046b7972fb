import * as fs from 'fs';
import * as yaml from 'yaml';
import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import type { AttributeValue, NodeRecord, TransportType } from './executor-interface.js';

export const DEFAULT_TIMEOUT_SECONDS = 5.0;
export const DEFAULT_MAX_CONCURRENCY = 8;

const AttributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(AttributeValueSchema),
    z.record(AttributeValueSchema),
  ]),
);

const AttributeTreeSchema = z.record(AttributeValueSchema);

// Largest delay a Node timer can hold, in whole seconds.
export const MAX_TIMEOUT_SECONDS = 2_147_483;

// SSM Run Command executes as root whatever the configured user.
const SSM_USER = 'root';

const TimeoutSchema = z.number().positive().finite().max(MAX_TIMEOUT_SECONDS);

const KeysSchema = z.union([z.string().min(1), z.array(z.string().min(1))]);

interface CredentialFields {
  user?: string;
  password?: string;
  keys: string[];
}

// SSH needs a login; the SSM agent authenticates through IAM instead.
function requireCredentials(opts: CredentialFields, ctx: z.RefinementCtx, prefix: string[] = []): void {
  if (opts.user === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'a user is required', path: [...prefix, 'user'] });
  }
  if (opts.password === undefined && opts.keys.length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'either a password or at least one key is required',
      path: [...prefix, 'password'],
    });
  }
}

function keyList(keys: string | string[] | undefined): string[] {
  return keys === undefined ? [] : Array.isArray(keys) ? keys : [keys];
}

const ConnectorFieldsSchema = z.object({
  user: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  keys: KeysSchema.optional().transform(keyList),
  timeout: TimeoutSchema.default(DEFAULT_TIMEOUT_SECONDS),
  sudo: z.boolean().default(true),
  maxConcurrency: z.number().int().positive().default(DEFAULT_MAX_CONCURRENCY),
});

function connectorOptionsSchema(transport: TransportType) {
  return ConnectorFieldsSchema
    .superRefine((opts, ctx) => {
      if (transport === 'ssh') {
        requireCredentials(opts, ctx);
      }
    })
    .transform(({ user, ...rest }) => ({ ...rest, user: user ?? SSM_USER }));
}

export type ConnectorOptionsInput = z.input<typeof ConnectorFieldsSchema>;
export type ConnectorOptions = z.output<ReturnType<typeof connectorOptionsSchema>>;

const BootstrapOptionsSchema = z.object({
  serverUrl: z.string().url(),
  validatorClient: z.string().min(1).default('chef-validator'),
  validatorPath: z.string().min(1).optional(),
  encryptedDataBagSecretPath: z.string().min(1).optional(),
  environment: z.string().min(1).default('_default'),
  runList: z.array(z.string().min(1)).default([]),
  attributes: AttributeTreeSchema.default({}),
  chefVersion: z.string().min(1).optional(),
});

export type BootstrapOptionsInput = z.input<typeof BootstrapOptionsSchema>;
export type BootstrapOptions = z.output<typeof BootstrapOptionsSchema>;

const NodeRecordSchema = z.object({
  name: z.string().min(1),
  automatic: AttributeTreeSchema.default({}),
  normal: AttributeTreeSchema.optional(),
  default: AttributeTreeSchema.optional(),
  override: AttributeTreeSchema.optional(),
  chefEnvironment: z.string().min(1).optional(),
  runList: z.array(z.string()).optional(),
});

const FleetConfigSchema = z
  .object({
    transport: z.enum(['ssh', 'ssm']).default('ssh'),
    region: z.string().min(1).optional(),
    ssh: z
      .object({
        user: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
        keys: KeysSchema.optional(),
        timeout: TimeoutSchema.optional(),
        sudo: z.boolean().optional(),
      })
      .optional(),
    maxConcurrency: z.number().int().positive().optional(),
    bootstrap: BootstrapOptionsSchema.optional(),
    nodes: z.array(NodeRecordSchema).min(1),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.transport === 'ssm' && cfg.region === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'region is required for the ssm transport',
        path: ['region'],
      });
    }
    if (cfg.transport === 'ssh') {
      if (cfg.ssh === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'required for the ssh transport', path: ['ssh'] });
      } else {
        requireCredentials({ ...cfg.ssh, keys: keyList(cfg.ssh.keys) }, ctx, ['ssh']);
      }
    }
  });

export interface FleetConfig {
  transport: TransportType;
  region?: string;
  connector: ConnectorOptionsInput;
  bootstrap?: BootstrapOptionsInput;
  nodes: NodeRecord[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

export function parseConnectorOptions(
  input: ConnectorOptionsInput,
  transport: TransportType = 'ssh',
): ConnectorOptions {
  const result = connectorOptionsSchema(transport).safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(`Invalid connector options:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseBootstrapOptions(input: BootstrapOptionsInput): BootstrapOptions {
  const result = BootstrapOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidOptionsError(`Invalid bootstrap options:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseConfig(raw: unknown): FleetConfig {
  const result = FleetConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new InvalidOptionsError(`Invalid config:\n${formatIssues(result.error)}`);
  }

  const { ssh, maxConcurrency, ...rest } = result.data;
  return {
    transport: rest.transport,
    region: rest.region,
    connector: { ...ssh, maxConcurrency },
    bootstrap: rest.bootstrap,
    nodes: rest.nodes,
  };
}

export function loadConfig(configPath: string): FleetConfig {
  if (!fs.existsSync(configPath)) {
    throw new InvalidOptionsError(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(yaml.parse(content));
}

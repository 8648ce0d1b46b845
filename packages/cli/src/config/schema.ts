import { z } from 'zod';
import type { UnsignedPolicy } from '@newsdesk/core';
import { ToolRegistry, TOOL_GROUP_NAMES } from '@newsdesk/tools';

const keyIdPattern = /^[0-9a-f]{16}$/;

const corpusSchema = z.object({
  path: z.string().min(1).optional(),
}).strict();

const signingSchema = z.object({
  private_key: z.string().min(1).optional(),
  private_key_path: z.string().min(1).optional(),
  policy: z.enum(['require', 'allow-unsigned']).optional(),
  public_keys: z.record(
    z.string().regex(keyIdPattern, 'Key ids are 16 lowercase hex characters'),
    z.string().min(1),
  ).optional(),
}).strict().superRefine((signing, ctx) => {
  if (signing.private_key && signing.private_key_path) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Set only one of private_key or private_key_path',
      path: ['private_key_path'],
    });
  }
});

const serverSchema = z.object({
  name: z.string().min(1).optional(),
  transport: z.enum(['stdio', 'http']).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
}).strict();

const toolsSchema = z.object({
  enabled: z.array(z.string().refine(
    name => ToolRegistry.isAvailable(name),
    name => ({ message: `Unknown tool or group "${name}". Groups: ${TOOL_GROUP_NAMES.join(', ')}` }),
  )).min(1).optional(),
}).strict();

const querySchema = z.object({
  max_limit: z.number().int().positive().optional(),
  default_limit: z.number().int().positive().optional(),
  wire_default_limit: z.number().int().positive().optional(),
}).strict();

const ConfigSchema = z.object({
  corpus: corpusSchema.optional(),
  signing: signingSchema.optional(),
  server: serverSchema.optional(),
  tools: toolsSchema.optional(),
  query: querySchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;

export type TransportKind = 'stdio' | 'http';

export interface SigningConfig {
  /** PEM text of the Ed25519 private key */
  private_key?: string;
  private_key_path?: string;
  policy: UnsignedPolicy;
  /** keyId → PEM file of a public key, used by `verify` */
  public_keys: Record<string, string>;
}

export interface Config {
  corpus: {
    path: string;
  };
  signing: SigningConfig;
  server: {
    name: string;
    transport: TransportKind;
    host: string;
    port: number;
  };
  tools: {
    enabled: string[];
  };
  query: {
    max_limit: number;
    default_limit: number;
    wire_default_limit: number;
  };
}

export const ConfigDefaults: Config = {
  corpus: {
    path: './corpus.json',
  },
  signing: {
    policy: 'require',
    public_keys: {},
  },
  server: {
    name: 'newsdesk',
    transport: 'stdio',
    host: '127.0.0.1',
    port: 3030,
  },
  tools: {
    enabled: [...TOOL_GROUP_NAMES],
  },
  query: {
    max_limit: 100,
    default_limit: 20,
    wire_default_limit: 50,
  },
};

export { ConfigSchema };

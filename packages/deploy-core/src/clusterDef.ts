import { z } from 'zod';

import { ConfigurationError } from './errors';
import { parseYaml, stringifyYaml } from './yaml.util';

export const CLUSTER_SERVICES = ['kv', 'n1ql', 'index', 'fts', 'cbas', 'eventing', 'backup'] as const;
export type ClusterService = (typeof CLUSTER_SERVICES)[number];

const DURATION_UNITS_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/** Parses `90s`, `1h30m`, `2d` style durations into milliseconds. */
export function parseDuration(text: string): number {
  const trimmed = text.trim();
  const re = /(\d+)(ms|s|m|h|d)/g;
  let total = 0;
  let consumed = 0;
  for (const match of trimmed.matchAll(re)) {
    if (match.index !== consumed) break;
    total += Number(match[1]) * DURATION_UNITS_MS[match[2]];
    consumed += match[0].length;
  }
  if (!trimmed || consumed !== trimmed.length) {
    throw new ConfigurationError(`Invalid duration '${text}'`);
  }
  return total;
}

const durationSchema = z.union([z.number().int().positive(), z.string().min(1)]).transform((value, ctx) => {
  if (typeof value === 'number') return value;
  try {
    return parseDuration(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    return z.NEVER;
  }
});

export const nodeGroupSchema = z
  .object({
    count: z.number().int().positive().default(1),
    version: z.string().min(1),
    buildNo: z.number().int().nonnegative().default(0),
    communityEdition: z.boolean().default(false),
    serverless: z.boolean().default(false),
    columnar: z.boolean().default(false),
    services: z.array(z.enum(CLUSTER_SERVICES)).min(1).default(['kv', 'n1ql', 'index']),
    name: z.string().min(1).optional(),
  })
  .strict();

export const clusterDefinitionSchema = z
  .object({
    purpose: z.string().default(''),
    expiry: durationSchema.default('1h'),
    nodeGroups: z.array(nodeGroupSchema).min(1, 'at least one node group is required'),
  })
  .strict();

export type NodeGroupDefinition = z.infer<typeof nodeGroupSchema>;
/** Parsed cluster definition; `expiry` is in milliseconds. */
export type ClusterDefinition = z.infer<typeof clusterDefinitionSchema>;
export type ClusterDefinitionInput = z.input<typeof clusterDefinitionSchema>;

export function parseClusterDefinition(input: unknown): ClusterDefinition {
  const parsed = clusterDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid cluster definition: ${details}`);
  }
  return parsed.data;
}

export function parseClusterDefinitionYaml(text: string): ClusterDefinition {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigurationError('Cluster definition is not valid YAML', { cause: err });
  }
  return parseClusterDefinition(raw);
}

export function stringifyClusterDefinition(def: ClusterDefinition): string {
  return stringifyYaml(def);
}

export function countNodes(def: Pick<ClusterDefinition, 'nodeGroups'>): number {
  return def.nodeGroups.reduce((sum, group) => sum + group.count, 0);
}

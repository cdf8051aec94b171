import { z } from 'zod';

export const cursorPagesSchema = z.object({
  last: z.number().int(),
  page: z.number().int(),
  perPage: z.number().int().optional(),
  totalItems: z.number().int().optional(),
});

export const cursorSchema = z.object({
  pages: cursorPagesSchema.optional(),
});

export const resourceOf = <S extends z.ZodTypeAny>(data: S) => z.object({ data });

export const pagedOf = <S extends z.ZodTypeAny>(item: S) =>
  z.object({
    cursor: cursorSchema.optional(),
    data: z.array(item),
  });

export const pagedResourcesOf = <S extends z.ZodTypeAny>(item: S) => pagedOf(resourceOf(item));

export const projectSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(''),
  tenantId: z.string().optional(),
  clusterCount: z.number().int().default(0),
  createdAt: z.string().optional(),
});

export const clusterSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().default(''),
  tenantId: z.string().optional(),
  createdAt: z.string().optional(),
  config: z.object({ version: z.string().optional(), singleAz: z.boolean().optional() }).optional(),
  connect: z.object({ srv: z.string() }).optional(),
  project: z.object({ id: z.string(), name: z.string().optional() }).optional(),
  provider: z.object({ name: z.string(), region: z.string().optional() }).optional(),
  status: z.object({ state: z.string() }),
});

export const createdSchema = z.object({ id: z.string() });

export const clusterJobSchema = z.object({
  id: z.string(),
  jobType: z.string(),
  clusterId: z.string().optional(),
  completionPercentage: z.number().default(0),
  currentStep: z.string().optional(),
  startTime: z.string().optional(),
});

export const deploymentOptionsSchema = z.object({
  suggestedCidr: z.string().default(''),
  cidrBlacklist: z.array(z.string()).default([]),
  serverVersions: z
    .object({
      defaultVersion: z.string().default(''),
      versions: z.array(z.string()).default([]),
    })
    .default({}),
});

export const allowListEntrySchema = z.object({
  id: z.string(),
  cidr: z.string(),
  comment: z.string().default(''),
  type: z.string().optional(),
  status: z.string().optional(),
  createdAt: z.string().optional(),
});

export const privateEndpointSchema = z.object({
  enabled: z.boolean(),
  /** idle, enabling or enabled */
  status: z.string(),
});

export const privateEndpointDetailsSchema = z.object({
  enabled: z.boolean(),
  privateDns: z.string().default(''),
  serviceName: z.string().default(''),
});

export const privateEndpointLinkSchema = z.object({
  endpointId: z.string(),
  /** pendingAcceptance, pending, linked or rejected */
  status: z.string(),
  createdAt: z.string().optional(),
});

export const linkCommandSchema = z.object({ command: z.string() });

/** Users come back keyed `ID`; newer replies use `id`. */
export const databaseUserSchema = z
  .object({
    id: z.string().optional(),
    ID: z.string().optional(),
    name: z.string(),
    permissions: z.record(z.object({ buckets: z.array(z.string()).optional() })).default({}),
  })
  .transform(({ id, ID, ...rest }) => ({ id: id ?? ID ?? '', ...rest }));

export const bucketListSchema = z.object({
  buckets: resourceOf(z.array(resourceOf(z.object({ id: z.string().optional(), name: z.string() })))),
  freeMemoryInMb: z.number().optional(),
  totalMemoryInMb: z.number().optional(),
});

export const trustedCaSchema = z.object({
  id: z.number().int(),
  subject: z.string(),
  notBefore: z.string().optional(),
  notAfter: z.string().optional(),
  pem: z.string(),
});

export const sessionSchema = z.object({ jwt: z.string().min(1) });

export type CursorPages = z.infer<typeof cursorPagesSchema>;
export type Project = z.infer<typeof projectSchema>;
export type CloudCluster = z.infer<typeof clusterSchema>;
export type ClusterJob = z.infer<typeof clusterJobSchema>;
export type DeploymentOptions = z.infer<typeof deploymentOptionsSchema>;
export type AllowListEntry = z.infer<typeof allowListEntrySchema>;
export type PrivateEndpoint = z.infer<typeof privateEndpointSchema>;
export type PrivateEndpointDetails = z.infer<typeof privateEndpointDetailsSchema>;
export type PrivateEndpointLink = z.infer<typeof privateEndpointLinkSchema>;
export type DatabaseUser = z.infer<typeof databaseUserSchema>;
export type BucketList = z.infer<typeof bucketListSchema>;
export type TrustedCa = z.infer<typeof trustedCaSchema>;

/** One page of a listing: items plus the cursor telling how many pages exist. */
export type Page<T> = {
  cursor?: { pages?: CursorPages };
  data: T[];
};

export type Resource<T> = { data: T };

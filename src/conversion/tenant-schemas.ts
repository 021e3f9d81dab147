import type {
  RbacV1Subject,
  V1LimitRangeSpec,
  V1NetworkPolicySpec,
  V1ResourceQuotaSpec,
} from '@kubernetes/client-node';
import { z } from 'zod';
import { ConversionTypeError } from '../errors/conversion.error.js';
import {
  ImagePullPolicy,
  LEGACY_API_VERSION,
  OwnerKind,
  ProxyOperation,
  ProxyServiceKind,
  ResourceQuotaScope,
  TENANT_API_VERSION,
  TENANT_KIND,
  type LegacyTenantConfig,
  type TenantConfig,
  type TenantObject,
} from '../types/tenant.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Kubernetes specs nested in a Tenant are carried over as they are.
const networkPolicySpec = z.custom<V1NetworkPolicySpec>(isRecord, 'expected a NetworkPolicy spec');
const limitRangeSpec = z.custom<V1LimitRangeSpec>(isRecord, 'expected a LimitRange spec');
const resourceQuotaSpec = z.custom<V1ResourceQuotaSpec>(isRecord, 'expected a ResourceQuota spec');
const rbacSubject = z.custom<RbacV1Subject>(isRecord, 'expected an RBAC subject');

const stringMap = z.record(z.string());

const objectMeta = z
  .object({
    name: z.string().optional(),
    labels: stringMap.optional(),
    annotations: stringMap.optional(),
  })
  .passthrough();

const ownerRef = z.object({
  kind: z.nativeEnum(OwnerKind),
  name: z.string().min(1),
});

const owner = ownerRef.extend({
  proxySettings: z
    .array(
      z.object({
        kind: z.nativeEnum(ProxyServiceKind),
        operations: z.array(z.nativeEnum(ProxyOperation)),
      }),
    )
    .optional(),
});

const additionalMetadata = z.object({
  additionalLabels: stringMap.optional(),
  additionalAnnotations: stringMap.optional(),
});

const allowedList = z.object({
  allowed: z.array(z.string()).optional(),
  allowedRegex: z.string().optional(),
});

const additionalRoleBinding = z.object({
  clusterRoleName: z.string(),
  subjects: z.array(rbacSubject).default([]),
});

const externalServiceIPs = z.object({
  allowed: z.array(z.string()).default([]),
});

const status = z
  .object({
    size: z.number().int().default(0),
    namespaces: z.array(z.string()).default([]),
  })
  .default({});

const sharedSpecFields = {
  namespaceQuota: z.number().int().optional(),
  namespacesMetadata: additionalMetadata.optional(),
  storageClasses: allowedList.optional(),
  ingressClasses: allowedList.optional(),
  ingressHostnames: allowedList.optional(),
  containerRegistries: allowedList.optional(),
  nodeSelector: stringMap.optional(),
  additionalRoleBindings: z.array(additionalRoleBinding).optional(),
  externalServiceIPs: externalServiceIPs.optional(),
};

export const legacyTenantSchema = z.object({
  apiVersion: z.literal(LEGACY_API_VERSION),
  kind: z.literal(TENANT_KIND),
  metadata: objectMeta.default({}),
  spec: z.object({
    ...sharedSpecFields,
    owner: ownerRef,
    servicesMetadata: additionalMetadata.optional(),
    networkPolicies: z.array(networkPolicySpec).optional(),
    limitRanges: z.array(limitRangeSpec).optional(),
    resourceQuotas: z.array(resourceQuotaSpec).optional(),
  }),
  status,
});

export const tenantSchema = z.object({
  apiVersion: z.literal(TENANT_API_VERSION),
  kind: z.literal(TENANT_KIND),
  metadata: objectMeta.default({}),
  spec: z.object({
    ...sharedSpecFields,
    owners: z.array(owner).nonempty(),
    serviceOptions: z
      .object({
        additionalMetadata: additionalMetadata.optional(),
        allowedServices: z
          .object({
            nodePort: z.boolean().optional(),
            externalName: z.boolean().optional(),
          })
          .optional(),
      })
      .optional(),
    priorityClasses: allowedList.optional(),
    networkPolicies: z.object({ items: z.array(networkPolicySpec) }).optional(),
    limitRanges: z.object({ items: z.array(limitRangeSpec) }).optional(),
    resourceQuotas: z
      .object({
        scope: z.nativeEnum(ResourceQuotaScope).default(ResourceQuotaScope.Tenant),
        items: z.array(resourceQuotaSpec),
      })
      .optional(),
    imagePullPolicies: z.array(z.nativeEnum(ImagePullPolicy)).optional(),
  }),
  status,
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseLegacyTenant(raw: unknown): LegacyTenantConfig {
  const result = legacyTenantSchema.safeParse(raw);
  if (!result.success) {
    throw new ConversionTypeError(LEGACY_API_VERSION, TENANT_KIND, describeIssues(result.error));
  }
  return result.data;
}

export function parseTenant(raw: unknown): TenantConfig {
  const result = tenantSchema.safeParse(raw);
  if (!result.success) {
    throw new ConversionTypeError(TENANT_API_VERSION, TENANT_KIND, describeIssues(result.error));
  }
  return result.data;
}

/**
 * Decodes an untyped object into one of the two Tenant versions, chosen by
 * its `apiVersion`. Anything else is rejected with a `ConversionTypeError`.
 */
export function parseTenantObject(raw: unknown): TenantObject {
  if (!isRecord(raw)) {
    throw new ConversionTypeError('', '', 'expected an object');
  }
  const apiVersion = typeof raw['apiVersion'] === 'string' ? raw['apiVersion'] : '';
  const kind = typeof raw['kind'] === 'string' ? raw['kind'] : '';

  if (kind !== TENANT_KIND) {
    throw new ConversionTypeError(apiVersion, kind, `only ${TENANT_KIND} objects can be converted`);
  }

  switch (apiVersion) {
    case LEGACY_API_VERSION:
      return parseLegacyTenant(raw);
    case TENANT_API_VERSION:
      return parseTenant(raw);
    default:
      throw new ConversionTypeError(apiVersion, kind, 'unsupported API version');
  }
}

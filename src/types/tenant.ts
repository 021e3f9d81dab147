import type {
  RbacV1Subject,
  V1LimitRangeSpec,
  V1NetworkPolicySpec,
  V1ResourceQuotaSpec,
} from '@kubernetes/client-node';

export const TENANT_API_GROUP = 'capsule.clastix.io';
export const TENANT_KIND = 'Tenant';
export const LEGACY_API_VERSION = `${TENANT_API_GROUP}/v1alpha1` as const;
export const TENANT_API_VERSION = `${TENANT_API_GROUP}/v1beta1` as const;

export enum OwnerKind {
  User = 'User',
  Group = 'Group',
  ServiceAccount = 'ServiceAccount',
}

export enum ProxyServiceKind {
  Nodes = 'Nodes',
  StorageClasses = 'StorageClasses',
  IngressClasses = 'IngressClasses',
  PriorityClasses = 'PriorityClasses',
}

export enum ProxyOperation {
  List = 'List',
  Update = 'Update',
  Delete = 'Delete',
}

export enum ResourceQuotaScope {
  Namespace = 'Namespace',
  Tenant = 'Tenant',
}

export enum ImagePullPolicy {
  Always = 'Always',
  Never = 'Never',
  IfNotPresent = 'IfNotPresent',
}

/**
 * Object metadata. Only the fields the conversion reads are typed, everything
 * else is carried over untouched.
 */
export interface ObjectMeta {
  name?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  [field: string]: unknown;
}

export interface OwnerRef {
  kind: OwnerKind;
  name: string;
}

export interface ProxySettings {
  kind: ProxyServiceKind;
  operations: ProxyOperation[];
}

export interface OwnerSpec extends OwnerRef {
  proxySettings?: ProxySettings[];
}

export interface AdditionalMetadataSpec {
  additionalLabels?: Record<string, string>;
  additionalAnnotations?: Record<string, string>;
}

/** Exact names plus an optional regular expression. */
export interface AllowedListSpec {
  allowed?: string[];
  allowedRegex?: string;
}

export interface AdditionalRoleBindingsSpec {
  clusterRoleName: string;
  subjects: RbacV1Subject[];
}

export interface ExternalServiceIPsSpec {
  allowed: string[];
}

export interface AllowedServices {
  nodePort?: boolean;
  externalName?: boolean;
}

export interface ServiceOptions {
  additionalMetadata?: AdditionalMetadataSpec;
  allowedServices?: AllowedServices;
}

export interface NetworkPolicySpec {
  items: V1NetworkPolicySpec[];
}

export interface LimitRangesSpec {
  items: V1LimitRangeSpec[];
}

export interface ResourceQuotaSpec {
  scope: ResourceQuotaScope;
  items: V1ResourceQuotaSpec[];
}

/** Written by the reconciler; both versions share the same shape. */
export interface TenantStatus {
  size: number;
  namespaces: string[];
}

export interface TenantSpec {
  /** The first owner is the one v1alpha1 keeps as `spec.owner`. */
  owners: [OwnerSpec, ...OwnerSpec[]];
  namespaceQuota?: number;
  namespacesMetadata?: AdditionalMetadataSpec;
  serviceOptions?: ServiceOptions;
  storageClasses?: AllowedListSpec;
  ingressClasses?: AllowedListSpec;
  ingressHostnames?: AllowedListSpec;
  containerRegistries?: AllowedListSpec;
  priorityClasses?: AllowedListSpec;
  nodeSelector?: Record<string, string>;
  networkPolicies?: NetworkPolicySpec;
  limitRanges?: LimitRangesSpec;
  resourceQuotas?: ResourceQuotaSpec;
  additionalRoleBindings?: AdditionalRoleBindingsSpec[];
  externalServiceIPs?: ExternalServiceIPsSpec;
  imagePullPolicies?: ImagePullPolicy[];
}

export interface LegacyTenantSpec {
  owner: OwnerRef;
  namespaceQuota?: number;
  namespacesMetadata?: AdditionalMetadataSpec;
  servicesMetadata?: AdditionalMetadataSpec;
  storageClasses?: AllowedListSpec;
  ingressClasses?: AllowedListSpec;
  ingressHostnames?: AllowedListSpec;
  containerRegistries?: AllowedListSpec;
  nodeSelector?: Record<string, string>;
  networkPolicies?: V1NetworkPolicySpec[];
  limitRanges?: V1LimitRangeSpec[];
  resourceQuotas?: V1ResourceQuotaSpec[];
  additionalRoleBindings?: AdditionalRoleBindingsSpec[];
  externalServiceIPs?: ExternalServiceIPsSpec;
}

/** A v1beta1 Tenant. */
export interface TenantConfig {
  apiVersion: typeof TENANT_API_VERSION;
  kind: typeof TENANT_KIND;
  metadata: ObjectMeta;
  spec: TenantSpec;
  status: TenantStatus;
}

/** A v1alpha1 Tenant: one structural owner, the rest lives in annotations. */
export interface LegacyTenantConfig {
  apiVersion: typeof LEGACY_API_VERSION;
  kind: typeof TENANT_KIND;
  metadata: ObjectMeta;
  spec: LegacyTenantSpec;
  status: TenantStatus;
}

export type TenantObject = TenantConfig | LegacyTenantConfig;

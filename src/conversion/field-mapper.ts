import {
  ALLOWED_IMAGE_PULL_POLICY_ANNOTATION,
  PRIORITY_CLASS_ALLOWED_ANNOTATION,
  PRIORITY_CLASS_ALLOWED_REGEX_ANNOTATION,
  RESOURCE_QUOTA_SCOPE_ANNOTATION,
} from '../constants/annotations.js';
import {
  ImagePullPolicy,
  ResourceQuotaScope,
  type AdditionalMetadataSpec,
  type AdditionalRoleBindingsSpec,
  type AllowedListSpec,
  type ExternalServiceIPsSpec,
  type LegacyTenantSpec,
  type TenantSpec,
  type TenantStatus,
} from '../types/tenant.js';
import { joinList, readList } from './annotation-codec.js';

/** Everything in a v1beta1 spec except owners, with service options limited to metadata. */
export type UpgradedFields = Omit<TenantSpec, 'owners' | 'serviceOptions'> & {
  servicesMetadata?: AdditionalMetadataSpec;
};

/** Everything in a v1alpha1 spec except the primary owner, plus the annotations it needs. */
export interface DowngradedFields {
  spec: Omit<LegacyTenantSpec, 'owner'>;
  annotations: Record<string, string>;
}

const IMAGE_PULL_POLICIES: ReadonlySet<string> = new Set(Object.values(ImagePullPolicy));

function isImagePullPolicy(value: string): value is ImagePullPolicy {
  return IMAGE_PULL_POLICIES.has(value);
}

function isResourceQuotaScope(value: string | undefined): value is ResourceQuotaScope {
  return value === ResourceQuotaScope.Namespace || value === ResourceQuotaScope.Tenant;
}

function copyMetadataSpec(source: AdditionalMetadataSpec): AdditionalMetadataSpec {
  const copy: AdditionalMetadataSpec = {};
  if (source.additionalLabels !== undefined) {
    copy.additionalLabels = { ...source.additionalLabels };
  }
  if (source.additionalAnnotations !== undefined) {
    copy.additionalAnnotations = { ...source.additionalAnnotations };
  }
  return copy;
}

/** Exact names and regex travel together. */
function copyAllowedList(source: AllowedListSpec): AllowedListSpec {
  const copy: AllowedListSpec = {};
  if (source.allowed !== undefined) {
    copy.allowed = [...source.allowed];
  }
  if (source.allowedRegex !== undefined) {
    copy.allowedRegex = source.allowedRegex;
  }
  return copy;
}

function copyRoleBindings(source: readonly AdditionalRoleBindingsSpec[]): AdditionalRoleBindingsSpec[] {
  return source.map((binding) => ({
    clusterRoleName: binding.clusterRoleName,
    subjects: structuredClone(binding.subjects),
  }));
}

function copyExternalServiceIPs(source: ExternalServiceIPsSpec): ExternalServiceIPsSpec {
  return { allowed: [...source.allowed] };
}

export function copyStatus(source: TenantStatus): TenantStatus {
  return { size: source.size, namespaces: [...source.namespaces] };
}

/** The fields both versions hold structurally, in their shared shape. */
type SharedFields = Pick<
  TenantSpec,
  | 'namespaceQuota'
  | 'nodeSelector'
  | 'namespacesMetadata'
  | 'storageClasses'
  | 'ingressClasses'
  | 'ingressHostnames'
  | 'containerRegistries'
  | 'additionalRoleBindings'
  | 'externalServiceIPs'
>;

function copySharedFields(source: SharedFields): SharedFields {
  const copy: SharedFields = {};
  if (source.namespaceQuota !== undefined) {
    copy.namespaceQuota = source.namespaceQuota;
  }
  if (source.nodeSelector !== undefined) {
    copy.nodeSelector = { ...source.nodeSelector };
  }
  if (source.namespacesMetadata !== undefined) {
    copy.namespacesMetadata = copyMetadataSpec(source.namespacesMetadata);
  }
  if (source.storageClasses !== undefined) {
    copy.storageClasses = copyAllowedList(source.storageClasses);
  }
  if (source.ingressClasses !== undefined) {
    copy.ingressClasses = copyAllowedList(source.ingressClasses);
  }
  if (source.ingressHostnames !== undefined) {
    copy.ingressHostnames = copyAllowedList(source.ingressHostnames);
  }
  if (source.containerRegistries !== undefined) {
    copy.containerRegistries = copyAllowedList(source.containerRegistries);
  }
  if (source.additionalRoleBindings !== undefined && source.additionalRoleBindings.length > 0) {
    copy.additionalRoleBindings = copyRoleBindings(source.additionalRoleBindings);
  }
  if (source.externalServiceIPs !== undefined) {
    copy.externalServiceIPs = copyExternalServiceIPs(source.externalServiceIPs);
  }
  return copy;
}

/**
 * Resource quota scope stored on a v1alpha1 Tenant. Anything other than a
 * recognised literal, including a missing annotation, means `Tenant`.
 */
export function readResourceQuotaScope(annotations: Readonly<Record<string, string>>): ResourceQuotaScope {
  const value = annotations[RESOURCE_QUOTA_SCOPE_ANNOTATION];
  return isResourceQuotaScope(value) ? value : ResourceQuotaScope.Tenant;
}

/** Maps the v1alpha1 spec and its annotation-backed fields onto v1beta1. */
export function upgradeFields(
  source: LegacyTenantSpec,
  annotations: Readonly<Record<string, string>>,
): UpgradedFields {
  const fields: UpgradedFields = copySharedFields(source);

  if (source.servicesMetadata !== undefined) {
    fields.servicesMetadata = copyMetadataSpec(source.servicesMetadata);
  }
  if (source.networkPolicies !== undefined && source.networkPolicies.length > 0) {
    fields.networkPolicies = { items: structuredClone(source.networkPolicies) };
  }
  if (source.limitRanges !== undefined && source.limitRanges.length > 0) {
    fields.limitRanges = { items: structuredClone(source.limitRanges) };
  }
  if (source.resourceQuotas !== undefined && source.resourceQuotas.length > 0) {
    fields.resourceQuotas = {
      scope: readResourceQuotaScope(annotations),
      items: structuredClone(source.resourceQuotas),
    };
  }

  const pullPolicies = (readList(annotations, ALLOWED_IMAGE_PULL_POLICY_ANNOTATION) ?? []).filter(
    isImagePullPolicy,
  );
  if (pullPolicies.length > 0) {
    fields.imagePullPolicies = pullPolicies;
  }

  const priorityClasses: AllowedListSpec = {};
  const allowedPriorityClasses = readList(annotations, PRIORITY_CLASS_ALLOWED_ANNOTATION);
  if (allowedPriorityClasses !== undefined) {
    priorityClasses.allowed = allowedPriorityClasses;
  }
  const priorityClassRegex = annotations[PRIORITY_CLASS_ALLOWED_REGEX_ANNOTATION];
  if (priorityClassRegex !== undefined && priorityClassRegex !== '') {
    priorityClasses.allowedRegex = priorityClassRegex;
  }
  if (priorityClasses.allowed !== undefined || priorityClasses.allowedRegex !== undefined) {
    fields.priorityClasses = priorityClasses;
  }

  return fields;
}

/** Maps the v1beta1 fields back, moving what v1alpha1 lacks into annotations. */
export function downgradeFields(source: TenantSpec): DowngradedFields {
  const spec: DowngradedFields['spec'] = copySharedFields(source);
  const annotations: Record<string, string> = {};

  const servicesMetadata = source.serviceOptions?.additionalMetadata;
  if (servicesMetadata !== undefined) {
    spec.servicesMetadata = copyMetadataSpec(servicesMetadata);
  }
  if (source.networkPolicies !== undefined) {
    spec.networkPolicies = structuredClone(source.networkPolicies.items);
  }
  if (source.limitRanges !== undefined) {
    spec.limitRanges = structuredClone(source.limitRanges.items);
  }
  if (source.resourceQuotas !== undefined) {
    annotations[RESOURCE_QUOTA_SCOPE_ANNOTATION] = source.resourceQuotas.scope;
    spec.resourceQuotas = structuredClone(source.resourceQuotas.items);
  }

  const pullPolicies = joinList(source.imagePullPolicies ?? []);
  if (pullPolicies !== undefined) {
    annotations[ALLOWED_IMAGE_PULL_POLICY_ANNOTATION] = pullPolicies;
  }

  const allowedPriorityClasses = joinList(source.priorityClasses?.allowed ?? []);
  if (allowedPriorityClasses !== undefined) {
    annotations[PRIORITY_CLASS_ALLOWED_ANNOTATION] = allowedPriorityClasses;
  }
  const priorityClassRegex = source.priorityClasses?.allowedRegex;
  if (priorityClassRegex !== undefined && priorityClassRegex !== '') {
    annotations[PRIORITY_CLASS_ALLOWED_REGEX_ANNOTATION] = priorityClassRegex;
  }

  return { spec, annotations };
}

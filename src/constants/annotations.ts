import { OwnerKind, ProxyOperation, ProxyServiceKind, TENANT_API_GROUP } from '../types/tenant.js';

export const RESOURCE_QUOTA_SCOPE_ANNOTATION = `${TENANT_API_GROUP}/resource-quota-scope`;
export const ALLOWED_IMAGE_PULL_POLICY_ANNOTATION = `${TENANT_API_GROUP}/allowed-image-pull-policy`;
export const PRIORITY_CLASS_ALLOWED_ANNOTATION = `priorityclass.${TENANT_API_GROUP}/allowed`;
export const PRIORITY_CLASS_ALLOWED_REGEX_ANNOTATION = `priorityclass.${TENANT_API_GROUP}/allowed-regex`;
export const ENABLE_NODE_PORTS_ANNOTATION = `${TENANT_API_GROUP}/enable-node-ports`;
export const ENABLE_EXTERNAL_NAME_ANNOTATION = `${TENANT_API_GROUP}/enable-external-name`;

/** Additional owners, one comma-separated name list per owner kind. */
export const OWNER_KIND_ANNOTATIONS = {
  [OwnerKind.User]: `owners.${TENANT_API_GROUP}/user`,
  [OwnerKind.Group]: `owners.${TENANT_API_GROUP}/group`,
  [OwnerKind.ServiceAccount]: `owners.${TENANT_API_GROUP}/serviceaccount`,
} as const satisfies Record<OwnerKind, string>;

const PROXY_RESOURCE_SEGMENTS = {
  [ProxyServiceKind.Nodes]: 'node',
  [ProxyServiceKind.StorageClasses]: 'storageclass',
  [ProxyServiceKind.IngressClasses]: 'ingressclass',
  [ProxyServiceKind.PriorityClasses]: 'priorityclass',
} as const satisfies Record<ProxyServiceKind, string>;

const PROXY_OPERATION_SEGMENTS = {
  [ProxyOperation.List]: 'listing',
  [ProxyOperation.Update]: 'update',
  [ProxyOperation.Delete]: 'deletion',
} as const satisfies Record<ProxyOperation, string>;

/** Iteration order for owner kinds, service kinds and operations. */
export const OWNER_KINDS: readonly OwnerKind[] = [
  OwnerKind.User,
  OwnerKind.Group,
  OwnerKind.ServiceAccount,
];

export const PROXY_SERVICE_KINDS: readonly ProxyServiceKind[] = [
  ProxyServiceKind.Nodes,
  ProxyServiceKind.StorageClasses,
  ProxyServiceKind.IngressClasses,
  ProxyServiceKind.PriorityClasses,
];

export const PROXY_OPERATIONS: readonly ProxyOperation[] = [
  ProxyOperation.List,
  ProxyOperation.Update,
  ProxyOperation.Delete,
];

export interface ProxyPermissionKey {
  annotation: string;
  serviceKind: ProxyServiceKind;
  operation: ProxyOperation;
}

export function proxyPermissionAnnotation(
  serviceKind: ProxyServiceKind,
  operation: ProxyOperation,
): string {
  return `${TENANT_API_GROUP}/enable-${PROXY_RESOURCE_SEGMENTS[serviceKind]}-${PROXY_OPERATION_SEGMENTS[operation]}`;
}

/** The twelve `(serviceKind, operation)` keys, in service kind then operation order. */
export const PROXY_PERMISSION_KEYS: readonly ProxyPermissionKey[] = Object.freeze(
  PROXY_SERVICE_KINDS.flatMap((serviceKind) =>
    PROXY_OPERATIONS.map((operation) => ({
      annotation: proxyPermissionAnnotation(serviceKind, operation),
      serviceKind,
      operation,
    })),
  ),
);

/** Every annotation an upgrade turns into structured fields. */
export const CONSUMED_ANNOTATIONS: readonly string[] = Object.freeze([
  ALLOWED_IMAGE_PULL_POLICY_ANNOTATION,
  PRIORITY_CLASS_ALLOWED_ANNOTATION,
  PRIORITY_CLASS_ALLOWED_REGEX_ANNOTATION,
  ENABLE_NODE_PORTS_ANNOTATION,
  ENABLE_EXTERNAL_NAME_ANNOTATION,
  RESOURCE_QUOTA_SCOPE_ANNOTATION,
  ...OWNER_KINDS.map((kind) => OWNER_KIND_ANNOTATIONS[kind]),
  ...PROXY_PERMISSION_KEYS.map((key) => key.annotation),
]);

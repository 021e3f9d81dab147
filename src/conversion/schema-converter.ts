import {
  CONSUMED_ANNOTATIONS,
  ENABLE_EXTERNAL_NAME_ANNOTATION,
  ENABLE_NODE_PORTS_ANNOTATION,
} from '../constants/annotations.js';
import { ConversionTypeError } from '../errors/conversion.error.js';
import {
  LEGACY_API_VERSION,
  TENANT_API_VERSION,
  TENANT_KIND,
  type AdditionalMetadataSpec,
  type AllowedServices,
  type LegacyTenantConfig,
  type OwnerRef,
  type OwnerSpec,
  type ServiceOptions,
  type TenantConfig,
  type TenantObject,
  type TenantSpec,
} from '../types/tenant.js';
import { formatBool, parseBool, purgeKeys } from './annotation-codec.js';
import { copyStatus, downgradeFields, upgradeFields } from './field-mapper.js';
import {
  decodeOwnerKinds,
  decodePermissions,
  encodeOwnerKinds,
  encodePermissions,
  toProxySettings,
  type PermissionMatrix,
} from './owner-permission-codec.js';
import { parseTenantObject } from './tenant-schemas.js';

function readAllowedServices(
  annotations: Readonly<Record<string, string>>,
  tenant: string,
): AllowedServices | undefined {
  const nodePort = annotations[ENABLE_NODE_PORTS_ANNOTATION];
  const externalName = annotations[ENABLE_EXTERNAL_NAME_ANNOTATION];
  if (nodePort === undefined && externalName === undefined) {
    return undefined;
  }

  const allowedServices: AllowedServices = {};
  if (nodePort !== undefined) {
    allowedServices.nodePort = parseBool(nodePort, { tenant, key: ENABLE_NODE_PORTS_ANNOTATION });
  }
  if (externalName !== undefined) {
    allowedServices.externalName = parseBool(externalName, {
      tenant,
      key: ENABLE_EXTERNAL_NAME_ANNOTATION,
    });
  }
  return allowedServices;
}

function writeAllowedServices(allowedServices: AllowedServices | undefined): Record<string, string> {
  const annotations: Record<string, string> = {};
  if (allowedServices?.nodePort !== undefined) {
    annotations[ENABLE_NODE_PORTS_ANNOTATION] = formatBool(allowedServices.nodePort);
  }
  if (allowedServices?.externalName !== undefined) {
    annotations[ENABLE_EXTERNAL_NAME_ANNOTATION] = formatBool(allowedServices.externalName);
  }
  return annotations;
}

function buildServiceOptions(
  additionalMetadata: AdditionalMetadataSpec | undefined,
  allowedServices: AllowedServices | undefined,
): ServiceOptions | undefined {
  if (additionalMetadata === undefined && allowedServices === undefined) {
    return undefined;
  }
  const serviceOptions: ServiceOptions = {};
  if (additionalMetadata !== undefined) {
    serviceOptions.additionalMetadata = additionalMetadata;
  }
  if (allowedServices !== undefined) {
    serviceOptions.allowedServices = allowedServices;
  }
  return serviceOptions;
}

function withPermissions(owner: OwnerRef, permissions: PermissionMatrix): OwnerSpec {
  const proxySettings = toProxySettings(permissions.get(owner.name));
  return proxySettings === undefined
    ? { kind: owner.kind, name: owner.name }
    : { kind: owner.kind, name: owner.name, proxySettings };
}

/**
 * Converts a v1alpha1 Tenant to v1beta1.
 *
 * Every annotation is parsed before the result is assembled, so a malformed
 * boolean throws an `AnnotationParseError` without producing any output. The
 * annotations turned into fields are removed from the returned metadata.
 */
export function upgrade(legacy: LegacyTenantConfig): TenantConfig {
  const tenant = legacy.metadata.name ?? '';
  const annotations = legacy.metadata.annotations ?? {};

  const allowedServices = readAllowedServices(annotations, tenant);
  const permissions = decodePermissions(annotations);
  const { servicesMetadata, ...fields } = upgradeFields(legacy.spec, annotations);

  const spec: TenantSpec = {
    owners: [
      withPermissions(legacy.spec.owner, permissions),
      ...decodeOwnerKinds(annotations).map((owner) => withPermissions(owner, permissions)),
    ],
    ...fields,
  };
  const serviceOptions = buildServiceOptions(servicesMetadata, allowedServices);
  if (serviceOptions !== undefined) {
    spec.serviceOptions = serviceOptions;
  }

  const metadata = structuredClone(legacy.metadata);
  purgeKeys(metadata, CONSUMED_ANNOTATIONS);

  return {
    apiVersion: TENANT_API_VERSION,
    kind: TENANT_KIND,
    metadata,
    spec,
    status: copyStatus(legacy.status),
  };
}

/**
 * Converts a v1beta1 Tenant to v1alpha1. The first owner becomes the primary
 * owner; the other owners and every proxy permission move to annotations.
 * Stale copies of those annotations on the source are replaced, never merged.
 */
export function downgrade(config: TenantConfig): LegacyTenantConfig {
  const [primary, ...additional] = config.spec.owners;
  const { spec, annotations } = downgradeFields(config.spec);

  const metadata = structuredClone(config.metadata);
  purgeKeys(metadata, CONSUMED_ANNOTATIONS);
  metadata.annotations = {
    ...metadata.annotations,
    ...encodeOwnerKinds(additional),
    ...encodePermissions(config.spec.owners),
    ...annotations,
    ...writeAllowedServices(config.spec.serviceOptions?.allowedServices),
  };

  return {
    apiVersion: LEGACY_API_VERSION,
    kind: TENANT_KIND,
    metadata,
    spec: {
      owner: { kind: primary.kind, name: primary.name },
      ...spec,
    },
    status: copyStatus(config.status),
  };
}

/**
 * Decodes `raw` and converts it to `desiredAPIVersion`. An object already at
 * that version comes back as a copy.
 */
export function convertTenant(raw: unknown, desiredAPIVersion: string): TenantObject {
  const object = parseTenantObject(raw);

  switch (desiredAPIVersion) {
    case TENANT_API_VERSION:
      return object.apiVersion === LEGACY_API_VERSION ? upgrade(object) : structuredClone(object);
    case LEGACY_API_VERSION:
      return object.apiVersion === TENANT_API_VERSION ? downgrade(object) : structuredClone(object);
    default:
      throw new ConversionTypeError(desiredAPIVersion, TENANT_KIND, 'unsupported desired API version');
  }
}

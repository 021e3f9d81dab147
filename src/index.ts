export * from './types/tenant.js';
export * from './constants/annotations.js';
export * from './errors/conversion.error.js';
export {
  formatBool,
  joinList,
  parseBool,
  purgeKeys,
  readList,
  splitList,
} from './conversion/annotation-codec.js';
export {
  decodeOwnerKinds,
  decodePermissions,
  encodeOwnerKinds,
  encodePermissions,
  permissionsOf,
  toProxySettings,
  type OwnerPermissions,
  type PermissionMatrix,
} from './conversion/owner-permission-codec.js';
export { downgradeFields, upgradeFields, readResourceQuotaScope } from './conversion/field-mapper.js';
export { parseLegacyTenant, parseTenant, parseTenantObject } from './conversion/tenant-schemas.js';
export { convertTenant, downgrade, upgrade } from './conversion/schema-converter.js';

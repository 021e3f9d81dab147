import {
  OWNER_KINDS,
  OWNER_KIND_ANNOTATIONS,
  PROXY_OPERATIONS,
  PROXY_PERMISSION_KEYS,
  PROXY_SERVICE_KINDS,
} from '../constants/annotations.js';
import type {
  OwnerRef,
  OwnerSpec,
  ProxyOperation,
  ProxyServiceKind,
  ProxySettings,
} from '../types/tenant.js';
import { joinList, readList } from './annotation-codec.js';

export type OwnerPermissions = Map<ProxyServiceKind, Set<ProxyOperation>>;

/** Owner name to the proxy operations granted to that name. */
export type PermissionMatrix = Map<string, OwnerPermissions>;

function sortedUnique(names: Iterable<string>): string[] {
  return [...new Set(names)].sort();
}

/** Flattens an owner's `proxySettings` into a service kind to operation set map. */
export function permissionsOf(owner: OwnerSpec): OwnerPermissions {
  const permissions: OwnerPermissions = new Map();
  for (const setting of owner.proxySettings ?? []) {
    const operations = permissions.get(setting.kind) ?? new Set<ProxyOperation>();
    for (const operation of setting.operations) {
      operations.add(operation);
    }
    permissions.set(setting.kind, operations);
  }
  return permissions;
}

/**
 * Turns a permission map back into `proxySettings`, ordered by service kind
 * and then by operation. Returns `undefined` when nothing is granted.
 */
export function toProxySettings(permissions: OwnerPermissions | undefined): ProxySettings[] | undefined {
  if (permissions === undefined) {
    return undefined;
  }
  const settings: ProxySettings[] = [];
  for (const kind of PROXY_SERVICE_KINDS) {
    const granted = permissions.get(kind);
    if (granted === undefined || granted.size === 0) {
      continue;
    }
    settings.push({
      kind,
      operations: PROXY_OPERATIONS.filter((operation) => granted.has(operation)),
    });
  }
  return settings.length > 0 ? settings : undefined;
}

/**
 * Builds the twelve proxy permission annotations. Each value lists, in
 * lexical order and without repeats, the names of the owners holding that
 * operation on that service kind. Keys nobody holds are left out.
 */
export function encodePermissions(owners: readonly OwnerSpec[]): Record<string, string> {
  const granted = owners.map((owner) => ({ name: owner.name, permissions: permissionsOf(owner) }));
  const annotations: Record<string, string> = {};

  for (const { annotation, serviceKind, operation } of PROXY_PERMISSION_KEYS) {
    const holders = granted
      .filter(({ permissions }) => permissions.get(serviceKind)?.has(operation) === true)
      .map(({ name }) => name);
    const value = joinList(sortedUnique(holders));
    if (value !== undefined) {
      annotations[annotation] = value;
    }
  }

  return annotations;
}

/**
 * Reads the proxy permission annotations back into a matrix. Never fails:
 * missing keys contribute nothing, and a name listed twice under the same key
 * grants the operation once.
 */
export function decodePermissions(annotations: Readonly<Record<string, string>>): PermissionMatrix {
  const matrix: PermissionMatrix = new Map();

  for (const { annotation, serviceKind, operation } of PROXY_PERMISSION_KEYS) {
    for (const name of readList(annotations, annotation) ?? []) {
      const permissions = matrix.get(name) ?? new Map<ProxyServiceKind, Set<ProxyOperation>>();
      const operations = permissions.get(serviceKind) ?? new Set<ProxyOperation>();
      operations.add(operation);
      permissions.set(serviceKind, operations);
      matrix.set(name, permissions);
    }
  }

  return matrix;
}

/** Groups additional owners by kind into the owner-kind annotations. */
export function encodeOwnerKinds(owners: readonly OwnerRef[]): Record<string, string> {
  const annotations: Record<string, string> = {};

  for (const kind of OWNER_KINDS) {
    const value = joinList(
      sortedUnique(owners.filter((owner) => owner.kind === kind).map((owner) => owner.name)),
    );
    if (value !== undefined) {
      annotations[OWNER_KIND_ANNOTATIONS[kind]] = value;
    }
  }

  return annotations;
}

/**
 * Reads additional owners from the owner-kind annotations, users first, then
 * groups, then service accounts. Names keep their listed order; a name
 * repeated under one key yields a single owner.
 */
export function decodeOwnerKinds(annotations: Readonly<Record<string, string>>): OwnerRef[] {
  return OWNER_KINDS.flatMap((kind) =>
    [...new Set(readList(annotations, OWNER_KIND_ANNOTATIONS[kind]) ?? [])].map((name) => ({
      kind,
      name,
    })),
  );
}

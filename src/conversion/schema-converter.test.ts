import { describe, it, expect } from 'vitest';
import { convertTenant, downgrade, upgrade } from './schema-converter.js';
import { AnnotationParseError, ConversionTypeError } from '../errors/conversion.error.js';
import {
  ImagePullPolicy,
  LEGACY_API_VERSION,
  OwnerKind,
  ProxyOperation,
  ProxyServiceKind,
  ResourceQuotaScope,
  TENANT_API_VERSION,
  type LegacyTenantConfig,
  type LegacyTenantSpec,
  type TenantConfig,
} from '../types/tenant.js';

const NODE_PORTS = 'capsule.clastix.io/enable-node-ports';
const EXTERNAL_NAME = 'capsule.clastix.io/enable-external-name';
const NODE_LISTING = 'capsule.clastix.io/enable-node-listing';
const NODE_UPDATE = 'capsule.clastix.io/enable-node-update';
const OWNER_GROUPS = 'owners.capsule.clastix.io/group';
const SCOPE = 'capsule.clastix.io/resource-quota-scope';

const quota = { hard: { 'requests.storage': '10Gi' } };

function legacyTenant(
  annotations: Record<string, string> = {},
  spec: Partial<LegacyTenantSpec> = {},
): LegacyTenantConfig {
  return {
    apiVersion: LEGACY_API_VERSION,
    kind: 'Tenant',
    metadata: { name: 'oil', annotations },
    spec: { owner: { kind: OwnerKind.User, name: 'alice' }, ...spec },
    status: { size: 2, namespaces: ['oil-dev', 'oil-prod'] },
  };
}

function tenant(spec: Partial<TenantConfig['spec']> = {}, annotations?: Record<string, string>): TenantConfig {
  return {
    apiVersion: TENANT_API_VERSION,
    kind: 'Tenant',
    metadata: annotations === undefined ? { name: 'oil' } : { name: 'oil', annotations },
    spec: { owners: [{ kind: OwnerKind.User, name: 'alice' }], ...spec },
    status: { size: 0, namespaces: [] },
  };
}

describe('upgrade', () => {
  it('should make the primary owner the first owner and copy status', () => {
    const result = upgrade(legacyTenant());

    expect(result.apiVersion).toBe(TENANT_API_VERSION);
    expect(result.spec.owners).toEqual([{ kind: OwnerKind.User, name: 'alice' }]);
    expect(result.status).toEqual({ size: 2, namespaces: ['oil-dev', 'oil-prod'] });
  });

  it('should attach decoded permissions to the primary owner', () => {
    const result = upgrade(legacyTenant({ [NODE_LISTING]: 'alice' }));

    expect(result.spec.owners[0]).toEqual({
      kind: OwnerKind.User,
      name: 'alice',
      proxySettings: [{ kind: ProxyServiceKind.Nodes, operations: [ProxyOperation.List] }],
    });
  });

  it('should turn owner annotations into owners and drop the consumed keys', () => {
    const result = upgrade(
      legacyTenant({ [OWNER_GROUPS]: 'teamA,teamB', [NODE_UPDATE]: 'teamB', 'example.test/note': 'kept' }),
    );

    expect(result.spec.owners).toEqual([
      { kind: OwnerKind.User, name: 'alice' },
      { kind: OwnerKind.Group, name: 'teamA' },
      {
        kind: OwnerKind.Group,
        name: 'teamB',
        proxySettings: [{ kind: ProxyServiceKind.Nodes, operations: [ProxyOperation.Update] }],
      },
    ]);
    expect(result.metadata.annotations).toEqual({ 'example.test/note': 'kept' });
  });

  it('should build the priority class allow-list from annotations', () => {
    const result = upgrade(
      legacyTenant({
        'priorityclass.capsule.clastix.io/allowed': 'p1,p2',
        'priorityclass.capsule.clastix.io/allowed-regex': '^std-.*',
      }),
    );

    expect(result.spec.priorityClasses).toEqual({ allowed: ['p1', 'p2'], allowedRegex: '^std-.*' });
  });

  it.each(['true', '1'])('should enable node ports for %s', (raw) => {
    const result = upgrade(legacyTenant({ [NODE_PORTS]: raw }));
    expect(result.spec.serviceOptions).toEqual({ allowedServices: { nodePort: true } });
  });

  it('should parse both service flags independently', () => {
    const result = upgrade(
      legacyTenant({ [NODE_PORTS]: 'f', [EXTERNAL_NAME]: 'TRUE' }, { servicesMetadata: { additionalLabels: { a: 'b' } } }),
    );
    expect(result.spec.serviceOptions).toEqual({
      additionalMetadata: { additionalLabels: { a: 'b' } },
      allowedServices: { nodePort: false, externalName: true },
    });
  });

  it('should reject a non-boolean flag and leave the source untouched', () => {
    const annotations = { [NODE_PORTS]: 'maybe', [OWNER_GROUPS]: 'teamA' };
    const legacy = legacyTenant(annotations);

    let thrown: unknown;
    try {
      upgrade(legacy);
    } catch (error: unknown) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AnnotationParseError);
    if (thrown instanceof AnnotationParseError) {
      expect(thrown.key).toBe(NODE_PORTS);
      expect(thrown.rawValue).toBe('maybe');
      expect(thrown.tenant).toBe('oil');
    }
    expect(legacy.metadata.annotations).toEqual({ [NODE_PORTS]: 'maybe', [OWNER_GROUPS]: 'teamA' });
  });

  it('should report an invalid external-name flag', () => {
    expect(() => upgrade(legacyTenant({ [EXTERNAL_NAME]: 'on' }))).toThrow(
      'unable to parse capsule.clastix.io/enable-external-name annotation on tenant oil: "on" is not a boolean',
    );
  });

  it.each([
    [undefined, ResourceQuotaScope.Tenant],
    ['bogus', ResourceQuotaScope.Tenant],
    ['Namespace', ResourceQuotaScope.Namespace],
  ])('should resolve scope annotation %s to %s', (raw, expected) => {
    const annotations: Record<string, string> = raw === undefined ? {} : { [SCOPE]: raw };
    const result = upgrade(legacyTenant(annotations, { resourceQuotas: [quota] }));
    expect(result.spec.resourceQuotas?.scope).toBe(expected);
  });

  it('should not share substructures with the source', () => {
    const legacy = legacyTenant({ 'example.test/note': 'kept' }, { nodeSelector: { pool: 'gold' } });
    const result = upgrade(legacy);

    result.metadata.annotations = {};
    result.spec.nodeSelector = { pool: 'silver' };
    result.status.namespaces.push('oil-test');

    expect(legacy.metadata.annotations).toEqual({ 'example.test/note': 'kept' });
    expect(legacy.spec.nodeSelector).toEqual({ pool: 'gold' });
    expect(legacy.status.namespaces).toEqual(['oil-dev', 'oil-prod']);
  });
});

describe('downgrade', () => {
  it('should encode additional owners and permissions', () => {
    const result = downgrade(
      tenant({
        owners: [
          {
            kind: OwnerKind.User,
            name: 'alice',
            proxySettings: [
              { kind: ProxyServiceKind.Nodes, operations: [ProxyOperation.List, ProxyOperation.Update] },
            ],
          },
          {
            kind: OwnerKind.Group,
            name: 'teamA',
            proxySettings: [{ kind: ProxyServiceKind.Nodes, operations: [ProxyOperation.List] }],
          },
        ],
      }),
    );

    expect(result.apiVersion).toBe(LEGACY_API_VERSION);
    expect(result.spec.owner).toEqual({ kind: OwnerKind.User, name: 'alice' });
    expect(result.metadata.annotations).toEqual({
      [OWNER_GROUPS]: 'teamA',
      [NODE_LISTING]: 'alice,teamA',
      [NODE_UPDATE]: 'alice',
    });
  });

  it('should only write the service flags that are set', () => {
    const onlyNodePort = downgrade(tenant({ serviceOptions: { allowedServices: { nodePort: true } } }));
    expect(onlyNodePort.metadata.annotations).toEqual({ [NODE_PORTS]: 'true' });

    const neither = downgrade(tenant({ serviceOptions: { allowedServices: {} } }));
    expect(neither.metadata.annotations).toEqual({});

    const both = downgrade(
      tenant({ serviceOptions: { allowedServices: { nodePort: false, externalName: true } } }),
    );
    expect(both.metadata.annotations).toEqual({ [NODE_PORTS]: 'false', [EXTERNAL_NAME]: 'true' });
  });

  it('should replace stale encoded annotations', () => {
    const result = downgrade(tenant({}, { [NODE_LISTING]: 'mallory', 'example.test/note': 'kept' }));
    expect(result.metadata.annotations).toEqual({ 'example.test/note': 'kept' });
  });

  it('should not share substructures with the source', () => {
    const source = tenant({ externalServiceIPs: { allowed: ['10.0.0.1'] } }, { a: 'b' });
    const result = downgrade(source);

    result.spec.externalServiceIPs?.allowed.push('10.0.0.2');
    result.spec.owner.name = 'bob';

    expect(source.spec.externalServiceIPs).toEqual({ allowed: ['10.0.0.1'] });
    expect(source.spec.owners[0].name).toBe('alice');
    expect(source.metadata.annotations).toEqual({ a: 'b' });
  });
});

describe('round trips', () => {
  it('should keep the primary owner through downgrade(upgrade())', () => {
    const legacy = legacyTenant({ [OWNER_GROUPS]: 'teamA' });
    expect(downgrade(upgrade(legacy)).spec.owner).toEqual(legacy.spec.owner);
  });

  it('should restore every representable field through upgrade(downgrade())', () => {
    const source: TenantConfig = {
      apiVersion: TENANT_API_VERSION,
      kind: 'Tenant',
      metadata: { name: 'oil', labels: { env: 'prod' }, annotations: { 'example.test/note': 'kept' } },
      spec: {
        owners: [
          {
            kind: OwnerKind.User,
            name: 'alice',
            proxySettings: [
              { kind: ProxyServiceKind.Nodes, operations: [ProxyOperation.List, ProxyOperation.Update] },
              { kind: ProxyServiceKind.PriorityClasses, operations: [ProxyOperation.Delete] },
            ],
          },
          { kind: OwnerKind.User, name: 'bob' },
          {
            kind: OwnerKind.Group,
            name: 'teamA',
            proxySettings: [{ kind: ProxyServiceKind.StorageClasses, operations: [ProxyOperation.List] }],
          },
          { kind: OwnerKind.ServiceAccount, name: 'system:serviceaccount:oil:robot' },
        ],
        namespaceQuota: 5,
        nodeSelector: { pool: 'gold' },
        namespacesMetadata: { additionalLabels: { team: 'oil' } },
        serviceOptions: {
          additionalMetadata: { additionalAnnotations: { exposed: 'true' } },
          allowedServices: { nodePort: false, externalName: true },
        },
        storageClasses: { allowed: ['ssd'] },
        ingressClasses: { allowedRegex: '^nginx-.*' },
        priorityClasses: { allowed: ['p1', 'p2'], allowedRegex: '^std-.*' },
        networkPolicies: { items: [{ podSelector: {}, policyTypes: ['Ingress'] }] },
        limitRanges: { items: [{ limits: [{ type: 'Container', max: { cpu: '2' } }] }] },
        resourceQuotas: { scope: ResourceQuotaScope.Namespace, items: [quota] },
        additionalRoleBindings: [
          { clusterRoleName: 'viewer', subjects: [{ kind: 'Group', name: 'auditors' }] },
        ],
        externalServiceIPs: { allowed: ['10.0.0.0/24'] },
        imagePullPolicies: [ImagePullPolicy.Always, ImagePullPolicy.IfNotPresent],
      },
      status: { size: 1, namespaces: ['oil-prod'] },
    };

    expect(upgrade(downgrade(source))).toEqual(source);
  });

  it('should convert back a Tenant upgraded from a list with a trailing comma', () => {
    const upgraded = convertTenant(legacyTenant({ [OWNER_GROUPS]: 'teamA,' }), TENANT_API_VERSION);
    expect(upgraded).toMatchObject({
      spec: {
        owners: [
          { kind: OwnerKind.User, name: 'alice' },
          { kind: OwnerKind.Group, name: 'teamA' },
        ],
      },
    });

    expect(convertTenant(upgraded, LEGACY_API_VERSION)).toMatchObject({
      metadata: { annotations: { [OWNER_GROUPS]: 'teamA' } },
      spec: { owner: { kind: OwnerKind.User, name: 'alice' } },
    });
  });
});

describe('convertTenant', () => {
  const rawLegacy = {
    apiVersion: LEGACY_API_VERSION,
    kind: 'Tenant',
    metadata: { name: 'oil', annotations: { [OWNER_GROUPS]: 'teamA' } },
    spec: { owner: { kind: 'User', name: 'alice' } },
  };

  it('should upgrade a decoded legacy object', () => {
    const result = convertTenant(rawLegacy, TENANT_API_VERSION);

    expect(result).toEqual({
      apiVersion: TENANT_API_VERSION,
      kind: 'Tenant',
      metadata: { name: 'oil', annotations: {} },
      spec: {
        owners: [
          { kind: OwnerKind.User, name: 'alice' },
          { kind: OwnerKind.Group, name: 'teamA' },
        ],
      },
      status: { size: 0, namespaces: [] },
    });
  });

  it('should return a copy when the version already matches', () => {
    const result = convertTenant(rawLegacy, LEGACY_API_VERSION);
    expect(result).toEqual({ ...rawLegacy, status: { size: 0, namespaces: [] } });
    expect(result.metadata).not.toBe(rawLegacy.metadata);
  });

  it('should reject unknown versions and kinds', () => {
    expect(() => convertTenant({ ...rawLegacy, apiVersion: 'capsule.clastix.io/v1' }, TENANT_API_VERSION)).toThrow(
      ConversionTypeError,
    );
    expect(() => convertTenant({ ...rawLegacy, kind: 'Namespace' }, TENANT_API_VERSION)).toThrow(
      'cannot convert Namespace capsule.clastix.io/v1alpha1: only Tenant objects can be converted',
    );
    expect(() => convertTenant('oil', TENANT_API_VERSION)).toThrow(ConversionTypeError);
    expect(() => convertTenant(rawLegacy, 'capsule.clastix.io/v2')).toThrow(
      'cannot convert Tenant capsule.clastix.io/v2: unsupported desired API version',
    );
  });

  it('should reject a v1beta1 Tenant without owners', () => {
    const raw = { apiVersion: TENANT_API_VERSION, kind: 'Tenant', metadata: { name: 'oil' }, spec: { owners: [] } };
    expect(() => convertTenant(raw, LEGACY_API_VERSION)).toThrow(ConversionTypeError);
  });

  it('should reject a legacy Tenant with an unknown owner kind', () => {
    const raw = { ...rawLegacy, spec: { owner: { kind: 'Robot', name: 'r2' } } };
    expect(() => convertTenant(raw, TENANT_API_VERSION)).toThrow(ConversionTypeError);
  });
});

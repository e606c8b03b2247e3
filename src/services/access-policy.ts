/**
 * Role-based table access policy.
 *
 * The policy is data: a JSON file mapping each role to a list of tables or
 * the wildcard "*". Roles not named in the file get no tables.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { CatalogSnapshot, TableEntry } from './schema-catalog.js';

const PolicyFileSchema = z.object({
  roles: z.record(z.union([z.literal('*'), z.array(z.string().min(1))])),
  admins: z.array(z.string().min(1)).default([]),
});

export type PolicyFile = z.input<typeof PolicyFileSchema>;

/**
 * Tables a role may use: every table, or an explicit set.
 */
export type TableGrant = { kind: 'all' } | { kind: 'tables'; tables: ReadonlySet<string> };

/**
 * The role's view of the world: the catalog it is shown and the tables it may
 * query. `allowedTables` is always exactly the key set of `schema.tables`.
 */
export interface PolicyScope {
  readonly schema: CatalogSnapshot;
  readonly allowedTables: ReadonlySet<string>;
}

const NO_ACCESS: TableGrant = { kind: 'tables', tables: new Set() };

export class AccessPolicy {
  private readonly grants: ReadonlyMap<string, TableGrant>;
  private readonly admins: ReadonlySet<string>;

  constructor(file: PolicyFile) {
    const parsed = PolicyFileSchema.parse(file);
    const grants = new Map<string, TableGrant>();

    for (const [role, grant] of Object.entries(parsed.roles)) {
      grants.set(
        role.toLowerCase(),
        grant === '*'
          ? { kind: 'all' }
          : { kind: 'tables', tables: new Set(grant.map((t) => t.toLowerCase())) }
      );
    }

    this.grants = grants;
    this.admins = new Set(parsed.admins.map((r) => r.toLowerCase()));
  }

  /**
   * Grant configured for a role. Unknown roles resolve to no access.
   */
  grantFor(role: string): TableGrant {
    return this.grants.get(role.toLowerCase()) ?? NO_ACCESS;
  }

  /**
   * Filtered catalog and allowed table set, derived together.
   */
  scope(role: string, catalog: CatalogSnapshot): PolicyScope {
    const grant = this.grantFor(role);
    if (grant.kind === 'all') {
      return { schema: catalog, allowedTables: new Set(catalog.tables.keys()) };
    }

    const tables = new Map<string, TableEntry>();
    for (const [name, entry] of catalog.tables) {
      if (grant.tables.has(name)) {
        tables.set(name, entry);
      }
    }

    return {
      schema: Object.freeze({ tables, fetchedAt: catalog.fetchedAt }),
      allowedTables: new Set(tables.keys()),
    };
  }

  filteredSchema(role: string, catalog: CatalogSnapshot): CatalogSnapshot {
    return this.scope(role, catalog).schema;
  }

  allowedTables(role: string, catalog: CatalogSnapshot): ReadonlySet<string> {
    return this.scope(role, catalog).allowedTables;
  }

  /**
   * Whether the role may use operator endpoints (cache clearing, audit log).
   */
  isAdmin(role: string): boolean {
    return this.admins.has(role.toLowerCase());
  }

  /**
   * Roles named in the policy, sorted.
   */
  roles(): string[] {
    return Array.from(this.grants.keys()).sort();
  }
}

/**
 * Load the policy file once at start-up.
 *
 * @throws ConfigurationError if the file is missing or malformed
 */
export function loadAccessPolicy(path: string): AccessPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read access policy ${path}: ${describeError(error)}`);
  }

  const parsed = PolicyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid access policy ${path}:`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const policy = new AccessPolicy(parsed.data);
  logger.info(`Loaded access policy for roles: ${policy.roles().join(', ')}`);
  return policy;
}

import fs from 'fs';
import type {
  Identity,
  ItemHandle,
  ItemPage,
  ListHandle,
  PermissionLevel,
  RoleAssignmentHandle,
  SiteGroup,
  SiteHandle,
} from '../core/types.js';
import { AuditError, ConnectivityError, SnapshotFormatError } from '../core/errors.js';
import type { ContentStore } from './ContentStore.js';
import {
  snapshotSchema,
  type SiteSnapshot,
  type Snapshot,
  type SnapshotRoleAssignment,
} from './snapshotSchemas.js';

interface IndexedList {
  handle: ListHandle;
  items: SiteSnapshot['lists'][number]['items'];
}

function normalizeUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').toLowerCase();
}

function assignmentKey(a: RoleAssignmentHandle): string {
  return `${a.scope}:${a.scopeId}:${a.principalId}`;
}

/**
 * ContentStore over an exported permission snapshot (one JSON document holding
 * one or more sites). Items are served page by page through a numeric offset
 * cursor so the engine exercises the same paging path as a live client.
 *
 * Handle ids are positional (list index within the site, item offset within the
 * list, assignment index within its scope); ids carried by the export are not
 * trusted to be unique.
 */
export class SnapshotContentStore implements ContentStore {
  private sites = new Map<string, SiteSnapshot>();
  private lists = new Map<string, IndexedList>();
  private items = new Map<string, SiteSnapshot['lists'][number]['items'][number]>();
  private assignments = new Map<string, SnapshotRoleAssignment>();

  constructor(snapshot: Snapshot) {
    for (const site of snapshot.sites) {
      this.sites.set(normalizeUrl(site.url), site);
    }
  }

  static fromJson(raw: unknown): SnapshotContentStore {
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotFormatError(`Invalid site snapshot: ${parsed.error.message}`, parsed.error);
    }
    return new SnapshotContentStore(parsed.data);
  }

  static fromFile(filePath: string): SnapshotContentStore {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
      throw new SnapshotFormatError(`Failed to read snapshot ${filePath}`, err);
    }
    return SnapshotContentStore.fromJson(raw);
  }

  async connect(siteUrl: string): Promise<SiteHandle> {
    const site = this.sites.get(normalizeUrl(siteUrl));
    if (!site) throw new ConnectivityError(`Site ${siteUrl} is not present in the snapshot`);
    return { url: site.url };
  }

  async listWebScopeRoleAssignments(site: SiteHandle): Promise<RoleAssignmentHandle[]> {
    const snap = this.site(site);
    return this.register('web', normalizeUrl(snap.url), snap.webRoleAssignments);
  }

  async listGroups(site: SiteHandle): Promise<SiteGroup[]> {
    return this.site(site).groups.map((g) => ({ title: g.title, ownerTitle: g.ownerTitle }));
  }

  async listNonHiddenLists(site: SiteHandle): Promise<ListHandle[]> {
    const snap = this.site(site);
    const out: ListHandle[] = [];
    snap.lists.forEach((list, index) => {
      if (list.hidden) return;
      const handle: ListHandle = {
        id: `${normalizeUrl(snap.url)}#${index}`,
        title: list.title,
        url: list.url,
      };
      this.lists.set(handle.id, { handle, items: list.items });
      out.push(handle);
    });
    return out;
  }

  async getItemsPage(list: ListHandle, pageSize: number, cursor?: string): Promise<ItemPage> {
    const indexed = this.lists.get(list.id);
    if (!indexed) throw new AuditError(`Unknown list ${list.title}`);
    const start = cursor ? Number(cursor) : 0;
    if (!Number.isInteger(start) || start < 0) {
      throw new AuditError(`Invalid page cursor "${cursor}" for list ${list.title}`);
    }
    const end = Math.min(start + pageSize, indexed.items.length);
    const items: ItemHandle[] = [];
    for (let i = start; i < end; i++) {
      const snap = indexed.items[i];
      const handle: ItemHandle = { id: String(i + 1), listId: list.id, url: snap.url };
      this.items.set(`${list.id}/${handle.id}`, snap);
      items.push(handle);
    }
    return { items, nextCursor: end < indexed.items.length ? String(end) : null };
  }

  async hasUniquePermissions(item: ItemHandle): Promise<boolean> {
    return this.item(item).uniquePermissions;
  }

  async roleAssignments(item: ItemHandle): Promise<RoleAssignmentHandle[]> {
    return this.register('item', `${item.listId}/${item.id}`, this.item(item).roleAssignments);
  }

  async member(assignment: RoleAssignmentHandle): Promise<Identity> {
    const { principal } = this.assignment(assignment);
    return { title: principal.title, kind: principal.kind, email: principal.email };
  }

  async permissionBindings(assignment: RoleAssignmentHandle): Promise<PermissionLevel[]> {
    return this.assignment(assignment).permissions.map((name) => ({ name }));
  }

  private register(
    scope: RoleAssignmentHandle['scope'],
    scopeId: string,
    source: SnapshotRoleAssignment[],
  ): RoleAssignmentHandle[] {
    return source.map((ra, index) => {
      const handle: RoleAssignmentHandle = { principalId: String(index), scope, scopeId };
      this.assignments.set(assignmentKey(handle), ra);
      return handle;
    });
  }

  private site(handle: SiteHandle): SiteSnapshot {
    const site = this.sites.get(normalizeUrl(handle.url));
    if (!site) throw new AuditError(`Unknown site ${handle.url}`);
    return site;
  }

  private item(handle: ItemHandle) {
    const item = this.items.get(`${handle.listId}/${handle.id}`);
    if (!item) throw new AuditError(`Unknown item ${handle.url}`);
    return item;
  }

  private assignment(handle: RoleAssignmentHandle): SnapshotRoleAssignment {
    const ra = this.assignments.get(assignmentKey(handle));
    if (!ra) throw new AuditError(`Unknown role assignment ${assignmentKey(handle)}`);
    return ra;
  }
}

import type { ContentStore } from '../../src/store/ContentStore.js';
import type {
  Identity,
  ItemHandle,
  ItemPage,
  ListHandle,
  PermissionLevel,
  RoleAssignmentHandle,
  SiteGroup,
  SiteHandle,
} from '../../src/core/types.js';

// Any field set to an Error makes the matching store call reject with it
export interface FakeAssignment {
  identity: Identity | Error;
  bindings: string[] | Error;
}

export interface FakeItem {
  url: string;
  unique?: boolean | Error;
  assignments?: FakeAssignment[] | Error;
}

export interface FakeList {
  title: string;
  url?: string;
  items: FakeItem[];
  failAtPage?: number; // zero-based page index that rejects
}

export interface FakeSite {
  url: string;
  connectError?: Error;
  webAssignments?: FakeAssignment[] | Error;
  groups?: SiteGroup[] | Error;
  lists?: FakeList[] | Error;
}

function orThrow<T>(value: T | Error): T {
  if (value instanceof Error) throw value;
  return value;
}

/** In-process ContentStore with per-call fault injection and call recording. */
export class FakeContentStore implements ContentStore {
  readonly pageRequests: { list: string; cursor?: string }[] = [];
  readonly inspectedItems: string[] = [];
  private assignments = new Map<string, FakeAssignment>();
  private items = new Map<string, FakeItem>();
  private lists = new Map<string, FakeList>();

  constructor(private site: FakeSite) {}

  async connect(siteUrl: string): Promise<SiteHandle> {
    if (this.site.connectError) throw this.site.connectError;
    return { url: siteUrl };
  }

  async listWebScopeRoleAssignments(): Promise<RoleAssignmentHandle[]> {
    return this.register('web', 'root', orThrow(this.site.webAssignments ?? []));
  }

  async listGroups(): Promise<SiteGroup[]> {
    return orThrow(this.site.groups ?? []);
  }

  async listNonHiddenLists(): Promise<ListHandle[]> {
    return orThrow(this.site.lists ?? []).map((l, i) => {
      const id = `list-${i}`;
      this.lists.set(id, l);
      return { id, title: l.title, url: l.url ?? `/lists/${l.title}` };
    });
  }

  async getItemsPage(list: ListHandle, pageSize: number, cursor?: string): Promise<ItemPage> {
    this.pageRequests.push({ list: list.title, cursor });
    const fake = this.lists.get(list.id);
    if (!fake) throw new Error(`unknown list ${list.id}`);
    const start = cursor ? Number(cursor) : 0;
    if (fake.failAtPage !== undefined && Math.floor(start / pageSize) === fake.failAtPage) {
      throw new Error(`page ${fake.failAtPage} unavailable for ${list.title}`);
    }
    const end = Math.min(start + pageSize, fake.items.length);
    const items: ItemHandle[] = [];
    for (let i = start; i < end; i++) {
      const id = String(i);
      this.items.set(`${list.id}/${id}`, fake.items[i]);
      items.push({ id, listId: list.id, url: fake.items[i].url });
    }
    return { items, nextCursor: end < fake.items.length ? String(end) : null };
  }

  async hasUniquePermissions(item: ItemHandle): Promise<boolean> {
    this.inspectedItems.push(item.url);
    return orThrow(this.item(item).unique ?? false);
  }

  async roleAssignments(item: ItemHandle): Promise<RoleAssignmentHandle[]> {
    const source = orThrow(this.item(item).assignments ?? []);
    return this.register('item', `${item.listId}/${item.id}`, source);
  }

  async member(ra: RoleAssignmentHandle): Promise<Identity> {
    return orThrow(this.assignment(ra).identity);
  }

  async permissionBindings(ra: RoleAssignmentHandle): Promise<PermissionLevel[]> {
    return orThrow(this.assignment(ra).bindings).map((name) => ({ name }));
  }

  private register(
    scope: RoleAssignmentHandle['scope'],
    scopeId: string,
    source: FakeAssignment[],
  ): RoleAssignmentHandle[] {
    return source.map((a, i) => {
      const handle: RoleAssignmentHandle = { principalId: String(i), scope, scopeId };
      this.assignments.set(`${scope}:${scopeId}:${i}`, a);
      return handle;
    });
  }

  private item(handle: ItemHandle): FakeItem {
    const item = this.items.get(`${handle.listId}/${handle.id}`);
    if (!item) throw new Error(`unknown item ${handle.url}`);
    return item;
  }

  private assignment(ra: RoleAssignmentHandle): FakeAssignment {
    const a = this.assignments.get(`${ra.scope}:${ra.scopeId}:${ra.principalId}`);
    if (!a) throw new Error(`unknown assignment ${ra.principalId}`);
    return a;
  }
}

export function items(count: number, prefix = '/lists/Docs/item'): FakeItem[] {
  return Array.from({ length: count }, (_, i) => ({ url: `${prefix}-${i + 1}` }));
}

export function user(title: string, email?: string): Identity {
  return email === undefined ? { title, kind: 'user' } : { title, kind: 'user', email };
}

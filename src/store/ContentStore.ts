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

/**
 * Read-only capability the audit engine consumes from a content-store client.
 * Authentication, transport, retries and timeouts belong to the implementation.
 * Any call may reject independently of the others.
 */
export interface ContentStore {
  /** Open a session for one site. Rejection here aborts the audit of that site. */
  connect(siteUrl: string): Promise<SiteHandle>;

  listWebScopeRoleAssignments(site: SiteHandle): Promise<RoleAssignmentHandle[]>;

  listGroups(site: SiteHandle): Promise<SiteGroup[]>;

  listNonHiddenLists(site: SiteHandle): Promise<ListHandle[]>;

  /**
   * Fetch one page of a list's items in the store's native order.
   * A missing or null `nextCursor` marks the last page.
   */
  getItemsPage(list: ListHandle, pageSize: number, cursor?: string): Promise<ItemPage>;

  hasUniquePermissions(item: ItemHandle): Promise<boolean>;

  roleAssignments(item: ItemHandle): Promise<RoleAssignmentHandle[]>;

  member(assignment: RoleAssignmentHandle): Promise<Identity>;

  permissionBindings(assignment: RoleAssignmentHandle): Promise<PermissionLevel[]>;
}

// Domain model for a single-site permission audit, decoupled from any store client

export type PrincipalKind = 'user' | 'group' | 'other';
export type FindingLevel = 'Critical' | 'High' | 'Medium' | 'Low';

export interface ScanConfiguration {
  readonly siteUrl: string;
  readonly internalDomains: readonly string[];
  readonly maxItemsToScan: number;
  readonly pageSize: number;
}

export interface Identity {
  title: string;
  kind: PrincipalKind;
  email?: string;
}

export interface PermissionLevel {
  name: string;
}

export interface SiteGroup {
  title: string;
  ownerTitle?: string | null;
}

// Opaque handles handed out by the content store; the engine never inspects ids
export interface SiteHandle {
  url: string;
}

export interface ListHandle {
  id: string;
  title: string;
  url: string; // root folder path, used to tag item-level findings
}

export interface ItemHandle {
  id: string;
  listId: string;
  url: string;
}

export interface RoleAssignmentHandle {
  principalId: string;
  scope: 'web' | 'list' | 'item';
  scopeId: string;
}

export interface ItemPage {
  items: ItemHandle[];
  nextCursor?: string | null;
}

export interface Finding {
  level: FindingLevel;
  message: string;
  path?: string;
}

export interface DetailRow {
  list: string;
  url: string;
  unique: boolean;
}

export interface AuditMetrics {
  siteUrl: string;
  scannedAt: string;
  itemsWithUniquePermissions: number;
  externalUsers: number;
  webDirectAssignments: number;
  orphanedGroups: number;
  anyoneOrEveryoneAtWeb: boolean;
  externalOwnerPresent: boolean;
  totalLists: number;
  totalItemsScanned: number;
}

export const REPORT_VERSION = 'mvp-1' as const;

// Frozen once assembled; the sole output of a site scan
export interface AuditReport {
  readonly version: typeof REPORT_VERSION;
  readonly site: string;
  readonly metrics: Readonly<AuditMetrics>;
  readonly notes: readonly string[];
  readonly details: readonly Readonly<DetailRow>[];
  readonly findings: readonly Readonly<Finding>[];
}

export interface RiskRating {
  level: FindingLevel;
  message: string;
}

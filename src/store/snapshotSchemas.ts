import { z } from 'zod';

export const principalSchema = z.object({
  title: z.string(),
  kind: z.enum(['user', 'group', 'other']),
  email: z.string().optional(),
});

export const roleAssignmentSchema = z.object({
  principal: principalSchema,
  permissions: z.array(z.string()).default([]),
});

export const itemSchema = z.object({
  url: z.string().min(1),
  uniquePermissions: z.boolean().default(false),
  roleAssignments: z.array(roleAssignmentSchema).default([]),
});

export const listSchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  hidden: z.boolean().default(false),
  items: z.array(itemSchema).default([]),
});

export const groupSchema = z.object({
  title: z.string(),
  ownerTitle: z.string().nullable().optional(),
});

export const siteSnapshotSchema = z.object({
  url: z.string().min(1),
  webRoleAssignments: z.array(roleAssignmentSchema).default([]),
  groups: z.array(groupSchema).default([]),
  lists: z.array(listSchema).default([]),
});

export const snapshotSchema = z.object({
  sites: z.array(siteSnapshotSchema).min(1),
});

export type SiteSnapshot = z.infer<typeof siteSnapshotSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
export type SnapshotRoleAssignment = z.infer<typeof roleAssignmentSchema>;

/**
 * Roles: named permission bundles (viewer, member, editor, admin)
 */

import type { NewRole, Role } from '../db/schema.js';

export const PERMISSIONS = [
  'view_events',
  'create_events',
  'edit_events',
  'delete_events',
  'manage_categories',
  'manage_users',
  'access_admin',
] as const;

export type PermissionName = (typeof PERMISSIONS)[number];

type PermissionFlag =
  | 'canViewEvents'
  | 'canCreateEvents'
  | 'canEditEvents'
  | 'canDeleteEvents'
  | 'canManageCategories'
  | 'canManageUsers'
  | 'canAccessAdmin';

export const PERMISSION_FLAGS: Record<PermissionName, PermissionFlag> = {
  view_events: 'canViewEvents',
  create_events: 'canCreateEvents',
  edit_events: 'canEditEvents',
  delete_events: 'canDeleteEvents',
  manage_categories: 'canManageCategories',
  manage_users: 'canManageUsers',
  access_admin: 'canAccessAdmin',
};

export type RolePermissions = Pick<Role, PermissionFlag>;

export function isPermissionName(value: string): value is PermissionName {
  return (PERMISSIONS as readonly string[]).includes(value);
}

export function roleGrants(role: RolePermissions, permission: PermissionName): boolean {
  return role[PERMISSION_FLAGS[permission]];
}

/**
 * Defaults installed by ensureDefaultRoles(); existing rows are never overwritten.
 */
export const DEFAULT_ROLES: ReadonlyArray<Omit<NewRole, 'id' | 'createdAt' | 'updatedAt'>> = [
  {
    name: 'viewer',
    description: 'Can view events and calendar only',
    canViewEvents: true,
  },
  {
    name: 'member',
    description: 'Can view events and manage own profile',
    canViewEvents: true,
  },
  {
    name: 'editor',
    description: 'Can view and create/edit/delete events',
    canViewEvents: true,
    canCreateEvents: true,
    canEditEvents: true,
    canDeleteEvents: true,
    canManageCategories: true,
  },
  {
    name: 'admin',
    description: 'Full access to all features',
    canViewEvents: true,
    canCreateEvents: true,
    canEditEvents: true,
    canDeleteEvents: true,
    canManageCategories: true,
    canManageUsers: true,
    canAccessAdmin: true,
  },
];

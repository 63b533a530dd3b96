/**
 * Permission guards shared by the services
 */

import { hasPermission, type ClubUserWithRole } from '../models/ClubUser.js';
import type { PermissionName } from '../models/Role.js';
import { AuthenticationError, PermissionDeniedError } from '../utils/errors.js';

/** The requesting user; null for anonymous requests */
export type Actor = ClubUserWithRole | null;

export function requireUser(actor: Actor): ClubUserWithRole {
  if (!actor || !actor.isActive) {
    throw new AuthenticationError();
  }
  return actor;
}

export function requirePermission(actor: Actor, permission: PermissionName): ClubUserWithRole {
  const user = requireUser(actor);
  if (!hasPermission(user, permission)) {
    throw new PermissionDeniedError();
  }
  return user;
}

export const DOCUMENT_MANAGER_PERMISSIONS: readonly PermissionName[] = ['manage_users', 'access_admin'];

export function isDocumentManager(actor: Actor): boolean {
  return (
    actor !== null &&
    actor.isActive &&
    DOCUMENT_MANAGER_PERMISSIONS.some(permission => hasPermission(actor, permission))
  );
}

/**
 * Who performed a change and from where; recorded in the event action log
 */
export interface RequestContext {
  ipAddress: string | null;
  userAgent: string;
}

export const NO_REQUEST_CONTEXT: RequestContext = { ipAddress: null, userAgent: '' };

/**
 * Club user helpers: naming, permission checks and serialization
 */

import type { ClubUser, MemberType, Role } from '../db/schema.js';
import { formatMonthDay } from '../utils/dateUtils.js';
import { roleGrants, type PermissionName } from './Role.js';

export type ClubUserWithRole = ClubUser & { role: Role | null };

export type PublicClubUser = Omit<ClubUser, 'passwordHash'>;

/**
 * Trim the address and lower-case its domain part; the local part is case-sensitive
 */
export function normalizeEmail(email: string): string {
  const trimmed = email.trim();
  const at = trimmed.lastIndexOf('@');
  if (at < 0) {
    return trimmed;
  }
  return trimmed.slice(0, at) + '@' + trimmed.slice(at + 1).toLowerCase();
}

export function getFullName(user: Pick<ClubUser, 'firstName' | 'lastName'>): string {
  return `${user.firstName} ${user.lastName}`.trim();
}

export function getShortName(user: Pick<ClubUser, 'firstName'>): string {
  return user.firstName;
}

export function getDisplayName(
  user: Pick<ClubUser, 'firstName' | 'lastName' | 'salutation'>,
): string {
  const fullName = getFullName(user);
  return user.salutation ? `${user.salutation} ${fullName}`.trim() : fullName;
}

export function getDateOfBirthDisplay(user: Pick<ClubUser, 'dateOfBirth'>): string | null {
  return formatMonthDay(user.dateOfBirth);
}

/**
 * Superusers hold every permission; users without a role hold none
 */
export function hasPermission(
  user: Pick<ClubUserWithRole, 'isSuperuser' | 'role'>,
  permission: PermissionName,
): boolean {
  if (user.isSuperuser) {
    return true;
  }
  if (!user.role) {
    return false;
  }
  return roleGrants(user.role, permission);
}

export function isAdmin(user: Pick<ClubUserWithRole, 'isSuperuser' | 'role'>): boolean {
  return user.isSuperuser || user.role?.name === 'admin';
}

export function isViewer(user: Pick<ClubUserWithRole, 'role'>): boolean {
  return user.role?.name === 'viewer';
}

export function toPublicUser(user: ClubUser): PublicClubUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export interface DirectoryEntry {
  id: number;
  email: string;
  displayName: string;
  fullName: string;
  nickname: string;
  professionalDesignation: string;
  birthday: string | null;
  primaryPhoneNumber: string;
  city: string;
  state: string;
  country: string;
  spouseName: string;
  vesselName: string;
  vesselType: string;
  memberTypes: string[];
}

/**
 * Public profile shown in the members directory. The birth year is never exposed.
 */
export function toDirectoryEntry(user: ClubUser, memberTypes: MemberType[]): DirectoryEntry {
  return {
    id: user.id,
    email: user.email,
    displayName: getDisplayName(user),
    fullName: getFullName(user),
    nickname: user.nickname,
    professionalDesignation: user.professionalDesignation,
    birthday: getDateOfBirthDisplay(user),
    primaryPhoneNumber: user.primaryPhoneNumber,
    city: user.city,
    state: user.state,
    country: user.country,
    spouseName: `${user.spouseFirstName} ${user.spouseLastName}`.trim(),
    vesselName: user.vesselName,
    vesselType: user.vesselType,
    memberTypes: memberTypes.map(type => type.name),
  };
}

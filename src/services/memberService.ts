/**
 * Club user management, self-service profiles, the members directory and
 * dependent (parent/child) validation
 */

import { z } from 'zod';
import { getTimezones, isChoiceValue, loadChoices } from '../config/choices.js';
import { Settings } from '../config/settings.js';
import type { DatabaseManager } from '../db/index.js';
import { ROLE_NAMES, type ClubUser, type MemberType, type NewClubUser } from '../db/schema.js';
import {
  getFullName,
  isViewer,
  normalizeEmail,
  toDirectoryEntry,
  toPublicUser,
  type ClubUserWithRole,
  type DirectoryEntry,
  type PublicClubUser,
} from '../models/ClubUser.js';
import { isUniqueViolation, type Repositories } from '../persistence/index.js';
import { parseCalendarDate } from '../utils/dateUtils.js';
import {
  FieldErrorCollector,
  NON_FIELD_ERRORS,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { parseInput, PHONE_MESSAGE, PHONE_REGEX } from '../utils/validation.js';
import { requirePermission, requireUser, type Actor } from './access.js';
import { hashPassword } from './authService.js';

const logger = createLogger('member-service');

const REQUIRED = 'This field is required.';
const DUPLICATE_EMAIL = 'A user with this email already exists.';
const INVALID_CHOICE = 'Select a valid choice. That choice is not one of the available choices.';

const text = (max: number) => z.string().trim().max(max);
const phone = z
  .string()
  .trim()
  .max(17)
  .refine(value => value === '' || PHONE_REGEX.test(value), PHONE_MESSAGE);
const measurement = z.number().min(0, 'Ensure this value is greater than or equal to 0.').nullable();

/**
 * Personal, address, work and vessel fields. Every key is optional so the same
 * shape serves create, update and the self-service profile.
 */
export const ProfileFieldsSchema = z
  .object({
    salutation: text(20),
    middleInitial: z
      .string()
      .trim()
      .refine(value => value === '' || /^[A-Za-z]$/.test(value), 'Middle initial must be a single letter.')
      .transform(value => value.toUpperCase()),
    professionalDesignation: text(50),
    dateOfBirth: z
      .string()
      .refine(value => parseCalendarDate(value) !== null, 'Enter a valid date.')
      .nullable(),
    nickname: text(50),
    primaryPhoneNumber: phone,
    secondaryPhoneNumber: phone,
    spouseFirstName: text(150),
    spouseLastName: text(150),
    country: text(2),
    address1: text(255),
    address2: text(255),
    city: text(100),
    state: text(2),
    zipCode: text(10),
    timezone: text(50),
    company: text(200),
    occupationTitle: text(200),
    workPhone: phone,
    vesselType: text(20),
    vesselName: text(200),
    vesselMoorageLocation: text(200),
    vesselManufacturer: text(200),
    vesselModel: text(200),
    vesselLoa: measurement,
    vesselBeam: measurement,
    vesselDraft: measurement,
    vesselCruisingSpeed: measurement,
    vesselPowerRequirements: text(20),
    vesselTiePreferences: text(30),
  })
  .partial();

export type ProfileFields = z.infer<typeof ProfileFieldsSchema>;

const PasswordFields = {
  password1: z.string().optional(),
  password2: z.string().optional(),
};

const DependentFields = {
  isDependent: z.boolean().optional(),
  parentMemberId: z.number().int().positive().nullable().optional(),
  relationshipType: text(50).optional(),
};

export const UserCreateSchema = ProfileFieldsSchema.extend({
  email: z.string().trim().min(1, REQUIRED).email('Enter a valid email address.').max(254),
  firstName: text(150).min(1, REQUIRED),
  lastName: text(150).min(1, REQUIRED),
  roleId: z.number().int().positive().nullable().optional(),
  memberTypeIds: z.array(z.number().int().positive()).default([]),
  isActive: z.boolean().default(true),
  isStaff: z.boolean().optional(),
  isSuperuser: z.boolean().optional(),
  ...PasswordFields,
  ...DependentFields,
});

export const UserUpdateSchema = ProfileFieldsSchema.extend({
  email: z.string().trim().min(1, REQUIRED).email('Enter a valid email address.').max(254).optional(),
  firstName: text(150).min(1, REQUIRED).optional(),
  lastName: text(150).min(1, REQUIRED).optional(),
  roleId: z.number().int().positive().nullable().optional(),
  memberTypeIds: z.array(z.number().int().positive()).optional(),
  isActive: z.boolean().optional(),
  isStaff: z.boolean().optional(),
  isSuperuser: z.boolean().optional(),
  ...PasswordFields,
  ...DependentFields,
});

export const ProfileUpdateSchema = ProfileFieldsSchema.extend({
  email: z.string().trim().min(1, REQUIRED).email('Enter a valid email address.').max(254).optional(),
  firstName: text(150).min(1, REQUIRED).optional(),
  lastName: text(150).min(1, REQUIRED).optional(),
  ...PasswordFields,
});

export const DirectoryQuerySchema = z.object({
  q: z.string().trim().optional(),
  memberTypeId: z.coerce.number().int().positive().optional(),
});

export const UserListQuerySchema = z.object({
  q: z.string().trim().optional(),
  roleId: z.coerce.number().int().positive().optional(),
});

/**
 * Command-line bootstrap account: no member types, no dependent rules
 */
export const InitialUserSchema = z.object({
  email: z.string().trim().email('Enter a valid email address.'),
  password: z.string().min(1, REQUIRED),
  firstName: z.string().trim().min(1, REQUIRED).max(150),
  lastName: z.string().trim().min(1, REQUIRED).max(150),
  role: z.enum(ROLE_NAMES).optional(),
  isSuperuser: z.boolean().default(false),
});

export type ManagedUser = PublicClubUser & {
  role: ClubUserWithRole['role'];
  memberTypes: MemberType[];
};

export interface MemberProfile {
  user: ManagedUser;
  parentMember: PublicClubUser | null;
  dependents: PublicClubUser[];
}

export interface AutocompleteResult {
  id: number;
  text: string;
  name: string;
  email: string;
}

interface DependentState {
  userId: number | null;
  isDependent: boolean;
  parentMemberId: number | null | undefined;
  relationshipType: string | undefined;
  memberTypeIds: number[];
}

/**
 * Check choice-list fields against the configured choices
 */
function validateChoices(fields: ProfileFields, errors: FieldErrorCollector): void {
  const choices = loadChoices();
  const checks: Array<[keyof ProfileFields, string | null | undefined, (value: string) => boolean]> = [
    ['salutation', fields.salutation, value => choices.salutations.includes(value)],
    ['country', fields.country, value => isChoiceValue(choices.countries, value)],
    ['state', fields.state, value => isChoiceValue(choices.usStates, value)],
    ['timezone', fields.timezone, value => getTimezones().has(value)],
    ['vesselType', fields.vesselType, value => isChoiceValue(choices.vesselTypes, value)],
    [
      'vesselPowerRequirements',
      fields.vesselPowerRequirements,
      value => isChoiceValue(choices.vesselPowerRequirements, value),
    ],
    [
      'vesselTiePreferences',
      fields.vesselTiePreferences,
      value => isChoiceValue(choices.vesselTiePreferences, value),
    ],
  ];
  for (const [field, value, isValid] of checks) {
    if (value && !isValid(value)) {
      errors.add(field, `Select a valid choice. ${value} is not one of the available choices.`);
    }
  }
}

function validatePasswords(
  password1: string | undefined,
  password2: string | undefined,
  required: boolean,
  errors: FieldErrorCollector,
): string | null {
  if (required) {
    if (!password1) {
      errors.add('password1', REQUIRED);
    }
    if (!password2) {
      errors.add('password2', REQUIRED);
    }
  }
  if ((password1 || password2) && password1 !== password2) {
    errors.add('password2', "The two password fields didn't match.");
  }
  return password1 ? password1 : null;
}

function profileValues(fields: ProfileFields): Partial<NewClubUser> {
  const values: Partial<NewClubUser> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      Object.assign(values, { [key]: value });
    }
  }
  return values;
}

export class MemberService {
  constructor(
    private readonly repos: Repositories,
    private readonly database: DatabaseManager,
  ) {}

  async listUsers(actor: Actor, query: unknown = {}): Promise<ManagedUser[]> {
    requirePermission(actor, 'manage_users');
    const filters = parseInput(UserListQuerySchema, query);
    const users = this.repos.users.list(filters);
    const types = this.repos.users.memberTypesFor(users.map(user => user.id));
    return users.map(user => ({
      ...toPublicUser(user),
      role: user.role,
      memberTypes: types.get(user.id) ?? [],
    }));
  }

  async getUser(actor: Actor, id: number): Promise<MemberProfile> {
    requirePermission(actor, 'manage_users');
    return this.buildProfile(id);
  }

  async getOwnProfile(actor: Actor): Promise<MemberProfile> {
    const user = requireUser(actor);
    return this.buildProfile(user.id);
  }

  async createUser(actor: Actor, input: unknown): Promise<ManagedUser> {
    requirePermission(actor, 'manage_users');
    const data = parseInput(UserCreateSchema, input);
    const {
      email,
      password1,
      password2,
      memberTypeIds,
      isDependent,
      parentMemberId,
      relationshipType,
      ...fields
    } = data;

    const errors = new FieldErrorCollector();
    const normalizedEmail = normalizeEmail(email);
    if (this.repos.users.findByEmail(normalizedEmail)) {
      errors.add('email', DUPLICATE_EMAIL);
    }
    const password = validatePasswords(password1, password2, true, errors);
    validateChoices(fields, errors);
    this.validateRole(fields.roleId, errors);
    this.validateMemberTypes(memberTypeIds, errors);
    errors.throwIfAny();

    const dependent = this.validateDependent({
      userId: null,
      isDependent: isDependent ?? false,
      parentMemberId,
      relationshipType,
      memberTypeIds,
    });

    const passwordHash = password ? await hashPassword(password) : '';
    const created = this.insertUnique(() =>
      this.database.transaction(tx => {
        const user = this.repos.users.insert(
          {
            ...profileValues(fields),
            roleId: fields.roleId ?? null,
            isActive: fields.isActive,
            isStaff: fields.isStaff ?? false,
            isSuperuser: fields.isSuperuser ?? false,
            firstName: fields.firstName,
            lastName: fields.lastName,
            email: normalizedEmail,
            passwordHash,
            ...dependent,
          },
          tx,
        );
        this.repos.users.setMemberTypes(user.id, memberTypeIds, tx);
        return user;
      }),
    );

    logger.info(`User created: ${created.email}`);
    return this.toManagedUser(created.id);
  }

  async updateUser(actor: Actor, id: number, input: unknown): Promise<ManagedUser> {
    requirePermission(actor, 'manage_users');
    const current = this.repos.users.findById(id);
    if (!current) {
      throw new NotFoundError('User', id);
    }
    const data = parseInput(UserUpdateSchema, input);
    const {
      email,
      password1,
      password2,
      memberTypeIds,
      isDependent,
      parentMemberId,
      relationshipType,
      ...fields
    } = data;

    const errors = new FieldErrorCollector();
    const normalizedEmail = email === undefined ? undefined : normalizeEmail(email);
    if (normalizedEmail !== undefined) {
      const existing = this.repos.users.findByEmail(normalizedEmail);
      if (existing && existing.id !== id) {
        errors.add('email', DUPLICATE_EMAIL);
      }
    }
    const password = validatePasswords(password1, password2, false, errors);
    validateChoices(fields, errors);
    this.validateRole(fields.roleId, errors);
    const effectiveTypeIds = memberTypeIds ?? this.repos.users.memberTypeIdsFor(id);
    this.validateMemberTypes(effectiveTypeIds, errors);
    errors.throwIfAny();

    const dependent = this.validateDependent({
      userId: id,
      isDependent: isDependent ?? current.parentMemberId !== null,
      parentMemberId: parentMemberId === undefined ? current.parentMemberId : parentMemberId,
      relationshipType: relationshipType ?? current.relationshipType,
      memberTypeIds: effectiveTypeIds,
    });

    const passwordHash = password ? await hashPassword(password) : undefined;
    this.database.transaction(tx => {
      this.repos.users.update(
        id,
        {
          ...profileValues(fields),
          ...(normalizedEmail !== undefined ? { email: normalizedEmail } : {}),
          ...(passwordHash !== undefined ? { passwordHash } : {}),
          ...dependent,
        },
        tx,
      );
      if (memberTypeIds !== undefined) {
        this.repos.users.setMemberTypes(id, memberTypeIds, tx);
      }
    });

    logger.info(`User updated: ${normalizedEmail ?? current.email}`);
    return this.toManagedUser(id);
  }

  async deleteUser(actor: Actor, id: number): Promise<void> {
    const user = requirePermission(actor, 'manage_users');
    const target = this.repos.users.findById(id);
    if (!target) {
      throw new NotFoundError('User', id);
    }
    if (target.id === user.id) {
      throw ValidationError.forField(NON_FIELD_ERRORS, 'You cannot delete your own account.');
    }
    this.repos.users.delete(id);
    logger.info(`User deleted: ${target.email}`);
  }

  /**
   * The current user edits their own profile. Role, member types, flags and
   * parent links are not editable here.
   */
  async updateOwnProfile(
    actor: Actor,
    input: unknown,
  ): Promise<{ user: ManagedUser; passwordChanged: boolean }> {
    const user = requireUser(actor);
    const { email, password1, password2, ...fields } = parseInput(ProfileUpdateSchema, input);

    const errors = new FieldErrorCollector();
    const normalizedEmail = email === undefined ? undefined : normalizeEmail(email);
    if (normalizedEmail !== undefined) {
      const existing = this.repos.users.findByEmail(normalizedEmail);
      if (existing && existing.id !== user.id) {
        errors.add('email', DUPLICATE_EMAIL);
      }
    }
    const password = validatePasswords(password1, password2, false, errors);
    validateChoices(fields, errors);
    errors.throwIfAny();

    const passwordHash = password ? await hashPassword(password) : undefined;
    this.repos.users.update(user.id, {
      ...profileValues(fields),
      ...(normalizedEmail !== undefined ? { email: normalizedEmail } : {}),
      ...(passwordHash !== undefined ? { passwordHash } : {}),
    });
    logger.info(`Profile updated: ${normalizedEmail ?? user.email}`);
    return { user: this.toManagedUser(user.id), passwordChanged: passwordHash !== undefined };
  }

  /**
   * Active members with public profile data. Viewers are refused.
   */
  async directory(actor: Actor, query: unknown = {}): Promise<DirectoryEntry[]> {
    const user = requireUser(actor);
    if (!user.isSuperuser && isViewer(user)) {
      throw new PermissionDeniedError();
    }
    const filters = parseInput(DirectoryQuerySchema, query);
    const users = this.repos.users.list({ ...filters, activeOnly: true });
    const types = this.repos.users.memberTypesFor(users.map(member => member.id));
    return users.map(member => toDirectoryEntry(member, types.get(member.id) ?? []));
  }

  async autocomplete(actor: Actor, query: string | undefined): Promise<AutocompleteResult[]> {
    requireUser(actor);
    const term = query?.trim() ?? '';
    if (term.length < Settings.AUTOCOMPLETE_MIN_LENGTH) {
      return [];
    }
    return this.repos.users
      .list({ q: term, activeOnly: true, limit: Settings.AUTOCOMPLETE_LIMIT })
      .map(user => ({
        id: user.id,
        text: `${getFullName(user)} (${user.email})`,
        name: getFullName(user),
        email: user.email,
      }));
  }

  async dependentsOf(actor: Actor, parentId: number): Promise<PublicClubUser[]> {
    const user = requireUser(actor);
    if (user.id !== parentId) {
      requirePermission(actor, 'manage_users');
    }
    return this.repos.users.dependentsOf(parentId).map(toPublicUser);
  }

  /**
   * Create an account without an acting user. Superusers default to the admin
   * role, everyone else to member.
   */
  async createInitialUser(input: unknown): Promise<ManagedUser> {
    const data = parseInput(InitialUserSchema, input);
    const email = normalizeEmail(data.email);
    if (this.repos.users.findByEmail(email)) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL);
    }
    const role = this.repos.roles.findByName(data.role ?? (data.isSuperuser ? 'admin' : 'member'));
    const passwordHash = await hashPassword(data.password);
    const user = this.insertUnique(() =>
      this.repos.users.insert({
        email,
        passwordHash,
        firstName: data.firstName,
        lastName: data.lastName,
        roleId: role?.id ?? null,
        isActive: true,
        isStaff: data.isSuperuser,
        isSuperuser: data.isSuperuser,
      }),
    );
    logger.info(`Initial user created: ${user.email}`);
    return this.toManagedUser(user.id);
  }

  /**
   * Runs an insert that may lose a race on the email column to a concurrent request
   */
  private insertUnique<T>(insert: () => T): T {
    try {
      return insert();
    } catch (error) {
      if (isUniqueViolation(error, 'club_users')) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL);
      }
      throw error;
    }
  }

  private toManagedUser(id: number): ManagedUser {
    const user = this.repos.users.findWithRole(id);
    if (!user) {
      throw new NotFoundError('User', id);
    }
    return {
      ...toPublicUser(user),
      role: user.role,
      memberTypes: this.repos.users.memberTypesFor([id]).get(id) ?? [],
    };
  }

  private buildProfile(id: number): MemberProfile {
    const user = this.toManagedUser(id);
    const parent = user.parentMemberId !== null ? this.repos.users.findById(user.parentMemberId) : undefined;
    return {
      user,
      parentMember: parent ? toPublicUser(parent) : null,
      dependents: this.repos.users.dependentsOf(id).map(toPublicUser),
    };
  }

  private validateRole(roleId: number | null | undefined, errors: FieldErrorCollector): void {
    if (roleId !== undefined && roleId !== null && !this.repos.roles.findById(roleId)) {
      errors.add('roleId', INVALID_CHOICE);
    }
  }

  private validateMemberTypes(memberTypeIds: number[], errors: FieldErrorCollector): void {
    if (memberTypeIds.length === 0) {
      errors.add('memberTypeIds', 'Please select at least one member type.');
      return;
    }
    const found = this.repos.memberTypes.findByIds(memberTypeIds);
    if (found.length !== new Set(memberTypeIds).size) {
      errors.add('memberTypeIds', INVALID_CHOICE);
    }
  }

  /**
   * Validate the parent link of a dependent and return the columns to store.
   * Non-dependents always have their parent link cleared.
   */
  private validateDependent(state: DependentState): Pick<ClubUser, 'parentMemberId' | 'relationshipType'> {
    if (!state.isDependent) {
      return { parentMemberId: null, relationshipType: '' };
    }

    if (state.parentMemberId === null || state.parentMemberId === undefined) {
      throw ValidationError.forField('parentMemberId', 'Parent member is required for dependent members.');
    }
    if (!state.relationshipType) {
      throw ValidationError.forField(
        'relationshipType',
        'Relationship type is required for dependent members.',
      );
    }
    if (state.userId !== null && state.parentMemberId === state.userId) {
      throw ValidationError.forField('parentMemberId', 'A member cannot be their own parent.');
    }
    const parent = this.repos.users.findById(state.parentMemberId);
    if (!parent) {
      throw ValidationError.forField('parentMemberId', INVALID_CHOICE);
    }

    const childTypeIds = this.repos.memberTypes
      .findByIds(state.memberTypeIds)
      .filter(type => type.canBeChild)
      .map(type => type.id);
    if (childTypeIds.length === 0) {
      throw ValidationError.forField(
        'memberTypeIds',
        'At least one selected member type must allow being a child.',
      );
    }

    const parentTypeIds = this.repos.memberTypes
      .findByIds(this.repos.users.memberTypeIdsFor(parent.id))
      .filter(type => type.canBeParent)
      .map(type => type.id);
    const relationships = this.repos.memberTypes.activeRelationshipsBetween(parentTypeIds, childTypeIds);
    if (relationships.length === 0) {
      throw ValidationError.forField(
        'memberTypeIds',
        "No valid relationship exists between the parent's member types and the selected member types.",
      );
    }

    for (const relationship of relationships) {
      if (relationship.maxChildren === null) {
        continue;
      }
      const existing = this.repos.users.countDependentsOfType(
        parent.id,
        relationship.childTypeId,
        state.userId,
      );
      if (existing >= relationship.maxChildren) {
        throw ValidationError.forField(
          'parentMemberId',
          `${getFullName(parent)} already has the maximum of ${relationship.maxChildren} ${relationship.relationshipName} dependent(s).`,
        );
      }
    }

    return { parentMemberId: parent.id, relationshipType: state.relationshipType };
  }
}

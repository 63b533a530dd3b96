/**
 * Drizzle ORM schema for Harbor Club Manager
 *
 * Defines all database tables with proper types and relationships.
 * The DDL applied at runtime lives in ./migrations.ts and must stay in step with this file.
 */

import {
  sqliteTable,
  text,
  integer,
  real,
  unique,
  uniqueIndex,
  index,
  primaryKey,
  type AnySQLiteColumn,
} from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

const createdAt = () =>
  integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date());

const updatedAt = () =>
  integer('updated_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date());

const flag = (name: string, defaultValue: boolean) =>
  integer(name, { mode: 'boolean' }).notNull().default(defaultValue);

export const ROLE_NAMES = ['viewer', 'member', 'editor', 'admin'] as const;
export type RoleName = (typeof ROLE_NAMES)[number];

export const REGISTRATION_STATUSES = [
  'not_required',
  'recommended',
  'required',
  'required_by_close_date',
  'admins_contacts_only',
  'temporarily_unavailable',
  'closed',
  'external',
] as const;
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

export const REGISTRANT_VISIBILITIES = [
  'none',
  'viewer_public',
  'members',
  'registered_members_only',
] as const;
export type RegistrantVisibility = (typeof REGISTRANT_VISIBILITIES)[number];

export const EVENT_ACTIONS = ['created', 'updated', 'deleted'] as const;
export type EventAction = (typeof EVENT_ACTIONS)[number];

// Roles - named permission bundles
export const roles = sqliteTable('roles', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name', { enum: ROLE_NAMES }).notNull().unique(),
  description: text('description').notNull().default(''),
  canViewEvents: flag('can_view_events', true),
  canCreateEvents: flag('can_create_events', false),
  canEditEvents: flag('can_edit_events', false),
  canDeleteEvents: flag('can_delete_events', false),
  canManageCategories: flag('can_manage_categories', false),
  canManageUsers: flag('can_manage_users', false),
  canAccessAdmin: flag('can_access_admin', false),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

// Member types - classification controlling eligibility and dependents
export const memberTypes = sqliteTable(
  'member_types',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull().unique(),
    description: text('description').notNull().default(''),
    isActive: flag('is_active', true),
    canBeParent: flag('can_be_parent', false),
    canBeChild: flag('can_be_child', false),
    displayOrder: integer('display_order').notNull().default(0),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  table => ({
    orderIdx: index('idx_member_types_order').on(table.displayOrder, table.name),
  }),
);

export const memberTypeRelationships = sqliteTable(
  'member_type_relationships',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    parentTypeId: integer('parent_type_id')
      .notNull()
      .references(() => memberTypes.id, { onDelete: 'cascade' }),
    childTypeId: integer('child_type_id')
      .notNull()
      .references(() => memberTypes.id, { onDelete: 'cascade' }),
    relationshipName: text('relationship_name').notNull(),
    maxChildren: integer('max_children'),
    isActive: flag('is_active', true),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  table => ({
    pair: unique('uq_member_type_relationship').on(table.parentTypeId, table.childTypeId),
  }),
);

// Club users - members and staff accounts
export const clubUsers = sqliteTable(
  'club_users',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    email: text('email').notNull().unique(),
    passwordHash: text('password_hash').notNull().default(''),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),

    salutation: text('salutation').notNull().default(''),
    middleInitial: text('middle_initial').notNull().default(''),
    professionalDesignation: text('professional_designation').notNull().default(''),
    dateOfBirth: text('date_of_birth'),
    nickname: text('nickname').notNull().default(''),

    primaryPhoneNumber: text('primary_phone_number').notNull().default(''),
    secondaryPhoneNumber: text('secondary_phone_number').notNull().default(''),
    spouseFirstName: text('spouse_first_name').notNull().default(''),
    spouseLastName: text('spouse_last_name').notNull().default(''),

    country: text('country').notNull().default(''),
    address1: text('address1').notNull().default(''),
    address2: text('address2').notNull().default(''),
    city: text('city').notNull().default(''),
    state: text('state').notNull().default(''),
    zipCode: text('zip_code').notNull().default(''),
    timezone: text('timezone').notNull().default(''),

    company: text('company').notNull().default(''),
    occupationTitle: text('occupation_title').notNull().default(''),
    workPhone: text('work_phone').notNull().default(''),

    vesselType: text('vessel_type').notNull().default(''),
    vesselName: text('vessel_name').notNull().default(''),
    vesselMoorageLocation: text('vessel_moorage_location').notNull().default(''),
    vesselManufacturer: text('vessel_manufacturer').notNull().default(''),
    vesselModel: text('vessel_model').notNull().default(''),
    vesselLoa: real('vessel_loa'),
    vesselBeam: real('vessel_beam'),
    vesselDraft: real('vessel_draft'),
    vesselCruisingSpeed: real('vessel_cruising_speed'),
    vesselPowerRequirements: text('vessel_power_requirements').notNull().default(''),
    vesselTiePreferences: text('vessel_tie_preferences').notNull().default(''),

    roleId: integer('role_id').references(() => roles.id, { onDelete: 'set null' }),
    isActive: flag('is_active', true),
    isStaff: flag('is_staff', false),
    isSuperuser: flag('is_superuser', false),
    parentMemberId: integer('parent_member_id').references((): AnySQLiteColumn => clubUsers.id, {
      onDelete: 'set null',
    }),
    relationshipType: text('relationship_type').notNull().default(''),
    dateJoined: integer('date_joined', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    lastLogin: integer('last_login', { mode: 'timestamp_ms' }),
    updatedAt: updatedAt(),
  },
  table => ({
    roleIdx: index('idx_club_users_role').on(table.roleId),
    activeIdx: index('idx_club_users_active').on(table.isActive),
    nameIdx: index('idx_club_users_name').on(table.lastName, table.firstName),
    parentIdx: index('idx_club_users_parent').on(table.parentMemberId),
  }),
);

export const clubUserMemberTypes = sqliteTable(
  'club_user_member_types',
  {
    userId: integer('user_id')
      .notNull()
      .references(() => clubUsers.id, { onDelete: 'cascade' }),
    memberTypeId: integer('member_type_id')
      .notNull()
      .references(() => memberTypes.id, { onDelete: 'cascade' }),
  },
  table => ({
    pk: primaryKey({ columns: [table.userId, table.memberTypeId] }),
  }),
);

// Calendar
export const eventCategories = sqliteTable('event_categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  description: text('description').notNull().default(''),
  color: text('color').notNull().default('#007bff'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const events = sqliteTable(
  'events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    title: text('title').notNull(),
    shortDescription: text('short_description').notNull().default(''),
    formattedDescription: text('formatted_description').notNull().default(''),
    categoryId: integer('category_id').references(() => eventCategories.id, {
      onDelete: 'set null',
    }),
    startDatetime: integer('start_datetime', { mode: 'timestamp_ms' }).notNull(),
    endDatetime: integer('end_datetime', { mode: 'timestamp_ms' }).notNull(),
    registrationStatus: text('registration_status', { enum: REGISTRATION_STATUSES })
      .notNull()
      .default('not_required'),
    registrationOpenDatetime: integer('registration_open_datetime', { mode: 'timestamp_ms' }),
    registrationCloseDatetime: integer('registration_close_datetime', { mode: 'timestamp_ms' }),
    externalRegistrationUrl: text('external_registration_url').notNull().default(''),
    registrantListVisibility: text('registrant_list_visibility', { enum: REGISTRANT_VISIBILITIES })
      .notNull()
      .default('none'),
    capacity: integer('capacity'),
    allowGuests: flag('allow_guests', false),
    maxGuestsPerRegistration: integer('max_guests_per_registration').notNull().default(0),
    guestFee: integer('guest_fee').notNull().default(0),
    createdById: integer('created_by_id').references(() => clubUsers.id, { onDelete: 'set null' }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  table => ({
    startIdx: index('idx_events_start').on(table.startDatetime),
    categoryIdx: index('idx_events_category').on(table.categoryId),
    createdIdx: index('idx_events_created').on(table.createdAt),
  }),
);

export const eventAllowedMemberTypes = sqliteTable(
  'event_allowed_member_types',
  {
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    memberTypeId: integer('member_type_id')
      .notNull()
      .references(() => memberTypes.id, { onDelete: 'cascade' }),
  },
  table => ({
    pk: primaryKey({ columns: [table.eventId, table.memberTypeId] }),
  }),
);

export const eventContacts = sqliteTable(
  'event_contacts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    memberId: integer('member_id')
      .notNull()
      .references(() => clubUsers.id, { onDelete: 'cascade' }),
    isPrimary: flag('is_primary', false),
    role: text('role').notNull().default(''),
    createdAt: createdAt(),
  },
  table => ({
    eventMember: unique('uq_event_contact').on(table.eventId, table.memberId),
    onePrimary: uniqueIndex('uq_event_primary_contact')
      .on(table.eventId)
      .where(sql`is_primary = 1`),
  }),
);

export const eventRegistrations = sqliteTable(
  'event_registrations',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    memberId: integer('member_id')
      .notNull()
      .references(() => clubUsers.id, { onDelete: 'cascade' }),
    registeredAt: integer('registered_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    notes: text('notes').notNull().default(''),
    cancelled: flag('cancelled', false),
    cancelledAt: integer('cancelled_at', { mode: 'timestamp_ms' }),
    amountDue: integer('amount_due').notNull().default(0),
    updatedAt: updatedAt(),
  },
  table => ({
    eventMember: unique('uq_event_registration').on(table.eventId, table.memberId),
    memberIdx: index('idx_event_registrations_member').on(table.memberId),
  }),
);

export const eventRegistrationFees = sqliteTable(
  'event_registration_fees',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    memberTypeId: integer('member_type_id')
      .notNull()
      .references(() => memberTypes.id, { onDelete: 'cascade' }),
    amount: integer('amount').notNull(),
  },
  table => ({
    eventType: unique('uq_event_fee').on(table.eventId, table.memberTypeId),
  }),
);

export const eventGuests = sqliteTable(
  'event_guests',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    registrationId: integer('registration_id')
      .notNull()
      .references(() => eventRegistrations.id, { onDelete: 'cascade' }),
    firstName: text('first_name').notNull(),
    lastName: text('last_name').notNull(),
    email: text('email').notNull().default(''),
    createdAt: createdAt(),
  },
  table => ({
    registrationIdx: index('idx_event_guests_registration').on(table.registrationId),
  }),
);

export interface EventSnapshot {
  title: string;
  shortDescription: string;
  category: string | null;
  startDatetime: string;
  endDatetime: string;
}

export const eventActionLogs = sqliteTable(
  'event_action_logs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    eventId: integer('event_id').references(() => events.id, { onDelete: 'set null' }),
    userId: integer('user_id').references(() => clubUsers.id, { onDelete: 'set null' }),
    action: text('action', { enum: EVENT_ACTIONS }).notNull(),
    eventTitle: text('event_title').notNull(),
    eventData: text('event_data', { mode: 'json' }).$type<EventSnapshot>(),
    timestamp: integer('timestamp', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent').notNull().default(''),
  },
  table => ({
    timestampIdx: index('idx_event_action_logs_timestamp').on(table.timestamp),
    eventIdx: index('idx_event_action_logs_event').on(table.eventId),
  }),
);

// Document management
export const documentFolders = sqliteTable(
  'document_folders',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    name: text('name').notNull(),
    parentId: integer('parent_id').references((): AnySQLiteColumn => documentFolders.id, {
      onDelete: 'cascade',
    }),
    description: text('description').notNull().default(''),
    createdById: integer('created_by_id').references(() => clubUsers.id, { onDelete: 'set null' }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  table => ({
    nameParent: unique('uq_document_folder_name').on(table.name, table.parentId),
    parentIdx: index('idx_document_folders_parent').on(table.parentId),
  }),
);

export const documentFiles = sqliteTable(
  'document_files',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    folderId: integer('folder_id')
      .notNull()
      .references(() => documentFolders.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description').notNull().default(''),
    storagePath: text('storage_path').notNull(),
    originalFilename: text('original_filename').notNull(),
    uploadedById: integer('uploaded_by_id').references(() => clubUsers.id, {
      onDelete: 'set null',
    }),
    fileSize: integer('file_size').notNull().default(0),
    mimeType: text('mime_type').notNull().default('application/octet-stream'),
    uploadedAt: integer('uploaded_at', { mode: 'timestamp_ms' })
      .notNull()
      .$defaultFn(() => new Date()),
    updatedAt: updatedAt(),
  },
  table => ({
    folderName: unique('uq_document_file_name').on(table.folderId, table.name),
    uploadedIdx: index('idx_document_files_uploaded').on(table.uploadedAt),
  }),
);

export const folderPermissions = sqliteTable(
  'folder_permissions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    folderId: integer('folder_id')
      .notNull()
      .references(() => documentFolders.id, { onDelete: 'cascade' }),
    roleId: integer('role_id')
      .notNull()
      .references(() => roles.id, { onDelete: 'cascade' }),
    canView: flag('can_view', true),
    canAdd: flag('can_add', false),
    canEdit: flag('can_edit', false),
    canDelete: flag('can_delete', false),
    createdAt: createdAt(),
  },
  table => ({
    folderRole: unique('uq_folder_permission').on(table.folderId, table.roleId),
  }),
);

// Type exports
export type Role = typeof roles.$inferSelect;
export type NewRole = typeof roles.$inferInsert;

export type MemberType = typeof memberTypes.$inferSelect;
export type NewMemberType = typeof memberTypes.$inferInsert;

export type MemberTypeRelationship = typeof memberTypeRelationships.$inferSelect;
export type NewMemberTypeRelationship = typeof memberTypeRelationships.$inferInsert;

export type ClubUser = typeof clubUsers.$inferSelect;
export type NewClubUser = typeof clubUsers.$inferInsert;

export type EventCategory = typeof eventCategories.$inferSelect;
export type NewEventCategory = typeof eventCategories.$inferInsert;

export type Event = typeof events.$inferSelect;
export type NewEvent = typeof events.$inferInsert;

export type EventContact = typeof eventContacts.$inferSelect;
export type NewEventContact = typeof eventContacts.$inferInsert;

export type EventRegistration = typeof eventRegistrations.$inferSelect;
export type NewEventRegistration = typeof eventRegistrations.$inferInsert;

export type EventRegistrationFee = typeof eventRegistrationFees.$inferSelect;
export type EventGuest = typeof eventGuests.$inferSelect;

export type EventActionLog = typeof eventActionLogs.$inferSelect;
export type NewEventActionLog = typeof eventActionLogs.$inferInsert;

export type DocumentFolder = typeof documentFolders.$inferSelect;
export type NewDocumentFolder = typeof documentFolders.$inferInsert;

export type DocumentFile = typeof documentFiles.$inferSelect;
export type NewDocumentFile = typeof documentFiles.$inferInsert;

export type FolderPermission = typeof folderPermissions.$inferSelect;
export type NewFolderPermission = typeof folderPermissions.$inferInsert;

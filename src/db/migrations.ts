/**
 * Schema migrations.
 *
 * Each migration is a list of DDL statements applied in its own transaction.
 * Applied versions are recorded in `schema_migrations`, so running the
 * migrator again only applies what is new. Keep in step with ./schema.ts.
 */

import type Database from 'better-sqlite3';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('migrations');

export interface Migration {
  version: number;
  name: string;
  statements: string[];
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'management',
    statements: [
      `CREATE TABLE roles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT '',
        can_view_events INTEGER NOT NULL DEFAULT 1,
        can_create_events INTEGER NOT NULL DEFAULT 0,
        can_edit_events INTEGER NOT NULL DEFAULT 0,
        can_delete_events INTEGER NOT NULL DEFAULT 0,
        can_manage_categories INTEGER NOT NULL DEFAULT 0,
        can_manage_users INTEGER NOT NULL DEFAULT 0,
        can_access_admin INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE TABLE member_types (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT '',
        is_active INTEGER NOT NULL DEFAULT 1,
        can_be_parent INTEGER NOT NULL DEFAULT 0,
        can_be_child INTEGER NOT NULL DEFAULT 0,
        display_order INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_member_types_order ON member_types (display_order, name)`,
      `CREATE TABLE member_type_relationships (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        parent_type_id INTEGER NOT NULL REFERENCES member_types(id) ON DELETE CASCADE,
        child_type_id INTEGER NOT NULL REFERENCES member_types(id) ON DELETE CASCADE,
        relationship_name TEXT NOT NULL,
        max_children INTEGER,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        CONSTRAINT uq_member_type_relationship UNIQUE (parent_type_id, child_type_id)
      )`,
      `CREATE TABLE club_users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        email TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL DEFAULT '',
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        salutation TEXT NOT NULL DEFAULT '',
        middle_initial TEXT NOT NULL DEFAULT '',
        professional_designation TEXT NOT NULL DEFAULT '',
        date_of_birth TEXT,
        nickname TEXT NOT NULL DEFAULT '',
        primary_phone_number TEXT NOT NULL DEFAULT '',
        secondary_phone_number TEXT NOT NULL DEFAULT '',
        spouse_first_name TEXT NOT NULL DEFAULT '',
        spouse_last_name TEXT NOT NULL DEFAULT '',
        country TEXT NOT NULL DEFAULT '',
        address1 TEXT NOT NULL DEFAULT '',
        address2 TEXT NOT NULL DEFAULT '',
        city TEXT NOT NULL DEFAULT '',
        state TEXT NOT NULL DEFAULT '',
        zip_code TEXT NOT NULL DEFAULT '',
        timezone TEXT NOT NULL DEFAULT '',
        company TEXT NOT NULL DEFAULT '',
        occupation_title TEXT NOT NULL DEFAULT '',
        work_phone TEXT NOT NULL DEFAULT '',
        vessel_type TEXT NOT NULL DEFAULT '',
        vessel_name TEXT NOT NULL DEFAULT '',
        vessel_moorage_location TEXT NOT NULL DEFAULT '',
        vessel_manufacturer TEXT NOT NULL DEFAULT '',
        vessel_model TEXT NOT NULL DEFAULT '',
        vessel_loa REAL,
        vessel_beam REAL,
        vessel_draft REAL,
        vessel_cruising_speed REAL,
        vessel_power_requirements TEXT NOT NULL DEFAULT '',
        vessel_tie_preferences TEXT NOT NULL DEFAULT '',
        role_id INTEGER REFERENCES roles(id) ON DELETE SET NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        is_staff INTEGER NOT NULL DEFAULT 0,
        is_superuser INTEGER NOT NULL DEFAULT 0,
        parent_member_id INTEGER REFERENCES club_users(id) ON DELETE SET NULL,
        relationship_type TEXT NOT NULL DEFAULT '',
        date_joined INTEGER NOT NULL,
        last_login INTEGER,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_club_users_role ON club_users (role_id)`,
      `CREATE INDEX idx_club_users_active ON club_users (is_active)`,
      `CREATE INDEX idx_club_users_name ON club_users (last_name, first_name)`,
      `CREATE INDEX idx_club_users_parent ON club_users (parent_member_id)`,
      `CREATE TABLE club_user_member_types (
        user_id INTEGER NOT NULL REFERENCES club_users(id) ON DELETE CASCADE,
        member_type_id INTEGER NOT NULL REFERENCES member_types(id) ON DELETE CASCADE,
        PRIMARY KEY (user_id, member_type_id)
      )`,
    ],
  },
  {
    version: 2,
    name: 'calendar',
    statements: [
      `CREATE TABLE event_categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        color TEXT NOT NULL DEFAULT '#007bff',
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE TABLE events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        short_description TEXT NOT NULL DEFAULT '',
        formatted_description TEXT NOT NULL DEFAULT '',
        category_id INTEGER REFERENCES event_categories(id) ON DELETE SET NULL,
        start_datetime INTEGER NOT NULL,
        end_datetime INTEGER NOT NULL,
        registration_status TEXT NOT NULL DEFAULT 'not_required',
        registration_open_datetime INTEGER,
        registration_close_datetime INTEGER,
        external_registration_url TEXT NOT NULL DEFAULT '',
        registrant_list_visibility TEXT NOT NULL DEFAULT 'none',
        capacity INTEGER,
        allow_guests INTEGER NOT NULL DEFAULT 0,
        max_guests_per_registration INTEGER NOT NULL DEFAULT 0,
        guest_fee INTEGER NOT NULL DEFAULT 0,
        created_by_id INTEGER REFERENCES club_users(id) ON DELETE SET NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_events_start ON events (start_datetime)`,
      `CREATE INDEX idx_events_category ON events (category_id)`,
      `CREATE INDEX idx_events_created ON events (created_at)`,
      `CREATE TABLE event_allowed_member_types (
        event_id INTEGER NOT NULL REFERENCES events(id) ON DELETE CASCADE,
        member_type_id INTEGER NOT NULL REFERENCES member_types(id) ON DELETE CASCADE,
        PRIMARY KEY (event_id, member_type_id)
      )`,
      `CREATE TABLE event_contacts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id INTEGER NOT NULL REFERENCES events(id) ON DELETE CASCADE,
        member_id INTEGER NOT NULL REFERENCES club_users(id) ON DELETE CASCADE,
        is_primary INTEGER NOT NULL DEFAULT 0,
        role TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL,
        CONSTRAINT uq_event_contact UNIQUE (event_id, member_id)
      )`,
      `CREATE UNIQUE INDEX uq_event_primary_contact ON event_contacts (event_id) WHERE is_primary = 1`,
      `CREATE TABLE event_registrations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id INTEGER NOT NULL REFERENCES events(id) ON DELETE CASCADE,
        member_id INTEGER NOT NULL REFERENCES club_users(id) ON DELETE CASCADE,
        registered_at INTEGER NOT NULL,
        notes TEXT NOT NULL DEFAULT '',
        cancelled INTEGER NOT NULL DEFAULT 0,
        cancelled_at INTEGER,
        amount_due INTEGER NOT NULL DEFAULT 0,
        updated_at INTEGER NOT NULL,
        CONSTRAINT uq_event_registration UNIQUE (event_id, member_id)
      )`,
      `CREATE INDEX idx_event_registrations_member ON event_registrations (member_id)`,
      `CREATE TABLE event_registration_fees (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id INTEGER NOT NULL REFERENCES events(id) ON DELETE CASCADE,
        member_type_id INTEGER NOT NULL REFERENCES member_types(id) ON DELETE CASCADE,
        amount INTEGER NOT NULL,
        CONSTRAINT uq_event_fee UNIQUE (event_id, member_type_id)
      )`,
      `CREATE TABLE event_guests (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        registration_id INTEGER NOT NULL REFERENCES event_registrations(id) ON DELETE CASCADE,
        first_name TEXT NOT NULL,
        last_name TEXT NOT NULL,
        email TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL
      )`,
      `CREATE INDEX idx_event_guests_registration ON event_guests (registration_id)`,
      `CREATE TABLE event_action_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id INTEGER REFERENCES events(id) ON DELETE SET NULL,
        user_id INTEGER REFERENCES club_users(id) ON DELETE SET NULL,
        action TEXT NOT NULL,
        event_title TEXT NOT NULL,
        event_data TEXT,
        timestamp INTEGER NOT NULL,
        ip_address TEXT,
        user_agent TEXT NOT NULL DEFAULT ''
      )`,
      `CREATE INDEX idx_event_action_logs_timestamp ON event_action_logs (timestamp)`,
      `CREATE INDEX idx_event_action_logs_event ON event_action_logs (event_id)`,
    ],
  },
  {
    version: 3,
    name: 'documents',
    statements: [
      `CREATE TABLE document_folders (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        parent_id INTEGER REFERENCES document_folders(id) ON DELETE CASCADE,
        description TEXT NOT NULL DEFAULT '',
        created_by_id INTEGER REFERENCES club_users(id) ON DELETE SET NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        CONSTRAINT uq_document_folder_name UNIQUE (name, parent_id)
      )`,
      `CREATE INDEX idx_document_folders_parent ON document_folders (parent_id)`,
      `CREATE TABLE document_files (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        folder_id INTEGER NOT NULL REFERENCES document_folders(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        storage_path TEXT NOT NULL,
        original_filename TEXT NOT NULL,
        uploaded_by_id INTEGER REFERENCES club_users(id) ON DELETE SET NULL,
        file_size INTEGER NOT NULL DEFAULT 0,
        mime_type TEXT NOT NULL DEFAULT 'application/octet-stream',
        uploaded_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        CONSTRAINT uq_document_file_name UNIQUE (folder_id, name)
      )`,
      `CREATE INDEX idx_document_files_uploaded ON document_files (uploaded_at)`,
      `CREATE TABLE folder_permissions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        folder_id INTEGER NOT NULL REFERENCES document_folders(id) ON DELETE CASCADE,
        role_id INTEGER NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
        can_view INTEGER NOT NULL DEFAULT 1,
        can_add INTEGER NOT NULL DEFAULT 0,
        can_edit INTEGER NOT NULL DEFAULT 0,
        can_delete INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        CONSTRAINT uq_folder_permission UNIQUE (folder_id, role_id)
      )`,
    ],
  },
  {
    version: 4,
    name: 'event_category_description',
    statements: [`ALTER TABLE event_categories ADD COLUMN description TEXT NOT NULL DEFAULT ''`],
  },
];

/**
 * Apply pending migrations. Returns the versions applied by this call.
 */
export function runMigrations(sqlite: Database.Database, migrations: Migration[] = MIGRATIONS): number[] {
  sqlite.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (
    version INTEGER PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at INTEGER NOT NULL
  )`);

  const appliedRows = sqlite.prepare('SELECT version FROM schema_migrations').all();
  const applied = new Set<number>();
  for (const row of appliedRows) {
    if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'number') {
      applied.add(row.version);
    }
  }

  const record = sqlite.prepare(
    'INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)',
  );
  const newlyApplied: number[] = [];

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (applied.has(migration.version)) {
      continue;
    }

    const apply = sqlite.transaction(() => {
      for (const statement of migration.statements) {
        sqlite.exec(statement);
      }
      record.run(migration.version, migration.name, Date.now());
    });

    try {
      apply();
    } catch (error) {
      logger.error(`Migration ${migration.version} (${migration.name}) failed`, error);
      throw error;
    }

    logger.info(`Applied migration ${migration.version}: ${migration.name}`);
    newlyApplied.push(migration.version);
  }

  return newlyApplied;
}

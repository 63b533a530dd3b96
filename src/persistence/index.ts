/**
 * Persistence layer exports
 */

import type { DatabaseManager } from '../db/index.js';
import {
  ActionLogRepository,
  CategoryRepository,
  EventRepository,
  RegistrationRepository,
} from './calendarRepository.js';
import {
  FileRepository,
  FolderPermissionRepository,
  FolderRepository,
} from './documentRepository.js';
import { ClubUserRepository, MemberTypeRepository, RoleRepository } from './memberRepository.js';

export * from './calendarRepository.js';
export * from './documentRepository.js';
export * from './memberRepository.js';
export * from './queryHelpers.js';

export interface Repositories {
  roles: RoleRepository;
  memberTypes: MemberTypeRepository;
  users: ClubUserRepository;
  categories: CategoryRepository;
  events: EventRepository;
  registrations: RegistrationRepository;
  actionLogs: ActionLogRepository;
  folders: FolderRepository;
  files: FileRepository;
  folderPermissions: FolderPermissionRepository;
}

export function createRepositories(database: DatabaseManager): Repositories {
  return {
    roles: new RoleRepository(database),
    memberTypes: new MemberTypeRepository(database),
    users: new ClubUserRepository(database),
    categories: new CategoryRepository(database),
    events: new EventRepository(database),
    registrations: new RegistrationRepository(database),
    actionLogs: new ActionLogRepository(database),
    folders: new FolderRepository(database),
    files: new FileRepository(database),
    folderPermissions: new FolderPermissionRepository(database),
  };
}

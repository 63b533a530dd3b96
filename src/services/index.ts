/**
 * Service wiring
 */

import type { DatabaseManager } from '../db/index.js';
import { createRepositories, type Repositories } from '../persistence/index.js';
import { ActionLogService } from './actionLogService.js';
import { AuthService } from './authService.js';
import { CategoryService } from './categoryService.js';
import { DashboardService } from './dashboardService.js';
import { DocumentService } from './documentService.js';
import { EventService } from './eventService.js';
import { FileStorage } from './fileStorage.js';
import { MemberService } from './memberService.js';
import { MembershipService } from './membershipService.js';
import { RegistrationService } from './registrationService.js';
import { RoleService } from './roleService.js';

export interface Services {
  repos: Repositories;
  auth: AuthService;
  roles: RoleService;
  membership: MembershipService;
  members: MemberService;
  categories: CategoryService;
  events: EventService;
  registrations: RegistrationService;
  actionLogs: ActionLogService;
  documents: DocumentService;
  dashboard: DashboardService;
}

export interface ServiceOptions {
  mediaRoot?: string;
  sessionSecret?: string;
}

export function createServices(database: DatabaseManager, options: ServiceOptions = {}): Services {
  const repos = createRepositories(database);
  const registrations = new RegistrationService(repos, database);
  return {
    repos,
    auth: new AuthService(repos, options.sessionSecret),
    roles: new RoleService(repos),
    membership: new MembershipService(repos, database),
    members: new MemberService(repos, database),
    categories: new CategoryService(repos),
    events: new EventService(repos, database, registrations),
    registrations,
    actionLogs: new ActionLogService(repos),
    documents: new DocumentService(repos, new FileStorage(options.mediaRoot)),
    dashboard: new DashboardService(repos),
  };
}

export type { Actor, RequestContext } from './access.js';

/**
 * Management dashboard counts
 */

import { z } from 'zod';
import { Settings } from '../config/settings.js';
import { hasPermission } from '../models/ClubUser.js';
import type { EventWithCategory, Repositories } from '../persistence/index.js';
import { PermissionDeniedError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { requireUser, type Actor } from './access.js';
import { canViewActionLogs } from './actionLogService.js';

export interface DashboardOverview {
  totalCategories: number;
  totalEvents: number;
  totalUsers: number;
  totalActionLogs?: number;
  recentEvents: EventWithCategory[];
}

export const DASHBOARD_SECTIONS = ['overview', 'events', 'users'] as const;
export type DashboardSection = (typeof DASHBOARD_SECTIONS)[number];

export const SectionQuerySchema = z.object({
  section: z.enum(DASHBOARD_SECTIONS).default('overview'),
});

export type DashboardSectionData =
  | ({ section: 'overview' } & DashboardOverview)
  | ({ section: 'events' } & Omit<DashboardOverview, 'totalUsers'>)
  | { section: 'users'; totalUsers: number };

export class DashboardService {
  constructor(private readonly repos: Repositories) {}

  async overview(actor: Actor): Promise<DashboardOverview> {
    const user = requireUser(actor);
    return {
      totalCategories: this.repos.categories.count(),
      totalEvents: this.repos.events.count(),
      totalUsers: this.repos.users.count(),
      ...(canViewActionLogs(user) ? { totalActionLogs: this.repos.actionLogs.count() } : {}),
      recentEvents: this.repos.events.recentlyCreated(Settings.DASHBOARD_RECENT_LIMIT),
    };
  }

  async section(actor: Actor, query: unknown = {}): Promise<DashboardSectionData> {
    const user = requireUser(actor);
    const { section } = parseInput(SectionQuerySchema, query);
    switch (section) {
      case 'overview':
        return { section, ...(await this.overview(user)) };
      case 'events': {
        const { totalUsers: _totalUsers, ...rest } = await this.overview(user);
        return { section, ...rest };
      }
      case 'users':
        if (!hasPermission(user, 'manage_users')) {
          throw new PermissionDeniedError("You don't have permission to view this section.");
        }
        return { section, totalUsers: this.repos.users.count() };
    }
  }
}

/**
 * Event action log listing
 */

import { z } from 'zod';
import { Settings } from '../config/settings.js';
import { EVENT_ACTIONS } from '../db/schema.js';
import { hasPermission } from '../models/ClubUser.js';
import type { ActionLogEntry, Page, Repositories } from '../persistence/index.js';
import { PermissionDeniedError } from '../utils/errors.js';
import { PageQuerySchema, parseInput } from '../utils/validation.js';
import { requireUser, type Actor } from './access.js';

export const ActionLogQuerySchema = PageQuerySchema.extend({
  action: z.enum(EVENT_ACTIONS).optional(),
  eventId: z.coerce.number().int().positive().optional(),
});

/**
 * Editors, admins and superusers may read the log
 */
export function canViewActionLogs(actor: Actor): boolean {
  return (
    actor !== null &&
    actor.isActive &&
    (hasPermission(actor, 'edit_events') || hasPermission(actor, 'delete_events'))
  );
}

export class ActionLogService {
  constructor(private readonly repos: Repositories) {}

  async listActionLogs(actor: Actor, query: unknown = {}): Promise<Page<ActionLogEntry>> {
    requireUser(actor);
    if (!canViewActionLogs(actor)) {
      throw new PermissionDeniedError("You don't have permission to view action logs.");
    }
    const { page, ...filters } = parseInput(ActionLogQuerySchema, query);
    return this.repos.actionLogs.listPage(filters, page, Settings.ACTION_LOGS_PER_PAGE);
  }
}

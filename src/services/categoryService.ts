/**
 * Event categories
 */

import { z } from 'zod';
import { Settings } from '../config/settings.js';
import type { EventCategory } from '../db/schema.js';
import type { Repositories } from '../persistence/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { HEX_COLOR_REGEX, optionalText, parseInput } from '../utils/validation.js';
import { requirePermission, requireUser, type Actor } from './access.js';

const logger = createLogger('category-service');

const name = z
  .string({ required_error: 'This field is required.' })
  .trim()
  .min(1, 'Category name cannot be empty.')
  .max(100);
const color = z.string().regex(HEX_COLOR_REGEX, 'Enter a valid hex color, e.g. #007bff.');

export const CategoryInputSchema = z.object({
  name,
  description: optionalText(1000),
  color: color.default(Settings.DEFAULT_CATEGORY_COLOR),
});

export const CategoryUpdateSchema = z.object({
  name: name.optional(),
  description: z.string().trim().max(1000).optional(),
  color: color.optional(),
});

const DUPLICATE_CATEGORY = 'Event category with this Name already exists.';

export class CategoryService {
  constructor(private readonly repos: Repositories) {}

  async listCategories(actor: Actor): Promise<EventCategory[]> {
    requireUser(actor);
    return this.repos.categories.list();
  }

  async getCategory(actor: Actor, id: number): Promise<EventCategory> {
    requireUser(actor);
    const category = this.repos.categories.findById(id);
    if (!category) {
      throw new NotFoundError('Category', id);
    }
    return category;
  }

  async createCategory(actor: Actor, input: unknown): Promise<EventCategory> {
    requirePermission(actor, 'manage_categories');
    const data = parseInput(CategoryInputSchema, input);
    if (this.repos.categories.findByName(data.name)) {
      throw ValidationError.forField('name', DUPLICATE_CATEGORY);
    }
    const category = this.repos.categories.insert(data);
    logger.info(`Category created: ${category.name}`);
    return category;
  }

  async updateCategory(actor: Actor, id: number, input: unknown): Promise<EventCategory> {
    requirePermission(actor, 'manage_categories');
    const data = parseInput(CategoryUpdateSchema, input);
    if (data.name !== undefined) {
      const existing = this.repos.categories.findByName(data.name);
      if (existing && existing.id !== id) {
        throw ValidationError.forField('name', DUPLICATE_CATEGORY);
      }
    }
    const updated = this.repos.categories.update(id, data);
    if (!updated) {
      throw new NotFoundError('Category', id);
    }
    logger.info(`Category updated: ${updated.name}`);
    return updated;
  }

  /**
   * Events in the category keep existing with no category
   */
  async deleteCategory(actor: Actor, id: number): Promise<void> {
    requirePermission(actor, 'manage_categories');
    const category = this.repos.categories.findById(id);
    if (!category) {
      throw new NotFoundError('Category', id);
    }
    this.repos.categories.delete(id);
    logger.info(`Category deleted: ${category.name}`);
  }
}

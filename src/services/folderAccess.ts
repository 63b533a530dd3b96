/**
 * Folder permission checks. A grant on a folder applies to every folder below it.
 */

import type { DocumentFolder, FolderPermission } from '../db/schema.js';
import { FolderTree } from '../models/DocumentFolder.js';
import type { Repositories } from '../persistence/index.js';
import { isDocumentManager, type Actor } from './access.js';

export type FolderPermissionType = 'view' | 'add' | 'edit' | 'delete';

type PermissionColumn = keyof Pick<FolderPermission, 'canView' | 'canAdd' | 'canEdit' | 'canDelete'>;

const PERMISSION_COLUMNS: Record<FolderPermissionType, PermissionColumn> = {
  view: 'canView',
  add: 'canAdd',
  edit: 'canEdit',
  delete: 'canDelete',
};

export class FolderAccess {
  constructor(private readonly repos: Repositories) {}

  tree(): FolderTree<DocumentFolder> {
    return new FolderTree(this.repos.folders.list());
  }

  /**
   * True when the user's role holds `type` on the folder or any of its ancestors.
   * Managers (manage_users or access_admin) hold every permission.
   */
  checkFolderPermission(
    actor: Actor,
    folderId: number,
    type: FolderPermissionType,
    tree: FolderTree<DocumentFolder> = this.tree(),
  ): boolean {
    if (!actor || !actor.isActive) {
      return false;
    }
    if (isDocumentManager(actor)) {
      return true;
    }
    if (actor.roleId === null) {
      return false;
    }
    const column = PERMISSION_COLUMNS[type];
    const granted = new Set(
      this.repos.folderPermissions
        .forRole(actor.roleId)
        .filter(permission => permission[column])
        .map(permission => permission.folderId),
    );
    return tree.selfAndAncestors(folderId).some(folder => granted.has(folder.id));
  }

  /**
   * Folders the user may view, ordered by name
   */
  getAccessibleFolders(actor: Actor, tree: FolderTree<DocumentFolder> = this.tree()): DocumentFolder[] {
    if (!actor || !actor.isActive) {
      return [];
    }
    if (isDocumentManager(actor)) {
      return tree.all();
    }
    if (actor.roleId === null) {
      return [];
    }
    const ids = new Set<number>();
    for (const permission of this.repos.folderPermissions.forRole(actor.roleId)) {
      if (!permission.canView || !tree.get(permission.folderId)) {
        continue;
      }
      ids.add(permission.folderId);
      for (const descendant of tree.descendants(permission.folderId)) {
        ids.add(descendant.id);
      }
    }
    return tree.all().filter(folder => ids.has(folder.id));
  }
}

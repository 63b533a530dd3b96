/**
 * Repositories for document folders, files and folder permissions
 */

import { and, asc, count, desc, eq, inArray, isNull, ne, sql } from 'drizzle-orm';
import type { DatabaseManager, DbExecutor } from '../db/index.js';
import {
  clubUsers,
  documentFiles,
  documentFolders,
  folderPermissions,
  roles,
  type ClubUser,
  type DocumentFile,
  type DocumentFolder,
  type FolderPermission,
  type NewDocumentFile,
  type NewDocumentFolder,
  type NewFolderPermission,
  type Role,
} from '../db/schema.js';

export class FolderRepository {
  constructor(private readonly database: DatabaseManager) {}

  list(executor: DbExecutor = this.database.getDb()): DocumentFolder[] {
    return executor.select().from(documentFolders).orderBy(asc(documentFolders.name)).all();
  }

  findById(id: number, executor: DbExecutor = this.database.getDb()): DocumentFolder | undefined {
    return executor.select().from(documentFolders).where(eq(documentFolders.id, id)).get();
  }

  /**
   * Sibling with exactly the same name. A null parent means the root level.
   */
  findSibling(name: string, parentId: number | null, excludeId?: number): DocumentFolder | undefined {
    return this.database
      .getDb()
      .select()
      .from(documentFolders)
      .where(
        and(
          eq(documentFolders.name, name),
          parentId === null ? isNull(documentFolders.parentId) : eq(documentFolders.parentId, parentId),
          excludeId !== undefined ? ne(documentFolders.id, excludeId) : undefined,
        ),
      )
      .get();
  }

  insert(values: NewDocumentFolder): DocumentFolder {
    return this.database.getDb().insert(documentFolders).values(values).returning().get();
  }

  update(id: number, values: Partial<NewDocumentFolder>): DocumentFolder | undefined {
    return this.database
      .getDb()
      .update(documentFolders)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(documentFolders.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return (
      this.database.getDb().delete(documentFolders).where(eq(documentFolders.id, id)).run().changes > 0
    );
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(documentFolders).get()?.value ?? 0;
  }
}

export type FileWithUploader = DocumentFile & {
  uploadedBy: Pick<ClubUser, 'id' | 'firstName' | 'lastName' | 'email'> | null;
};

const uploaderColumns = {
  id: clubUsers.id,
  firstName: clubUsers.firstName,
  lastName: clubUsers.lastName,
  email: clubUsers.email,
};

export class FileRepository {
  constructor(private readonly database: DatabaseManager) {}

  findById(id: number): DocumentFile | undefined {
    return this.database.getDb().select().from(documentFiles).where(eq(documentFiles.id, id)).get();
  }

  findByName(folderId: number, name: string, excludeId?: number): DocumentFile | undefined {
    return this.database
      .getDb()
      .select()
      .from(documentFiles)
      .where(
        and(
          eq(documentFiles.folderId, folderId),
          eq(documentFiles.name, name),
          excludeId !== undefined ? ne(documentFiles.id, excludeId) : undefined,
        ),
      )
      .get();
  }

  listInFolder(folderId: number): FileWithUploader[] {
    return this.database
      .getDb()
      .select({ file: documentFiles, uploadedBy: uploaderColumns })
      .from(documentFiles)
      .leftJoin(clubUsers, eq(documentFiles.uploadedById, clubUsers.id))
      .where(eq(documentFiles.folderId, folderId))
      .orderBy(asc(documentFiles.name))
      .all()
      .map(row => ({ ...row.file, uploadedBy: row.uploadedBy }));
  }

  /**
   * Newest uploads first, restricted to the given folders
   */
  recentInFolders(folderIds: number[], limit: number): FileWithUploader[] {
    if (folderIds.length === 0) {
      return [];
    }
    return this.database
      .getDb()
      .select({ file: documentFiles, uploadedBy: uploaderColumns })
      .from(documentFiles)
      .leftJoin(clubUsers, eq(documentFiles.uploadedById, clubUsers.id))
      .where(inArray(documentFiles.folderId, folderIds))
      .orderBy(desc(documentFiles.uploadedAt), desc(documentFiles.id))
      .limit(limit)
      .all()
      .map(row => ({ ...row.file, uploadedBy: row.uploadedBy }));
  }

  countInFolders(folderIds: number[]): number {
    if (folderIds.length === 0) {
      return 0;
    }
    return (
      this.database
        .getDb()
        .select({ value: count() })
        .from(documentFiles)
        .where(inArray(documentFiles.folderId, folderIds))
        .get()?.value ?? 0
    );
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(documentFiles).get()?.value ?? 0;
  }

  totalSize(): number {
    return (
      this.database
        .getDb()
        .select({ value: sql<number>`coalesce(sum(${documentFiles.fileSize}), 0)` })
        .from(documentFiles)
        .get()?.value ?? 0
    );
  }

  /**
   * Storage paths of every file in the given folders
   */
  storagePathsInFolders(folderIds: number[]): string[] {
    if (folderIds.length === 0) {
      return [];
    }
    return this.database
      .getDb()
      .select({ storagePath: documentFiles.storagePath })
      .from(documentFiles)
      .where(inArray(documentFiles.folderId, folderIds))
      .all()
      .map(row => row.storagePath);
  }

  insert(values: NewDocumentFile): DocumentFile {
    return this.database.getDb().insert(documentFiles).values(values).returning().get();
  }

  update(id: number, values: Partial<NewDocumentFile>): DocumentFile | undefined {
    return this.database
      .getDb()
      .update(documentFiles)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(documentFiles.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return this.database.getDb().delete(documentFiles).where(eq(documentFiles.id, id)).run().changes > 0;
  }
}

export type PermissionWithRole = FolderPermission & { role: Role };

export class FolderPermissionRepository {
  constructor(private readonly database: DatabaseManager) {}

  findById(id: number): FolderPermission | undefined {
    return this.database
      .getDb()
      .select()
      .from(folderPermissions)
      .where(eq(folderPermissions.id, id))
      .get();
  }

  find(folderId: number, roleId: number): FolderPermission | undefined {
    return this.database
      .getDb()
      .select()
      .from(folderPermissions)
      .where(and(eq(folderPermissions.folderId, folderId), eq(folderPermissions.roleId, roleId)))
      .get();
  }

  forFolder(folderId: number): PermissionWithRole[] {
    return this.database
      .getDb()
      .select({ permission: folderPermissions, role: roles })
      .from(folderPermissions)
      .innerJoin(roles, eq(folderPermissions.roleId, roles.id))
      .where(eq(folderPermissions.folderId, folderId))
      .orderBy(asc(roles.name))
      .all()
      .map(row => ({ ...row.permission, role: row.role }));
  }

  forRole(roleId: number): FolderPermission[] {
    return this.database
      .getDb()
      .select()
      .from(folderPermissions)
      .where(eq(folderPermissions.roleId, roleId))
      .all();
  }

  count(): number {
    return this.database.getDb().select({ value: count() }).from(folderPermissions).get()?.value ?? 0;
  }

  insert(values: NewFolderPermission): FolderPermission {
    return this.database.getDb().insert(folderPermissions).values(values).returning().get();
  }

  update(id: number, values: Partial<NewFolderPermission>): FolderPermission | undefined {
    return this.database
      .getDb()
      .update(folderPermissions)
      .set(values)
      .where(eq(folderPermissions.id, id))
      .returning()
      .get();
  }

  delete(id: number): boolean {
    return (
      this.database.getDb().delete(folderPermissions).where(eq(folderPermissions.id, id)).run()
        .changes > 0
    );
  }
}

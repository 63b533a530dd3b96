/**
 * Document management: folders, stored files, folder permissions and the
 * manager dashboard
 */

import type { ReadStream } from 'fs';
import { z } from 'zod';
import { Settings } from '../config/settings.js';
import type { DocumentFile, DocumentFolder, FolderPermission } from '../db/schema.js';
import type { ClubUserWithRole } from '../models/ClubUser.js';
import { formatFileSize, mimeTypeFor, safeFilename } from '../models/DocumentFile.js';
import type { FolderTree } from '../models/DocumentFolder.js';
import {
  isUniqueViolation,
  type FileWithUploader,
  type PermissionWithRole,
  type Repositories,
} from '../persistence/index.js';
import {
  NON_FIELD_ERRORS,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/loggingConfig.js';
import { optionalText, parseInput } from '../utils/validation.js';
import { isDocumentManager, requireUser, type Actor } from './access.js';
import { FileStorage } from './fileStorage.js';
import { FolderAccess, type FolderPermissionType } from './folderAccess.js';

const logger = createLogger('document-service');

export const FolderInputSchema = z.object({
  name: z.string().trim().min(1, 'This field is required.').max(255),
  parentId: z.number().int().positive().nullable().default(null),
  description: optionalText(2000),
});

export const FolderUpdateSchema = z.object({
  name: z.string().trim().min(1, 'This field is required.').max(255).optional(),
  parentId: z.number().int().positive().nullable().optional(),
  description: z.string().trim().max(2000).optional(),
});

export const FileUpdateSchema = z.object({
  name: z.string().trim().min(1, 'This field is required.').max(255).optional(),
  description: z.string().trim().max(2000).optional(),
  folderId: z.number().int().positive().optional(),
});

const flags = {
  canView: z.boolean(),
  canAdd: z.boolean(),
  canEdit: z.boolean(),
  canDelete: z.boolean(),
};

export const PermissionInputSchema = z.object({
  roleId: z.number().int().positive(),
  canView: flags.canView.default(true),
  canAdd: flags.canAdd.default(false),
  canEdit: flags.canEdit.default(false),
  canDelete: flags.canDelete.default(false),
});

export const PermissionUpdateSchema = z.object(flags).partial();

export interface UploadInput {
  folderId: number;
  filename: string;
  data: Buffer;
  name?: string;
  description?: string;
}

export type FolderSummary = DocumentFolder & { fullPath: string };

export type FileView = FileWithUploader & { sizeDisplay: string };

export interface FolderDetail {
  folder: FolderSummary;
  breadcrumbs: Array<Pick<DocumentFolder, 'id' | 'name'>>;
  subfolders: FolderSummary[];
  files: FileView[];
  permissions: PermissionWithRole[];
  canAdd: boolean;
  canEdit: boolean;
  canDelete: boolean;
  isManager: boolean;
}

export interface FileDetail {
  file: FileView;
  folder: FolderSummary;
  canEdit: boolean;
  canDelete: boolean;
}

export interface DocumentDashboard {
  folderCount: number;
  fileCount: number;
  permissionCount: number;
  totalSize: number;
  totalSizeDisplay: string;
  recentFiles: FileView[];
}

const DUPLICATE_FOLDER = 'A folder with this name already exists in this location.';
const DUPLICATE_PERMISSION = 'Permission for this role already exists on this folder.';

function duplicateFileMessage(name: string): string {
  return `A file with the name "${name}" already exists in this folder.`;
}

function toFileView(file: FileWithUploader): FileView {
  return { ...file, sizeDisplay: formatFileSize(file.fileSize) };
}

export class DocumentService {
  private readonly access: FolderAccess;

  constructor(
    private readonly repos: Repositories,
    private readonly storage: FileStorage = new FileStorage(),
  ) {
    this.access = new FolderAccess(repos);
  }

  checkFolderPermission(actor: Actor, folderId: number, type: FolderPermissionType): boolean {
    return this.access.checkFolderPermission(actor, folderId, type);
  }

  getAccessibleFolders(actor: Actor): DocumentFolder[] {
    return this.access.getAccessibleFolders(actor);
  }

  async listFolders(actor: Actor): Promise<{ roots: FolderSummary[]; folders: FolderSummary[] }> {
    this.requireManager(actor);
    const tree = this.access.tree();
    const summarize = (folder: DocumentFolder): FolderSummary => ({
      ...folder,
      fullPath: tree.fullPath(folder.id),
    });
    return { roots: tree.roots().map(summarize), folders: tree.all().map(summarize) };
  }

  async createFolder(actor: Actor, input: unknown): Promise<DocumentFolder> {
    const user = this.requireManager(actor);
    const data = parseInput(FolderInputSchema, input);
    if (data.parentId !== null && !this.repos.folders.findById(data.parentId)) {
      throw ValidationError.forField('parentId', 'Select a valid parent folder.');
    }
    if (this.repos.folders.findSibling(data.name, data.parentId)) {
      throw ValidationError.forField(NON_FIELD_ERRORS, DUPLICATE_FOLDER);
    }
    const folder = this.repos.folders.insert({ ...data, createdById: user.id });
    logger.info(`Folder created: ${folder.name} (${folder.id}) by ${user.email}`);
    return folder;
  }

  async getFolderDetail(actor: Actor, id: number): Promise<FolderDetail> {
    const tree = this.access.tree();
    const folder = this.loadFolder(tree, id);
    this.requireFolderPermission(actor, id, 'view', tree);

    const summarize = (row: DocumentFolder): FolderSummary => ({
      ...row,
      fullPath: tree.fullPath(row.id),
    });
    return {
      folder: summarize(folder),
      breadcrumbs: [...tree.ancestors(id), folder].map(crumb => ({ id: crumb.id, name: crumb.name })),
      subfolders: tree
        .childrenOf(id)
        .filter(child => this.access.checkFolderPermission(actor, child.id, 'view', tree))
        .map(summarize),
      files: this.repos.files.listInFolder(id).map(toFileView),
      permissions: this.repos.folderPermissions.forFolder(id),
      canAdd: this.access.checkFolderPermission(actor, id, 'add', tree),
      canEdit: this.access.checkFolderPermission(actor, id, 'edit', tree),
      canDelete: this.access.checkFolderPermission(actor, id, 'delete', tree),
      isManager: isDocumentManager(actor),
    };
  }

  async updateFolder(actor: Actor, id: number, input: unknown): Promise<DocumentFolder> {
    const tree = this.access.tree();
    const folder = this.loadFolder(tree, id);
    this.requireFolderPermission(actor, id, 'edit', tree);
    const data = parseInput(FolderUpdateSchema, input);

    const parentId = data.parentId === undefined ? folder.parentId : data.parentId;
    const name = data.name ?? folder.name;
    if (parentId !== null) {
      if (parentId === id) {
        throw ValidationError.forField('parentId', 'A folder cannot be its own parent.');
      }
      if (!tree.get(parentId)) {
        throw ValidationError.forField('parentId', 'Select a valid parent folder.');
      }
      if (tree.wouldCreateCycle(id, parentId)) {
        throw ValidationError.forField('parentId', 'Circular reference detected in folder hierarchy.');
      }
    }
    if (this.repos.folders.findSibling(name, parentId, id)) {
      throw ValidationError.forField(NON_FIELD_ERRORS, DUPLICATE_FOLDER);
    }

    const updated = this.repos.folders.update(id, data);
    if (!updated) {
      throw new NotFoundError('Folder', id);
    }
    logger.info(`Folder updated: ${updated.name} (${id})`);
    return updated;
  }

  /**
   * Folders a folder may be moved under: everything except itself and its descendants
   */
  async parentChoices(actor: Actor, id: number): Promise<FolderSummary[]> {
    const tree = this.access.tree();
    this.loadFolder(tree, id);
    this.requireFolderPermission(actor, id, 'edit', tree);
    const excluded = new Set([id, ...tree.descendants(id).map(folder => folder.id)]);
    return tree
      .all()
      .filter(folder => !excluded.has(folder.id))
      .map(folder => ({ ...folder, fullPath: tree.fullPath(folder.id) }));
  }

  /**
   * Deletes the folder, everything below it and their stored files
   */
  async deleteFolder(actor: Actor, id: number): Promise<void> {
    const tree = this.access.tree();
    const folder = this.loadFolder(tree, id);
    this.requireFolderPermission(actor, id, 'delete', tree);

    const folderIds = [id, ...tree.descendants(id).map(descendant => descendant.id)];
    const storedPaths = this.repos.files.storagePathsInFolders(folderIds);
    this.repos.folders.delete(id);
    await Promise.all(storedPaths.map(storedPath => this.storage.remove(storedPath)));
    logger.info(`Folder deleted: ${folder.name} (${id}) with ${storedPaths.length} file(s)`);
  }

  async uploadFile(actor: Actor, input: UploadInput): Promise<FileView> {
    const user = requireUser(actor);
    const tree = this.access.tree();
    this.loadFolder(tree, input.folderId);
    this.requireFolderPermission(user, input.folderId, 'add', tree);

    if (input.data.length === 0) {
      throw ValidationError.forField('file', 'The submitted file is empty.');
    }
    if (input.data.length > Settings.MAX_UPLOAD_BYTES) {
      throw ValidationError.forField(
        'file',
        `File size must not exceed ${formatFileSize(Settings.MAX_UPLOAD_BYTES)}.`,
      );
    }

    const originalFilename = safeFilename(input.filename);
    const name = input.name?.trim() || originalFilename;
    if (this.repos.files.findByName(input.folderId, name)) {
      throw ValidationError.forField('name', duplicateFileMessage(name));
    }

    const directory = FileStorage.directoryFor(tree.filesystemPath(input.folderId));
    const storagePath = await this.storage.save(directory, originalFilename, input.data);
    let file: DocumentFile;
    try {
      file = this.repos.files.insert({
        folderId: input.folderId,
        name,
        description: input.description?.trim() ?? '',
        storagePath,
        originalFilename,
        uploadedById: user.id,
        fileSize: input.data.length,
        mimeType: mimeTypeFor(originalFilename),
      });
    } catch (error) {
      await this.storage.remove(storagePath);
      if (isUniqueViolation(error, 'document_files')) {
        throw ValidationError.forField('name', duplicateFileMessage(name));
      }
      throw error;
    }

    logger.info(`File uploaded: ${storagePath} (${file.fileSize} bytes) by ${user.email}`);
    return this.fileView(file.id);
  }

  async getFileDetail(actor: Actor, id: number): Promise<FileDetail> {
    const file = this.loadFile(id);
    const tree = this.access.tree();
    this.requireFolderPermission(actor, file.folderId, 'view', tree);
    const folder = this.loadFolder(tree, file.folderId);
    return {
      file: this.fileView(id),
      folder: { ...folder, fullPath: tree.fullPath(folder.id) },
      canEdit: this.access.checkFolderPermission(actor, file.folderId, 'edit', tree),
      canDelete: this.access.checkFolderPermission(actor, file.folderId, 'delete', tree),
    };
  }

  async openDownload(actor: Actor, id: number): Promise<{ file: DocumentFile; stream: ReadStream }> {
    const file = this.loadFile(id);
    this.requireFolderPermission(actor, file.folderId, 'view');
    if (!(await this.storage.exists(file.storagePath))) {
      throw NotFoundError.withMessage('File not found on server.');
    }
    return { file, stream: this.storage.createReadStream(file.storagePath) };
  }

  async updateFile(actor: Actor, id: number, input: unknown): Promise<FileView> {
    const file = this.loadFile(id);
    const tree = this.access.tree();
    this.requireFolderPermission(actor, file.folderId, 'edit', tree);
    const data = parseInput(FileUpdateSchema, input);

    const folderId = data.folderId ?? file.folderId;
    if (folderId !== file.folderId) {
      this.loadFolder(tree, folderId);
      this.requireFolderPermission(actor, folderId, 'add', tree);
    }
    const name = data.name ?? file.name;
    if (this.repos.files.findByName(folderId, name, id)) {
      throw ValidationError.forField('name', duplicateFileMessage(name));
    }

    this.repos.files.update(id, data);
    logger.info(`File updated: ${name} (${id})`);
    return this.fileView(id);
  }

  async deleteFile(actor: Actor, id: number): Promise<void> {
    const file = this.loadFile(id);
    this.requireFolderPermission(actor, file.folderId, 'delete');
    this.repos.files.delete(id);
    await this.storage.remove(file.storagePath);
    logger.info(`File deleted: ${file.name} (${id})`);
  }

  async createPermission(actor: Actor, folderId: number, input: unknown): Promise<FolderPermission> {
    this.requireManager(actor);
    if (!this.repos.folders.findById(folderId)) {
      throw new NotFoundError('Folder', folderId);
    }
    const data = parseInput(PermissionInputSchema, input);
    if (!this.repos.roles.findById(data.roleId)) {
      throw ValidationError.forField(
        'roleId',
        'Select a valid choice. That choice is not one of the available choices.',
      );
    }
    if (this.repos.folderPermissions.find(folderId, data.roleId)) {
      throw ValidationError.forField(NON_FIELD_ERRORS, DUPLICATE_PERMISSION);
    }
    const permission = this.repos.folderPermissions.insert({ ...data, folderId });
    logger.info(`Folder permission created: folder ${folderId}, role ${data.roleId}`);
    return permission;
  }

  async updatePermission(actor: Actor, id: number, input: unknown): Promise<FolderPermission> {
    this.requireManager(actor);
    const data = parseInput(PermissionUpdateSchema, input);
    const updated = this.repos.folderPermissions.update(id, data);
    if (!updated) {
      throw new NotFoundError('Folder permission', id);
    }
    return updated;
  }

  async deletePermission(actor: Actor, id: number): Promise<void> {
    this.requireManager(actor);
    if (!this.repos.folderPermissions.delete(id)) {
      throw new NotFoundError('Folder permission', id);
    }
  }

  async dashboard(actor: Actor): Promise<DocumentDashboard> {
    this.requireManager(actor);
    const totalSize = this.repos.files.totalSize();
    const folderIds = this.repos.folders.list().map(folder => folder.id);
    return {
      folderCount: folderIds.length,
      fileCount: this.repos.files.count(),
      permissionCount: this.repos.folderPermissions.count(),
      totalSize,
      totalSizeDisplay: formatFileSize(totalSize),
      recentFiles: this.repos.files
        .recentInFolders(folderIds, Settings.DASHBOARD_RECENT_LIMIT)
        .map(toFileView),
    };
  }

  private requireManager(actor: Actor): ClubUserWithRole {
    const user = requireUser(actor);
    if (!isDocumentManager(user)) {
      throw new PermissionDeniedError();
    }
    return user;
  }

  private requireFolderPermission(
    actor: Actor,
    folderId: number,
    type: FolderPermissionType,
    tree?: FolderTree<DocumentFolder>,
  ): void {
    requireUser(actor);
    if (!this.access.checkFolderPermission(actor, folderId, type, tree)) {
      throw new PermissionDeniedError();
    }
  }

  private loadFolder(tree: FolderTree<DocumentFolder>, id: number): DocumentFolder {
    const folder = tree.get(id);
    if (!folder) {
      throw new NotFoundError('Folder', id);
    }
    return folder;
  }

  private loadFile(id: number): DocumentFile {
    const file = this.repos.files.findById(id);
    if (!file) {
      throw new NotFoundError('File', id);
    }
    return file;
  }

  private fileView(id: number): FileView {
    const file = this.repos.files.findById(id);
    if (!file) {
      throw new NotFoundError('File', id);
    }
    const uploader =
      file.uploadedById !== null ? this.repos.users.findById(file.uploadedById) : undefined;
    return toFileView({
      ...file,
      uploadedBy: uploader
        ? {
            id: uploader.id,
            firstName: uploader.firstName,
            lastName: uploader.lastName,
            email: uploader.email,
          }
        : null,
    });
  }
}

/**
 * Document library tests: folders, cascading permissions, uploads and downloads
 */

import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { DocumentFolder } from '../../src/db/schema.js';
import type { ClubUserWithRole } from '../../src/models/ClubUser.js';
import { NON_FIELD_ERRORS, NotFoundError, PermissionDeniedError, ValidationError } from '../../src/utils/errors.js';
import { insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('DocumentService', () => {
  let mediaRoot: string;
  let ctx: TestContext;
  let manager: ClubUserWithRole;
  let member: ClubUserWithRole;
  let board: DocumentFolder;
  let minutes: DocumentFolder;

  beforeEach(async () => {
    mediaRoot = await mkdtemp(path.join(os.tmpdir(), 'club-media-'));
    ctx = await setupTestContext({ mediaRoot });
    manager = insertUser(ctx, 'admin');
    member = insertUser(ctx, 'member');
    board = await ctx.services.documents.createFolder(manager, { name: 'Board Room' });
    minutes = await ctx.services.documents.createFolder(manager, { name: 'Minutes', parentId: board.id });
  });

  afterEach(async () => {
    ctx.database.close();
    await rm(mediaRoot, { recursive: true, force: true });
  });

  describe('folders', () => {
    it('should only let managers create folders', async () => {
      await expect(ctx.services.documents.createFolder(member, { name: 'Private' })).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
    });

    it('should reject a sibling with the same name', async () => {
      const error = await ctx.services.documents
        .createFolder(manager, { name: 'Minutes', parentId: board.id })
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fieldErrors).toEqual({
          [NON_FIELD_ERRORS]: ['A folder with this name already exists in this location.'],
        });
      }
    });

    it('should allow the same name under a different parent', async () => {
      const other = await ctx.services.documents.createFolder(manager, { name: 'Minutes' });
      expect(other.parentId).toBeNull();
    });

    it('should treat sibling names case-sensitively', async () => {
      const lower = await ctx.services.documents.createFolder(manager, {
        name: 'minutes',
        parentId: board.id,
      });
      expect(lower.name).toBe('minutes');

      await expect(
        ctx.services.documents.createFolder(manager, { name: 'minutes', parentId: board.id }),
      ).rejects.toThrow('A folder with this name already exists in this location.');
    });

    it('should refuse to move a folder below itself', async () => {
      await expect(
        ctx.services.documents.updateFolder(manager, board.id, { parentId: minutes.id }),
      ).rejects.toThrow('Circular reference detected in folder hierarchy.');
      await expect(
        ctx.services.documents.updateFolder(manager, board.id, { parentId: board.id }),
      ).rejects.toThrow('A folder cannot be its own parent.');
    });

    it('should offer every folder but itself and its descendants as a parent', async () => {
      const other = await ctx.services.documents.createFolder(manager, { name: 'Racing' });
      const choices = await ctx.services.documents.parentChoices(manager, board.id);
      expect(choices.map(folder => folder.id)).toEqual([other.id]);
    });

    it('should list folders with their full paths', async () => {
      const { roots, folders } = await ctx.services.documents.listFolders(manager);
      expect(roots.map(folder => folder.name)).toEqual(['Board Room']);
      expect(folders.map(folder => folder.fullPath)).toEqual(['Board Room', 'Board Room/Minutes']);
    });
  });

  describe('permissions', () => {
    it('should cascade a grant to every folder below', async () => {
      await ctx.services.documents.createPermission(manager, board.id, { roleId: ctx.roles.member.id });

      expect(ctx.services.documents.checkFolderPermission(member, minutes.id, 'view')).toBe(true);
      expect(ctx.services.documents.checkFolderPermission(member, minutes.id, 'add')).toBe(false);
      expect(ctx.services.documents.getAccessibleFolders(member).map(folder => folder.id)).toEqual([
        board.id,
        minutes.id,
      ]);
    });

    it('should not grant anything upwards', async () => {
      await ctx.services.documents.createPermission(manager, minutes.id, { roleId: ctx.roles.member.id });

      expect(ctx.services.documents.checkFolderPermission(member, board.id, 'view')).toBe(false);
      await expect(ctx.services.documents.getFolderDetail(member, board.id)).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );
      const detail = await ctx.services.documents.getFolderDetail(member, minutes.id);
      expect(detail.breadcrumbs.map(crumb => crumb.name)).toEqual(['Board Room', 'Minutes']);
      expect(detail.isManager).toBe(false);
    });

    it('should grant managers everything', () => {
      expect(ctx.services.documents.checkFolderPermission(manager, minutes.id, 'delete')).toBe(true);
      expect(ctx.services.documents.checkFolderPermission(null, minutes.id, 'view')).toBe(false);
    });

    it('should reject a second permission for the same role', async () => {
      await ctx.services.documents.createPermission(manager, board.id, { roleId: ctx.roles.member.id });
      await expect(
        ctx.services.documents.createPermission(manager, board.id, { roleId: ctx.roles.member.id }),
      ).rejects.toThrow('Permission for this role already exists on this folder.');
    });

    it('should update and delete permissions', async () => {
      const permission = await ctx.services.documents.createPermission(manager, board.id, {
        roleId: ctx.roles.member.id,
      });
      const updated = await ctx.services.documents.updatePermission(manager, permission.id, { canAdd: true });
      expect(updated).toMatchObject({ canView: true, canAdd: true, canEdit: false, canDelete: false });

      await ctx.services.documents.deletePermission(manager, permission.id);
      expect(ctx.services.documents.checkFolderPermission(member, board.id, 'view')).toBe(false);
      await expect(ctx.services.documents.deletePermission(manager, permission.id)).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe('files', () => {
    beforeEach(async () => {
      await ctx.services.documents.createPermission(manager, board.id, {
        roleId: ctx.roles.member.id,
        canAdd: true,
      });
    });

    it('should store an upload under the folder path', async () => {
      const file = await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('Quorum reached.'),
      });

      expect(file).toMatchObject({
        name: 'march.txt',
        originalFilename: 'march.txt',
        storagePath: 'documents/Board_Room/Minutes/march.txt',
        fileSize: 15,
        mimeType: 'text/plain',
        sizeDisplay: '15.0 B',
      });
      expect(file.uploadedBy?.id).toBe(member.id);
      expect(await readFile(path.join(mediaRoot, file.storagePath), 'utf8')).toBe('Quorum reached.');
    });

    it('should suffix a stored name that is already taken', async () => {
      await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('first'),
      });
      const second = await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        name: 'March (revised)',
        data: Buffer.from('second'),
      });
      expect(second.storagePath).toBe('documents/Board_Room/Minutes/march_1.txt');
    });

    it('should reject empty files and duplicate names', async () => {
      await expect(
        ctx.services.documents.uploadFile(member, {
          folderId: minutes.id,
          filename: 'empty.txt',
          data: Buffer.alloc(0),
        }),
      ).rejects.toThrow('The submitted file is empty.');

      await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('first'),
      });
      await expect(
        ctx.services.documents.uploadFile(member, {
          folderId: minutes.id,
          filename: 'other.txt',
          name: 'march.txt',
          data: Buffer.from('second'),
        }),
      ).rejects.toThrow('A file with the name "march.txt" already exists in this folder.');
    });

    it('should report a duplicate name when two uploads race for it', async () => {
      const results = await Promise.allSettled([
        ctx.services.documents.uploadFile(member, {
          folderId: minutes.id,
          filename: 'agenda.txt',
          data: Buffer.from('first'),
        }),
        ctx.services.documents.uploadFile(member, {
          folderId: minutes.id,
          filename: 'agenda.txt',
          data: Buffer.from('second'),
        }),
      ]);

      const stored = results.flatMap(result => (result.status === 'fulfilled' ? [result.value] : []));
      expect(stored).toHaveLength(1);
      const rejected = results.find(result => result.status === 'rejected');
      const reason: unknown = rejected?.status === 'rejected' ? rejected.reason : undefined;
      expect(reason).toBeInstanceOf(ValidationError);
      if (reason instanceof ValidationError) {
        expect(reason.fieldErrors).toEqual({
          name: ['A file with the name "agenda.txt" already exists in this folder.'],
        });
      }
      expect(await readdir(path.join(mediaRoot, 'documents/Board_Room/Minutes'))).toEqual([
        path.posix.basename(stored[0]?.storagePath ?? ''),
      ]);
    });

    it('should refuse uploads without the add permission', async () => {
      const viewer = insertUser(ctx, 'viewer');
      await expect(
        ctx.services.documents.uploadFile(viewer, {
          folderId: minutes.id,
          filename: 'march.txt',
          data: Buffer.from('x'),
        }),
      ).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('should stream a download and report missing stored files', async () => {
      const file = await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('Quorum reached.'),
      });

      const download = await ctx.services.documents.openDownload(member, file.id);
      expect(download.file.mimeType).toBe('text/plain');
      expect(await readStream(download.stream)).toBe('Quorum reached.');

      await rm(path.join(mediaRoot, file.storagePath));
      await expect(ctx.services.documents.openDownload(member, file.id)).rejects.toThrow(
        'File not found on server.',
      );
    });

    it('should only delete with the delete permission', async () => {
      const file = await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('Quorum reached.'),
      });
      await expect(ctx.services.documents.deleteFile(member, file.id)).rejects.toBeInstanceOf(
        PermissionDeniedError,
      );

      await ctx.services.documents.deleteFile(manager, file.id);
      expect(ctx.services.repos.files.findById(file.id)).toBeUndefined();
    });

    it('should delete a folder tree with its stored files', async () => {
      const file = await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.from('Quorum reached.'),
      });

      await ctx.services.documents.deleteFolder(manager, board.id);

      expect(ctx.services.repos.folders.findById(minutes.id)).toBeUndefined();
      expect(ctx.services.repos.files.findById(file.id)).toBeUndefined();
      await expect(readFile(path.join(mediaRoot, file.storagePath))).rejects.toThrow();
    });

    it('should summarize the library on the dashboard', async () => {
      await ctx.services.documents.uploadFile(member, {
        folderId: minutes.id,
        filename: 'march.txt',
        data: Buffer.alloc(2048),
      });
      const dashboard = await ctx.services.documents.dashboard(manager);
      expect(dashboard).toMatchObject({
        folderCount: 2,
        fileCount: 1,
        permissionCount: 1,
        totalSize: 2048,
        totalSizeDisplay: '2.0 KB',
      });
      expect(dashboard.recentFiles.map(file => file.name)).toEqual(['march.txt']);
    });
  });
});

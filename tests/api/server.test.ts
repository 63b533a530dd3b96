/**
 * HTTP tests against the Fastify server, driven through inject()
 */

import type { FastifyInstance } from 'fastify';
import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { contentDisposition } from '../../src/api/documentRoutes.js';
import type { ClubUserWithRole } from '../../src/models/ClubUser.js';
import { createServer } from '../../src/server/fastifyServer.js';
import { hashPassword } from '../../src/services/authService.js';
import { insertEvent, insertUser, setupTestContext, type TestContext } from '../db/testSetup.js';

describe('Fastify server', () => {
  let mediaRoot: string;
  let ctx: TestContext;
  let app: FastifyInstance;
  let admin: ClubUserWithRole;
  let member: ClubUserWithRole;

  const bearer = (user: ClubUserWithRole) => ({
    authorization: `Bearer ${ctx.services.auth.signToken(user.id)}`,
  });

  beforeEach(async () => {
    mediaRoot = await mkdtemp(path.join(os.tmpdir(), 'club-api-'));
    ctx = await setupTestContext({ mediaRoot });
    app = await createServer({ services: ctx.services, database: ctx.database });
    admin = insertUser(ctx, 'admin', {
      email: 'commodore@example.com',
      firstName: 'Cora',
      lastName: 'Commodore',
      passwordHash: await hashPassword('test-password'),
    });
    member = insertUser(ctx, 'member');
  });

  afterEach(async () => {
    await app.close();
    ctx.database.close();
    await rm(mediaRoot, { recursive: true, force: true });
  });

  describe('health and routing', () => {
    it('should report a healthy database', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('ok');
      expect(body.database).toEqual({ status: 'healthy', details: 'Database is responsive' });
    });

    it('should answer unknown routes with a JSON 404', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/nowhere' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Not Found', message: 'Route GET /api/nowhere not found' });
    });
  });

  describe('authentication', () => {
    it('should log in, set the session cookie and resolve /me from it', async () => {
      const login = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'commodore@example.com', password: 'test-password' },
      });

      expect(login.statusCode).toBe(200);
      expect(login.json().success).toBe(true);
      const cookie = login.cookies.find(entry => entry.name === 'session');
      expect(cookie?.value).toBe(login.json().token);
      expect(cookie?.httpOnly).toBe(true);

      const me = await app.inject({
        method: 'GET',
        url: '/api/auth/me',
        cookies: { session: login.json().token },
      });
      expect(me.statusCode).toBe(200);
      expect(me.json().user.email).toBe('commodore@example.com');
      expect(me.json().user.role.name).toBe('admin');
    });

    it('should reject bad credentials with 401', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        payload: { email: 'commodore@example.com', password: 'wrong' },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json().error).toBe('Unauthorized');
    });

    it('should require a session for /me', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/auth/me' });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'Unauthorized', message: 'Authentication required' });
    });

    it('should accept a bearer token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/auth/me', headers: bearer(member) });

      expect(res.statusCode).toBe(200);
      expect(res.json().user.id).toBe(member.id);
    });

    it('should clear the cookie on logout', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/auth/logout' });

      expect(res.json()).toEqual({ success: true, message: 'Logged out successfully' });
      expect(res.cookies.find(entry => entry.name === 'session')?.value).toBe('');
    });
  });

  describe('calendar', () => {
    it('should serve the feed without a session', async () => {
      const event = insertEvent(ctx);

      const res = await app.inject({ method: 'GET', url: '/api/calendar/events/feed' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual([
        {
          id: event.id,
          title: 'Harbor Cleanup',
          start: '2030-06-01T16:00:00.000Z',
          end: '2030-06-01T19:00:00.000Z',
          allDay: false,
          description: 'Annual cleanup of the marina',
          url: `/calendar/events/${event.id}`,
          color: '#007bff',
          category: 'Uncategorized',
        },
      ]);
    });

    it('should filter the feed by range', async () => {
      insertEvent(ctx);

      const res = await app.inject({
        method: 'GET',
        url: '/api/calendar/events/feed?start=2030-07-01T00:00:00Z&end=2030-08-01T00:00:00Z',
      });

      expect(res.json()).toEqual([]);
    });

    it('should forbid viewers from creating events', async () => {
      const viewer = insertUser(ctx, 'viewer');

      const res = await app.inject({
        method: 'POST',
        url: '/api/calendar/events',
        headers: bearer(viewer),
        payload: { title: 'Regatta' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({
        error: 'Forbidden',
        message: "You don't have permission to access this page.",
      });
    });

    it('should return field errors for an invalid event', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/calendar/events',
        headers: bearer(admin),
        payload: {
          title: '   ',
          startDatetime: '2030-06-01T16:00:00Z',
          endDatetime: '2030-06-01T19:00:00Z',
        },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe('Bad Request');
      expect(body.message).toBe('This field is required.');
      expect(body.fieldErrors.title).toEqual(['This field is required.']);
    });

    it('should answer 404 for an unknown event', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/calendar/events/999' });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('Not Found');
    });
  });

  describe('documents', () => {
    it('should upload a file and serve it back as an attachment', async () => {
      const folder = await app.inject({
        method: 'POST',
        url: '/api/documents/folders',
        headers: bearer(admin),
        payload: { name: 'Board Room' },
      });
      expect(folder.statusCode).toBe(201);
      const folderId: number = folder.json().id;

      const upload = await app.inject({
        method: 'POST',
        url: `/api/documents/folders/${folderId}/files?description=Spring%20minutes`,
        headers: {
          ...bearer(admin),
          'content-type': 'application/octet-stream',
          'x-filename': encodeURIComponent('march minutes.txt'),
        },
        payload: Buffer.from('hello'),
      });
      expect(upload.statusCode).toBe(201);
      const file = upload.json();
      expect(file.name).toBe('march minutes.txt');
      expect(file.description).toBe('Spring minutes');
      expect(file.fileSize).toBe(5);
      expect(file.mimeType).toBe('text/plain');
      expect(file.storagePath).toBe('documents/Board_Room/march minutes.txt');

      const download = await app.inject({
        method: 'GET',
        url: `/api/documents/files/${file.id}/download`,
        headers: bearer(admin),
      });
      expect(download.statusCode).toBe(200);
      expect(download.headers['content-disposition']).toBe('attachment; filename="march minutes.txt"');
      expect(download.body).toBe('hello');
    });

    it('should download a file whose name is not ASCII', async () => {
      const folder = await ctx.services.documents.createFolder(admin, { name: 'Board Room' });

      const upload = await app.inject({
        method: 'POST',
        url: `/api/documents/folders/${folder.id}/files`,
        headers: {
          ...bearer(admin),
          'content-type': 'application/octet-stream',
          'x-filename': encodeURIComponent('議事録.txt'),
        },
        payload: Buffer.from('hello'),
      });
      expect(upload.statusCode).toBe(201);
      expect(upload.json().originalFilename).toBe('議事録.txt');

      const download = await app.inject({
        method: 'GET',
        url: `/api/documents/files/${upload.json().id}/download`,
        headers: bearer(admin),
      });
      expect(download.statusCode).toBe(200);
      expect(download.headers['content-disposition']).toBe(
        "attachment; filename=\"___.txt\"; filename*=UTF-8''%E8%AD%B0%E4%BA%8B%E9%8C%B2.txt",
      );
      expect(download.body).toBe('hello');
    });

    it('should send errors without the attachment header', async () => {
      const folder = await ctx.services.documents.createFolder(admin, { name: 'Board Room' });
      const file = await ctx.services.documents.uploadFile(admin, {
        folderId: folder.id,
        filename: 'gone.txt',
        data: Buffer.from('hello'),
      });
      await rm(path.join(mediaRoot, file.storagePath));

      const res = await app.inject({
        method: 'GET',
        url: `/api/documents/files/${file.id}/download`,
        headers: bearer(admin),
      });

      expect(res.statusCode).toBe(404);
      expect(res.headers['content-disposition']).toBeUndefined();
      expect(res.json()).toEqual({ error: 'Not Found', message: 'File not found on server.' });
    });

    it('should require the filename header', async () => {
      const folder = await ctx.services.documents.createFolder(admin, { name: 'Board Room' });

      const res = await app.inject({
        method: 'POST',
        url: `/api/documents/folders/${folder.id}/files`,
        headers: { ...bearer(admin), 'content-type': 'application/octet-stream' },
        payload: Buffer.from('hello'),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().fieldErrors).toEqual({ file: ['Filename header required'] });
    });

    it('should keep the document dashboard to managers', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/documents/dashboard',
        headers: bearer(member),
      });

      expect(res.statusCode).toBe(403);
    });

    it('should escape quotes in the download filename', () => {
      expect(contentDisposition('say "hi".txt')).toBe('attachment; filename="say \\"hi\\".txt"');
    });

    it('should percent-encode characters that are not allowed in filename*', () => {
      expect(contentDisposition("café (v2)'s.txt")).toBe(
        "attachment; filename=\"caf_ (v2)'s.txt\"; filename*=UTF-8''caf%C3%A9%20%28v2%29%27s.txt",
      );
    });
  });
});

/**
 * Upload Routes
 * 
 * The form page and its multipart handler. The submitted file is written to a
 * private temp directory, pushed to storage and made public. The temp
 * directory is removed before any response is sent.
 */

import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { createWriteStream } from 'node:fs';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { z } from 'zod';
import { DEFAULT_TASK_ID, formObjectKey, taskIdSchema } from '@flightlog/core';
import type { LogUploader } from '@flightlog/upload';
import { createTempDir, removeDir, secureFilename } from '@flightlog/utils';
import { renderView } from '../views/render.js';

export interface UploadRoutesOptions {
  storage: LogUploader | null;
}

const FILE_FIELD = 'logfile';
const TASK_FIELD = 'task_id';

// A repeated parameter arrives as an array; the first one is shown
const flashValue = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (Array.isArray(value) ? value[0] : value));

const flashQuerySchema = z.object({
  error: flashValue,
  message: flashValue,
});

interface ReceivedFile {
  originalName: string;
  safeName: string;
  path: string;
}

type UploadResponse =
  | { kind: 'redirect'; error: string }
  | { kind: 'page'; html: string };

function redirectWithFlash(reply: FastifyReply, kind: 'error' | 'message', text: string): FastifyReply {
  return reply.redirect(`/?${new URLSearchParams({ [kind]: text }).toString()}`);
}

async function receiveAndStore(
  request: FastifyRequest,
  workDir: string,
  storage: LogUploader | null
): Promise<UploadResponse> {
  let received: ReceivedFile | null = null;
  let rawTaskId: string | undefined;
  let unusableName = false;

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      if (part.fieldname !== FILE_FIELD || received !== null || part.filename === '') {
        part.file.resume();
        continue;
      }

      const safeName = secureFilename(part.filename);
      if (safeName === '') {
        unusableName = true;
        part.file.resume();
        continue;
      }

      const target = join(workDir, safeName);
      await pipeline(part.file, createWriteStream(target));
      if (part.file.truncated) {
        throw new request.server.multipartErrors.RequestFileTooLargeError();
      }
      received = { originalName: part.filename, safeName, path: target };
    } else if (part.fieldname === TASK_FIELD && typeof part.value === 'string') {
      rawTaskId = part.value;
    }
  }

  if (received === null) {
    return { kind: 'redirect', error: unusableName ? 'Invalid file name' : 'No file selected' };
  }

  const task = taskIdSchema.safeParse(rawTaskId?.trim() ? rawTaskId : DEFAULT_TASK_ID);
  if (!task.success) {
    const reason = task.error.issues.map((issue) => issue.message).join(', ');
    return { kind: 'redirect', error: `Invalid task id: ${reason}` };
  }

  if (!storage) {
    request.log.error('Upload attempted before storage was initialized');
    return { kind: 'redirect', error: 'Upload failed. Storage is not initialized.' };
  }

  const key = formObjectKey(task.data, received.safeName);
  try {
    const outcome = await storage.upload(received.path, key, { makePublic: true });
    request.log.info({ key, url: outcome.url }, `File uploaded to ${key}`);
    return {
      kind: 'page',
      html: renderView('success', {
        filename: received.originalName,
        taskId: task.data,
        key,
        url: outcome.url,
      }),
    };
  } catch (error) {
    request.log.error({ err: error, key }, 'Upload failed');
    return { kind: 'redirect', error: 'Upload failed. Please check logs for details.' };
  }
}

export const uploadRoutes: FastifyPluginAsync<UploadRoutesOptions> = async (fastify, { storage }) => {
  fastify.get('/', async (request, reply) => {
    const flash = flashQuerySchema.safeParse(request.query);
    return reply
      .type('text/html; charset=utf-8')
      .send(renderView('index', flash.success ? flash.data : {}));
  });

  fastify.post('/upload', async (request, reply) => {
    if (!request.isMultipart()) {
      return redirectWithFlash(reply, 'error', 'No file selected');
    }

    const workDir = await createTempDir('flightlog-upload');
    let response: UploadResponse;
    try {
      response = await receiveAndStore(request, workDir, storage);
    } finally {
      await removeDir(workDir);
    }

    if (response.kind === 'redirect') {
      return redirectWithFlash(reply, 'error', response.error);
    }
    return reply.type('text/html; charset=utf-8').send(response.html);
  });
};

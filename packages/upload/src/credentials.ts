/**
 * Storage credentials
 *
 * Read from a JSON file so secrets stay out of the environment:
 *
 *   { "endPoint": "s3.example.com", "accessKey": "...", "secretKey": "..." }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '@flightlog/core';
import { errorMessage, isErrnoException } from '@flightlog/utils';

export const credentialsSchema = z.object({
  endPoint: z.string().min(1),
  port: z.number().int().positive().max(65535).optional(),
  useSSL: z.boolean().default(true),
  accessKey: z.string().min(1),
  secretKey: z.string().min(1),
  region: z.string().min(1).optional(),
});

export type StorageCredentials = z.infer<typeof credentialsSchema>;

export async function loadCredentials(credentialsPath: string): Promise<StorageCredentials> {
  let raw: string;
  try {
    raw = await readFile(credentialsPath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Credentials file not found at: ${credentialsPath}`, {
        path: credentialsPath,
      });
    }
    throw new ConfigurationError(
      `Unable to read credentials file ${credentialsPath}: ${errorMessage(error)}`,
      { path: credentialsPath }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Credentials file is not valid JSON: ${credentialsPath}`, {
      path: credentialsPath,
    });
  }

  const parsed = credentialsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid credentials file ${credentialsPath}: ${issues.join('; ')}`, {
      path: credentialsPath,
      issues,
    });
  }

  return parsed.data;
}

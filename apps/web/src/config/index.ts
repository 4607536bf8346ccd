/**
 * Web Configuration
 * 
 * All configuration loaded from environment variables.
 * Storage settings are required; everything else has a default.
 */

import { z } from 'zod';
import { ConfigurationError } from '@flightlog/core';
import { resolveFromRoot } from '@flightlog/utils/env';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  WEB_HOST: z.string().default('0.0.0.0'),
  WEB_PORT: z.string().transform(Number).pipe(z.number().int().min(1).max(65535)).default('5000'),
  MAX_UPLOAD_MB: z.string().transform(Number).pipe(z.number().positive()).default('100'),

  // Storage
  CREDENTIALS_PATH: z
    .string({ required_error: 'CREDENTIALS_PATH environment variable not set' })
    .trim()
    .min(1, 'CREDENTIALS_PATH environment variable not set'),
  STORAGE_BUCKET: z
    .string({ required_error: 'STORAGE_BUCKET environment variable not set' })
    .trim()
    .min(1, 'STORAGE_BUCKET environment variable not set'),
  STORAGE_PUBLIC_BASE_URL: z.string().url().optional(),
  STORAGE_CREATE_BUCKET: z.string().transform(v => v === 'true').default('false'),
});

export interface WebConfig {
  nodeEnv: 'development' | 'production' | 'test';
  host: string;
  port: number;
  maxUploadBytes: number;
  storage: {
    credentialsPath: string;
    bucket: string;
    publicBaseUrl?: string;
    createBucket: boolean;
  };
}

export function parseWebConfig(env: NodeJS.ProcessEnv): WebConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((issue) =>
      issue.message.includes('environment variable')
        ? issue.message
        : `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parseResult.data;
  return {
    nodeEnv: values.NODE_ENV,
    host: values.WEB_HOST,
    port: values.WEB_PORT,
    maxUploadBytes: Math.floor(values.MAX_UPLOAD_MB * 1024 * 1024),
    storage: {
      credentialsPath: resolveFromRoot(values.CREDENTIALS_PATH),
      bucket: values.STORAGE_BUCKET,
      publicBaseUrl: values.STORAGE_PUBLIC_BASE_URL,
      createBucket: values.STORAGE_CREATE_BUCKET,
    },
  };
}

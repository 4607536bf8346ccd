/**
 * Bucket policy helpers
 *
 * S3-compatible stores have no per-object ACL in the MinIO client, so an
 * object is made public by adding an anonymous `s3:GetObject` statement for
 * its exact ARN to the bucket policy. Existing statements are preserved.
 */

import { z } from 'zod';
import { isObject } from '@flightlog/utils';

const POLICY_VERSION = '2012-10-17';

const stringOrList = z.union([z.string(), z.array(z.string())]);

const statementSchema = z
  .object({
    Effect: z.string(),
    Principal: z.unknown().optional(),
    Action: stringOrList.optional(),
    Resource: stringOrList.optional(),
  })
  .passthrough();

const policySchema = z
  .object({
    Version: z.string().default(POLICY_VERSION),
    Statement: z.array(statementSchema).default([]),
  })
  .passthrough();

export type PolicyStatement = z.infer<typeof statementSchema>;
export type BucketPolicy = z.infer<typeof policySchema>;

export function objectArn(bucket: string, key: string): string {
  return `arn:aws:s3:::${bucket}/${key}`;
}

export function parsePolicy(raw: string | null): BucketPolicy {
  if (raw === null || raw.trim() === '') {
    return { Version: POLICY_VERSION, Statement: [] };
  }
  return policySchema.parse(JSON.parse(raw));
}

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function isAnonymous(principal: unknown): boolean {
  if (principal === '*') return true;
  if (!isObject(principal)) return false;
  const aws = principal['AWS'];
  return aws === '*' || (Array.isArray(aws) && aws.includes('*'));
}

/**
 * True when some statement already lets anyone read this object,
 * either by its own ARN or through a bucket-wide `/*` grant.
 */
export function grantsPublicRead(policy: BucketPolicy, bucket: string, key: string): boolean {
  const wanted = new Set([objectArn(bucket, key), objectArn(bucket, '*')]);
  return policy.Statement.some((statement) =>
    statement.Effect === 'Allow' &&
    isAnonymous(statement.Principal) &&
    asList(statement.Action).some((action) => action === 's3:GetObject' || action === 's3:*') &&
    asList(statement.Resource).some((resource) => wanted.has(resource))
  );
}

export function publicReadStatement(bucket: string, key: string): PolicyStatement {
  return {
    Effect: 'Allow',
    Principal: { AWS: ['*'] },
    Action: ['s3:GetObject'],
    Resource: [objectArn(bucket, key)],
  };
}

/**
 * Policy document with public read on `key` added. `changed` is false when
 * the existing policy already granted it.
 */
export function withPublicRead(
  raw: string | null,
  bucket: string,
  key: string
): { policy: BucketPolicy; changed: boolean } {
  const policy = parsePolicy(raw);
  if (grantsPublicRead(policy, bucket, key)) {
    return { policy, changed: false };
  }
  return {
    policy: { ...policy, Statement: [...policy.Statement, publicReadStatement(bucket, key)] },
    changed: true,
  };
}

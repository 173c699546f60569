import { z } from 'zod';

/**
 * Lenient Zod schemas for the two upstream payload shapes we read.
 *
 * Only fields the normalizer consumes are declared. Every one of them is
 * optional and `null` counts as absent; unknown keys pass through. A parse
 * failure here means the payload is structurally wrong (e.g. `commits` is
 * not an array), not merely incomplete.
 *
 * Timestamp fields take any JSON value. An unreadable timestamp must not
 * reject the payload; the normalizer falls back to the current time instead.
 */

const looseString = z.string().nullish();
const timestampValue = z.unknown();

const commitAuthorSchema = z.object({ name: looseString }).passthrough();

const commitSchema = z.object({
  id: looseString,
  timestamp: timestampValue,
  author: commitAuthorSchema.nullish(),
}).passthrough();

export const pushPayloadSchema = z.object({
  ref: looseString,
  pusher: z.object({ name: looseString }).passthrough().nullish(),
  commits: z.array(commitSchema).nullish(),
  head_commit: commitSchema.nullish(),
  repository: z.object({
    // GitHub sends epoch seconds here for push events, ISO strings elsewhere
    pushed_at: timestampValue,
  }).passthrough().nullish(),
}).passthrough();

export type PushPayload = z.infer<typeof pushPayloadSchema>;

const branchRefSchema = z.object({ ref: looseString }).passthrough().nullish();

export const pullRequestPayloadSchema = z.object({
  action: looseString,
  pull_request: z.object({
    number: z.union([z.number(), z.string()]).nullish(),
    merged: z.boolean().nullish(),
    user: z.object({ login: looseString }).passthrough().nullish(),
    head: branchRefSchema,
    base: branchRefSchema,
    created_at: timestampValue,
    updated_at: timestampValue,
    merged_at: timestampValue,
  }).passthrough().nullish(),
}).passthrough();

export type PullRequestPayload = z.infer<typeof pullRequestPayloadSchema>;

/** Flattens Zod issues into a single log-friendly line. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

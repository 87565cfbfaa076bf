/**
 * Image references and release planning.
 *
 * A release always publishes the floating `latest` tag; a version tag is
 * added only when the operator supplies a version other than `latest`.
 */

import { z } from 'zod';
import { nanoid } from 'nanoid';
import { ErrorCodes, UsageError } from '../lib/errors';
import { Failure, Success, type Result } from './types';

export const LATEST_TAG = 'latest';

const pathComponent = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/;

export const usernameSchema = z
  .string()
  .regex(pathComponent, 'must be a lowercase registry namespace (a-z, 0-9, ".", "_", "-")');

export const versionSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/,
    'must be a valid image tag (letters, digits, "_", ".", "-"; at most 128 characters)',
  );

export const imageNameSchema = z
  .string()
  .refine(
    (name) => name.split('/').every((part) => pathComponent.test(part)),
    'must be a lowercase image name',
  );

export const registrySchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]+(?::[0-9]+)?$/, 'must be a registry host, optionally with a port');

/** Local build output, e.g. `piper-tts:latest` */
export interface LocalImageRef {
  name: string;
  tag: string;
}

/** Registry-qualified coordinate, e.g. `alice/piper-tts:2.1` */
export interface RemoteImageRef {
  registry?: string;
  namespace: string;
  name: string;
  tag: string;
}

export interface ReleaseInput {
  username?: string;
  version?: string;
  imageName: string;
  registry?: string;
  runId?: string;
}

export interface ReleasePlan {
  runId: string;
  localImage: LocalImageRef;
  /** `[registry/]namespace/name`, without a tag */
  repository: string;
  /** Tag targets in push order; `latest` first */
  targets: RemoteImageRef[];
  version: string;
  registry?: string;
}

export function formatLocalRef(ref: LocalImageRef): string {
  return `${ref.name}:${ref.tag}`;
}

/** Repository part of a remote reference, without the tag */
export function remoteRepository(ref: Omit<RemoteImageRef, 'tag'>): string {
  const path = `${ref.namespace}/${ref.name}`;
  return ref.registry ? `${ref.registry}/${path}` : path;
}

export function formatRemoteRef(ref: RemoteImageRef): string {
  return `${remoteRepository(ref)}:${ref.tag}`;
}

/**
 * Tags to publish for a version argument.
 * An omitted, empty or literal `latest` version yields `latest` alone.
 */
export function resolveReleaseTags(version?: string): string[] {
  if (version === undefined || version === '' || version === LATEST_TAG) {
    return [LATEST_TAG];
  }
  return [LATEST_TAG, version];
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'is invalid';
}

/**
 * Validate the operator's arguments and work out every reference the
 * release will touch. Runs before any side effect.
 */
export function planRelease(input: ReleaseInput): Result<ReleasePlan, UsageError> {
  const username = input.username?.trim() ?? '';
  if (username === '') {
    return Failure(new UsageError('registry username required', ErrorCodes.MISSING_ARGUMENT));
  }

  const user = usernameSchema.safeParse(username);
  if (!user.success) {
    return Failure(new UsageError(`Invalid username "${username}": ${firstIssue(user.error)}`));
  }

  const version = input.version === undefined || input.version === '' ? LATEST_TAG : input.version;
  const parsedVersion = versionSchema.safeParse(version);
  if (!parsedVersion.success) {
    return Failure(
      new UsageError(`Invalid version "${version}": ${firstIssue(parsedVersion.error)}`),
    );
  }

  const name = imageNameSchema.safeParse(input.imageName);
  if (!name.success) {
    return Failure(
      new UsageError(`Invalid image name "${input.imageName}": ${firstIssue(name.error)}`),
    );
  }

  if (input.registry !== undefined) {
    const registry = registrySchema.safeParse(input.registry);
    if (!registry.success) {
      return Failure(
        new UsageError(`Invalid registry "${input.registry}": ${firstIssue(registry.error)}`),
      );
    }
  }

  const targets = resolveReleaseTags(version).map(
    (tag): RemoteImageRef => ({
      ...(input.registry ? { registry: input.registry } : {}),
      namespace: username,
      name: input.imageName,
      tag,
    }),
  );

  return Success({
    runId: input.runId ?? nanoid(10),
    localImage: { name: input.imageName, tag: LATEST_TAG },
    repository: remoteRepository({
      ...(input.registry ? { registry: input.registry } : {}),
      namespace: username,
      name: input.imageName,
    }),
    targets,
    version,
    ...(input.registry ? { registry: input.registry } : {}),
  });
}

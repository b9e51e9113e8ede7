/**
 * File operations under a single root directory, for screenshots and other
 * walk artifacts. Paths are not confined to the root: `..` and symlinks still
 * lead outside it.
 */

import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { ArtifactError, Result } from '../types.ts';
import { ok, err, fromPromise } from '../result.ts';

export interface ArtifactStore {
  readonly root: string;
  /** Absolute path of `relativeDir` (or the root), created if missing. */
  ensureDir(relativeDir?: string): Promise<Result<string, ArtifactError>>;
  /** Written beside the target and renamed into place. */
  write(relativePath: string, data: string | Uint8Array): Promise<Result<string, ArtifactError>>;
  read(relativePath: string): Promise<Result<Buffer, ArtifactError>>;
  exists(relativePath: string): Promise<boolean>;
  remove(relativePath: string): Promise<Result<void, ArtifactError>>;
  /** Empties a directory but keeps it. Tries every entry; reports the first failure. */
  removeFilesInDirectory(relativeDir?: string): Promise<Result<void, ArtifactError>>;
  /** Moves within the root, creating the destination directory. */
  move(fromRelativePath: string, toRelativePath: string): Promise<Result<string, ArtifactError>>;
}

const ioError = (path: string) => (e: unknown): ArtifactError => ({
  code: 'IO_FAILED',
  message: e instanceof Error ? e.message : `File operation failed: ${path}`,
  path,
});

export const createArtifactStore = (root: string): ArtifactStore => {
  let stagingCount = 0;
  const resolve = (relativePath = ''): string => join(root, relativePath);

  const createDir = async (path: string): Promise<Result<string, ArtifactError>> => {
    const made = await fromPromise(mkdir(path, { recursive: true }), ioError(path));
    return made.ok ? ok(path) : made;
  };

  const exists = async (relativePath: string): Promise<boolean> => {
    try {
      await access(resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  };

  const remove = async (relativePath: string): Promise<Result<void, ArtifactError>> => {
    const path = resolve(relativePath);
    return fromPromise(rm(path, { recursive: true }), ioError(path));
  };

  return {
    root,

    ensureDir(relativeDir) {
      return createDir(resolve(relativeDir));
    },

    async write(relativePath, data) {
      const path = resolve(relativePath);
      const dir = await createDir(dirname(path));
      if (!dir.ok) return dir;

      // Readers see the old file or the new one, never half of it
      const staging = `${path}.${process.pid}-${stagingCount++}.tmp`;
      const written = await fromPromise(writeFile(staging, data), ioError(path));
      const placed = written.ok ? await fromPromise(rename(staging, path), ioError(path)) : written;
      if (placed.ok) return ok(path);

      await rm(staging, { force: true });
      return placed;
    },

    async read(relativePath) {
      const path = resolve(relativePath);
      if (!(await exists(relativePath))) {
        return err({ code: 'NOT_FOUND', message: `No artifact at ${path}`, path });
      }
      return fromPromise(readFile(path), ioError(path));
    },

    exists,

    remove,

    async removeFilesInDirectory(relativeDir = '') {
      const path = resolve(relativeDir);
      const listed = await fromPromise(readdir(path), ioError(path));
      if (!listed.ok) return listed;

      let firstFailure: Result<void, ArtifactError> = ok(undefined);
      for (const entry of listed.value) {
        const removed = await remove(join(relativeDir, entry));
        if (!removed.ok && firstFailure.ok) firstFailure = removed;
      }
      return firstFailure;
    },

    async move(fromRelativePath, toRelativePath) {
      const from = resolve(fromRelativePath);
      const to = resolve(toRelativePath);
      const dir = await createDir(dirname(to));
      if (!dir.ok) return dir;

      const moved = await fromPromise(rename(from, to), ioError(from));
      return moved.ok ? ok(to) : moved;
    },
  };
};

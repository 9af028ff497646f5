import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import { AccessDeniedError, isMissingPathError } from '../../errors.js';

function isInside(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * The directory the file and terminal tools are confined to. Every path a tool receives goes
 * through resolve() before any filesystem access.
 */
export class Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Resolves a tool-supplied path (relative to the root, or absolute) and rejects anything that
   * lands outside the root, either lexically or through a symlink in an existing ancestor.
   */
  async resolve(target: string): Promise<string> {
    const candidate = path.resolve(this.root, target);
    if (!isInside(this.root, candidate)) {
      throw new AccessDeniedError(`Path ${target} is outside the working root ${this.root}`);
    }

    const realRoot = await fs.realpath(this.root);
    let existing = candidate;
    let realExisting: string | null = null;
    while (realExisting === null) {
      try {
        realExisting = await fs.realpath(existing);
      } catch (error) {
        if (!isMissingPathError(error)) {
          throw error;
        }
        const parent = path.dirname(existing);
        if (parent === existing) {
          throw new AccessDeniedError(`Path ${target} cannot be resolved`);
        }
        existing = parent;
      }
    }
    const realCandidate = path.join(realExisting, path.relative(existing, candidate));
    if (!isInside(realRoot, realCandidate)) {
      throw new AccessDeniedError(`Path ${target} resolves outside the working root ${this.root}`);
    }
    return candidate;
  }

  relative(absolutePath: string): string {
    return path.relative(this.root, absolutePath) || '.';
  }

  /**
   * Writes through a temporary file in the same directory and renames it into place, so a
   * concurrent reader sees either the old content or the new content. An existing file keeps its
   * permission bits, and a symlink inside the root is written through to its target.
   */
  async writeAtomic(absolutePath: string, content: string): Promise<void> {
    const existing = await fs.stat(absolutePath).catch((error: unknown) => {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    });
    const targetPath = existing ? await fs.realpath(absolutePath) : absolutePath;
    const directory = path.dirname(targetPath);
    await fs.mkdir(directory, { recursive: true });
    const tempPath = path.join(directory, `.${path.basename(targetPath)}.${uuidv4()}.tmp`);
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      if (existing) {
        await fs.chmod(tempPath, existing.mode & 0o7777);
      }
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}

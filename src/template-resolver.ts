import fs from 'node:fs';
import path from 'node:path';

import { TemplateNotFoundError } from './errors.js';

/**
 * Maps logical template names (`user/profile`) to files below a fixed root.
 */
export class TemplateResolver {
  readonly root: string;

  /**
   * @param root - Templates root directory.
   * @param extension - Appended to every name, including the dot (`.view.js`).
   */
  constructor (root: string, readonly extension: string) {
    this.root = path.resolve(root);
  }

  /**
   * Full path a template name maps to. Does not touch the file system.
   */
  pathFor (name: string): string {
    return path.join(this.root, `${name}${this.extension}`);
  }

  /**
   * Whether the named template exists as a file inside the root.
   */
  exists (name: string): boolean {
    const file = this.pathFor(name);
    if (!this.isInsideRoot(file)) return false;
    try {
      return fs.statSync(file, { throwIfNoEntry: false })?.isFile() ?? false;
    } catch {
      // ENOTDIR, a NUL byte in the name and the like: no template there
      return false;
    }
  }

  /**
   * Resolve a template name to an existing file.
   *
   * @throws TemplateNotFoundError carrying the attempted path.
   */
  resolve (name: string): string {
    if (!this.exists(name)) {
      throw new TemplateNotFoundError(name, this.pathFor(name));
    }
    return this.pathFor(name);
  }

  private isInsideRoot (file: string): boolean {
    const rel = path.relative(this.root, file);
    if (rel.length === 0 || path.isAbsolute(rel)) return false;
    return rel !== '..' && !rel.startsWith(`..${path.sep}`);
  }
}

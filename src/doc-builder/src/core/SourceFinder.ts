/**
 * SourceFinder - Locates Python files for a batch run.
 *
 * Directories are expanded with glob using the configured include and
 * exclude patterns; explicit file paths are kept when they look like
 * Python (by extension or shebang).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';

export const PYTHON_EXTENSIONS = ['.py', '.pyw', '.pyi'];

const PYTHON_SHEBANG = /^#!.*\bpython[0-9.]*\b/;

export interface FinderOptions {
  include: readonly string[];
  exclude: readonly string[];
  /** Descend into subdirectories (default: true) */
  recursive: boolean;
  /** Files larger than this are left out (bytes) */
  maxFileSize: number;
}

const DEFAULT_OPTIONS: FinderOptions = {
  include: ['**/*.py'],
  exclude: ['**/node_modules/**', '**/.venv/**', '**/venv/**', '**/__pycache__/**', '**/.git/**'],
  recursive: true,
  maxFileSize: 1024 * 1024, // 1MB
};

export function isPythonSource(filePath: string, content?: string): boolean {
  if (PYTHON_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) {
    return true;
  }
  const firstLine = content?.split(/\r\n|\r|\n/, 1)[0] ?? '';
  return PYTHON_SHEBANG.test(firstLine);
}

export class SourceFinder {
  private options: FinderOptions;

  constructor(options: Partial<FinderOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Sorted, deduplicated absolute paths under `root` (a directory or file).
   */
  async find(root: string): Promise<string[]> {
    const stat = await fs.stat(root);
    if (stat.isFile()) {
      return [path.resolve(root)];
    }

    const patterns = this.options.recursive
      ? this.options.include
      : this.options.include.map((p) => p.replace(/^\*\*\//, ''));

    // Run glob for all include patterns
    const allMatches = await Promise.all(
      patterns.map((pattern) =>
        glob(pattern, {
          cwd: root,
          absolute: true,
          nodir: true,
          ignore: [...this.options.exclude],
        })
      )
    );

    // Flatten and deduplicate
    const files = [...new Set(allMatches.flat())].sort();

    const sized: string[] = [];
    for (const file of files) {
      const info = await fs.stat(file);
      if (info.size <= this.options.maxFileSize) {
        sized.push(file);
      } else {
        console.error(`Skipping ${file}: larger than ${this.options.maxFileSize} bytes`);
      }
    }
    return sized;
  }
}

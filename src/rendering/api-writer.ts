/**
 * Writes generated API documents under the output directory
 * and remembers every file it wrote, relative to that directory.
 */

import { promises as fs } from 'fs';
import { dirname, join, relative, sep } from 'path';

export class ApiWriter {
  private rootDir: string;
  private indent: number;
  private written: string[] = [];

  constructor(rootDir: string, indent: number = 2) {
    this.rootDir = rootDir;
    this.indent = indent;
  }

  getRootDir(): string {
    return this.rootDir;
  }

  /**
   * Files written so far, as forward-slash paths relative to the root
   */
  getWrittenFiles(): string[] {
    return [...this.written];
  }

  async writeJson(relativePath: string, data: unknown): Promise<string> {
    return this.writeText(relativePath, `${JSON.stringify(data, null, this.indent)}\n`);
  }

  async writeText(relativePath: string, content: string): Promise<string> {
    const filePath = join(this.rootDir, relativePath);
    const relativeToRoot = relative(this.rootDir, filePath);
    if (relativeToRoot.startsWith('..')) {
      throw new Error(`Refusing to write outside the API directory: ${relativePath}`);
    }

    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    this.written.push(relativeToRoot.split(sep).join('/'));
    return filePath;
  }
}

import { readFile, stat } from 'node:fs/promises';
import fg from 'fast-glob';

/** Read-only view of the project tree; context assembly and config loading go through it. */
export interface FileSystem {
  readText(path: string): Promise<string>;
  readJSON<T>(path: string): Promise<T>;
  exists(path: string): Promise<boolean>;
  glob(pattern: string, cwd?: string, ignore?: string[]): Promise<string[]>;
}

export class NodeFileSystem implements FileSystem {
  async readText(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  }

  // Paths come back relative to cwd
  async glob(pattern: string, cwd?: string, ignore: string[] = []): Promise<string[]> {
    const results = await fg(pattern, { cwd: cwd ?? '.', ignore, dot: false, onlyFiles: true });
    return results.sort();
  }
}

export class MockFileSystem implements FileSystem {
  private files = new Map<string, string>();

  async readText(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) throw new Error(`ENOENT: ${path}`);
    return content;
  }

  async readJSON<T>(path: string): Promise<T> {
    return JSON.parse(await this.readText(path)) as T;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async glob(pattern: string, cwd?: string, ignore: string[] = []): Promise<string[]> {
    const toRegex = (glob: string) =>
      new RegExp(`^${glob.replace(/\?/g, '.').replace(/\*\*\//g, '(.*/)?').replace(/\*\*/g, '.*').replace(/(?<!\.)\*/g, '[^/]*')}$`);
    const prefix = cwd ? `${cwd.replace(/\/$/, '')}/` : '';
    const include = toRegex(pattern);
    const excluded = ignore.map(toRegex);
    return [...this.files.keys()]
      .filter((k) => k.startsWith(prefix))
      .map((k) => k.slice(prefix.length))
      .filter((k) => include.test(k) && !excluded.some((re) => re.test(k)))
      .sort();
  }

  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }
}

/**
 * In-memory stand-ins for the config layer's file system and environment.
 */

import type { IEnvReader } from '../../src/config/env.js';
import type { IFileSystem } from '../../src/config/types.js';

/**
 * File system backed by a map of absolute paths.
 * Home is /home/user and the working directory is /project.
 */
export class MockFileSystem implements IFileSystem {
  private files: Map<string, string> = new Map();

  readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      return Promise.reject(new Error(`ENOENT: no such file or directory: ${path}`));
    }
    return Promise.resolve(content);
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path));
  }

  resolvePath(path: string): string {
    if (path.startsWith('~')) {
      return '/home/user' + path.slice(1);
    }
    return path.startsWith('/') ? path : `/project/${path}`;
  }

  joinPath(...segments: string[]): string {
    return segments.join('/');
  }

  getHomeDir(): string {
    return '/home/user';
  }

  getCwd(): string {
    return '/project';
  }

  // Test helpers
  setFile(path: string, content: string): void {
    this.files.set(path, content);
  }

  setJson(path: string, value: unknown): void {
    this.files.set(path, JSON.stringify(value));
  }
}

/**
 * Environment reader backed by a map.
 */
export class MockEnvReader implements IEnvReader {
  private env: Map<string, string> = new Map();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.env.set(name, value);
    }
  }

  get(name: string): string | undefined {
    return this.env.get(name);
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }

  set(name: string, value: string): void {
    this.env.set(name, value);
  }
}

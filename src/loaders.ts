/**
 * Template source loaders.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';

export interface TemplateSource {
  /** Where the source was found (file path or loader-specific name). */
  name: string;
  source: string;
}

/**
 * Finds template source by name. Returns null when it does not have the
 * template so the next loader can be tried.
 */
export interface TemplateLoader {
  readonly name: string;
  getContents (templateName: string): TemplateSource | null;
  /** Human readable location `templateName` would be looked up at. */
  describe (templateName: string): string;
}

/**
 * Serves templates from an in-memory map.
 */
export class LocmemLoader implements TemplateLoader {
  readonly name = 'locmem';
  private readonly templates: Map<string, string>;

  constructor (templates: Record<string, string> | Map<string, string> = {}) {
    this.templates = (templates instanceof Map) ? new Map(templates) : new Map(Object.entries(templates));
  }

  getContents (templateName: string): TemplateSource | null {
    const source = this.templates.get(templateName);
    return (source === undefined) ? null : { name: templateName, source };
  }

  describe (templateName: string): string {
    return `${this.name}: ${templateName}`;
  }
}

const isNodeError = (err: unknown): err is NodeJS.ErrnoException => {
  return err instanceof Error && 'code' in err;
};

/**
 * Reads templates from one or more directories, first match wins. Names
 * that resolve outside a directory are never read from it.
 */
export class FileSystemLoader implements TemplateLoader {
  readonly name = 'filesystem';
  readonly dirs: readonly string[];
  private readonly encoding: BufferEncoding;

  constructor (dirs: string | readonly string[], encoding: BufferEncoding = 'utf8') {
    this.dirs = (typeof dirs === 'string' ? [ dirs ] : dirs).map((dir) => path.resolve(dir));
    this.encoding = encoding;
  }

  /**
   * Candidate paths for `templateName`, one per directory that contains it.
   */
  templatePaths (templateName: string): string[] {
    const paths: string[] = [];
    for (const dir of this.dirs) {
      const candidate = path.resolve(dir, templateName);
      if (candidate.startsWith(dir + path.sep)) paths.push(candidate);
    }
    return paths;
  }

  getContents (templateName: string): TemplateSource | null {
    for (const file of this.templatePaths(templateName)) {
      try {
        return { name: file, source: readFileSync(file, this.encoding) };
      } catch (err) {
        if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'EISDIR' || err.code === 'ENOTDIR')) continue;
        throw err;
      }
    }
    return null;
  }

  describe (templateName: string): string {
    const paths = this.templatePaths(templateName);
    return `${this.name}: ${paths.length > 0 ? paths.join(', ') : `${templateName} (outside template dirs)`}`;
  }
}

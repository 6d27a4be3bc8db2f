import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError, StorageError, ValidationError } from '../errors.js';

export interface ObjectStorage {
  read(objectPath: string): Promise<string>;
  write(objectPath: string, body: string): Promise<void>;
}

/** `tenants/{tenantId}/...`; every object a job touches lives under its tenant. */
export function tenantPath(tenantId: string, ...segments: string[]): string {
  const parts = [tenantId, ...segments.flatMap((segment) => segment.split('/'))].filter((part) => part !== '');
  if (!tenantId || parts.some((part) => part === '..' || part === '.')) {
    throw new ValidationError('Invalid storage path', { tenantId, segments });
  }
  return ['tenants', ...parts].join('/');
}

export function jobResultPath(tenantId: string, jobId: string): string {
  return tenantPath(tenantId, 'jobs', jobId, 'result.json');
}

export class InMemoryObjectStorage implements ObjectStorage {
  private objects = new Map<string, string>();

  async read(objectPath: string): Promise<string> {
    const body = this.objects.get(objectPath);
    if (body === undefined) throw new NotFoundError('Object', objectPath);
    return body;
  }

  async write(objectPath: string, body: string): Promise<void> {
    this.objects.set(objectPath, body);
  }
}

export class LocalObjectStorage implements ObjectStorage {
  constructor(private rootDir: string) {}

  private resolve(objectPath: string): string {
    return path.join(this.rootDir, ...objectPath.split('/'));
  }

  async read(objectPath: string): Promise<string> {
    try {
      return await readFile(this.resolve(objectPath), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new NotFoundError('Object', objectPath);
      }
      throw new StorageError(`Failed to read ${objectPath}`, { cause: String(error) });
    }
  }

  async write(objectPath: string, body: string): Promise<void> {
    const target = this.resolve(objectPath);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, body, 'utf8');
    } catch (error) {
      throw new StorageError(`Failed to write ${objectPath}`, { cause: String(error) });
    }
  }
}

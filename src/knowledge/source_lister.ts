/**
 * @fileoverview Directory-backed knowledge sources
 *
 * Lists `.md`, `.txt` and `.json` files under the knowledge directory. Plain
 * files are one document each, identified by their POSIX path relative to the
 * directory and fingerprinted by mtime and size. A JSON report with a
 * `technology_clusters` array becomes one document per technology
 * (`<file>#<cluster_id>/<tech_id>`), each fingerprinted by content hash so
 * only the technologies that changed are re-indexed.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import { glob } from 'glob';
import { ParseError, getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { SourceDocument, SourceLister } from './knowledge_index.js';

export type SourceKind = 'markdown' | 'text' | 'json_document' | 'technology';

export interface DirectorySourceDocument extends SourceDocument {
  readonly kind: SourceKind;
  readonly filePath: string;
}

export interface DirectorySourceListerOptions {
  directory: string;
  include: readonly string[];
  exclude: readonly string[];
}

interface ClusterCacheEntry {
  fileFingerprint: string;
  documents: DirectorySourceDocument[];
}

interface TechnologyEntry {
  tech_id: string | number;
  [key: string]: unknown;
}

interface TechnologyCluster {
  cluster_id: string | number;
  cluster_name?: string;
  technologies?: TechnologyEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTechnologyCluster(value: unknown): value is TechnologyCluster {
  if (!isRecord(value)) return false;
  const id = value.cluster_id;
  if (typeof id !== 'string' && typeof id !== 'number') return false;
  return value.technologies === undefined || Array.isArray(value.technologies);
}

function isTechnologyEntry(value: unknown): value is TechnologyEntry {
  return isRecord(value) && (typeof value.tech_id === 'string' || typeof value.tech_id === 'number');
}

function kindForFile(filePath: string): SourceKind {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.md' || extension === '.markdown') return 'markdown';
  if (extension === '.json') return 'json_document';
  return 'text';
}

function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

export function renderTechnology(clusterName: string | undefined, technology: TechnologyEntry): string {
  const header = clusterName ? `Cluster: ${clusterName}\n` : '';
  return `${header}${JSON.stringify(technology, null, 2)}`;
}

/**
 * Turn JSON file content into indexable text: pretty-printed JSON, or one
 * entry per technology for a clustered report.
 */
export function splitJsonDocument(
  relativePath: string,
  content: string,
): { clustered: false; text: string } | { clustered: true; entries: Array<{ id: string; text: string }> } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ParseError('json', getErrorMessage(error), relativePath);
  }

  if (isRecord(parsed) && Array.isArray(parsed.technology_clusters)) {
    const entries: Array<{ id: string; text: string }> = [];
    for (const cluster of parsed.technology_clusters) {
      if (!isTechnologyCluster(cluster)) continue;
      for (const technology of cluster.technologies ?? []) {
        if (!isTechnologyEntry(technology)) continue;
        entries.push({
          id: `${relativePath}#${String(cluster.cluster_id)}/${String(technology.tech_id)}`,
          text: renderTechnology(cluster.cluster_name, technology),
        });
      }
    }
    return { clustered: true, entries };
  }

  return { clustered: false, text: JSON.stringify(parsed, null, 2) };
}

export class DirectorySourceLister implements SourceLister {
  private readonly clusterCache = new Map<string, ClusterCacheEntry>();

  constructor(private readonly options: DirectorySourceListerOptions) {}

  get directory(): string {
    return this.options.directory;
  }

  async list(): Promise<DirectorySourceDocument[]> {
    const root = this.options.directory;
    try {
      const stat = await fs.stat(root);
      if (!stat.isDirectory()) return [];
    } catch {
      logDebug('Knowledge directory missing, nothing to index', { directory: root });
      return [];
    }

    const files = await glob([...this.options.include], {
      cwd: root,
      ignore: [...this.options.exclude],
      nodir: true,
      posix: true,
    });
    files.sort();

    const documents: DirectorySourceDocument[] = [];
    const seenFiles = new Set<string>();
    for (const relativePath of files) {
      const filePath = path.join(root, relativePath);
      let fileFingerprint: string;
      try {
        const stat = await fs.stat(filePath);
        fileFingerprint = `${stat.mtimeMs}-${stat.size}`;
      } catch {
        // Deleted between glob and stat.
        continue;
      }
      seenFiles.add(relativePath);

      const kind = kindForFile(relativePath);
      if (kind === 'json_document') {
        documents.push(...(await this.listJsonFile(relativePath, filePath, fileFingerprint)));
        continue;
      }

      documents.push({
        id: relativePath,
        fingerprint: fileFingerprint,
        kind,
        filePath,
        load: () => fs.readFile(filePath, 'utf8'),
      });
    }

    for (const cached of [...this.clusterCache.keys()]) {
      if (!seenFiles.has(cached)) this.clusterCache.delete(cached);
    }
    return documents;
  }

  private async listJsonFile(
    relativePath: string,
    filePath: string,
    fileFingerprint: string,
  ): Promise<DirectorySourceDocument[]> {
    const cached = this.clusterCache.get(relativePath);
    if (cached && cached.fileFingerprint === fileFingerprint) {
      return cached.documents;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch {
      return [];
    }

    let split: ReturnType<typeof splitJsonDocument>;
    try {
      split = splitJsonDocument(relativePath, content);
    } catch (error) {
      // Report it as a single document whose load fails, so the refresh
      // cycle records the failure against this file and moves on.
      return [{
        id: relativePath,
        fingerprint: fileFingerprint,
        kind: 'json_document',
        filePath,
        load: () => Promise.reject(error),
      }];
    }

    const resolved = split;
    const documents: DirectorySourceDocument[] = resolved.clustered
      ? resolved.entries.map((entry) => ({
          id: entry.id,
          fingerprint: hashContent(entry.text),
          kind: 'technology' as const,
          filePath,
          load: () => Promise.resolve(entry.text),
        }))
      : [{
          id: relativePath,
          fingerprint: fileFingerprint,
          kind: 'json_document' as const,
          filePath,
          load: () => Promise.resolve(resolved.text),
        }];

    this.clusterCache.set(relativePath, { fileFingerprint, documents });
    return documents;
  }
}

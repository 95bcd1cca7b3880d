/**
 * @fileoverview Project analysis
 *
 * Walks a project directory to infer its technology stack and project type.
 * Languages come from file extensions, frameworks from dependency manifests,
 * and the project type from the first configured rule whose technologies
 * were detected. The result feeds `tech_stack` and `project_type` hints into
 * a TaskContext.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import type { AnalysisConfig } from '../config/schema.js';
import { ValidationError, getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { ProjectType, TaskContext } from '../types.js';
import { contextValues } from './keywords.js';

export interface ProjectProfile {
  readonly root: string;
  readonly filesAnalyzed: number;
  readonly linesEstimated: number;
  /** Languages and frameworks, sorted. */
  readonly techStack: readonly string[];
  readonly frameworks: readonly string[];
  readonly projectType: ProjectType;
  /** More files matched than `maxFiles`; counts cover the first ones only. */
  readonly truncated: boolean;
}

const MANIFEST_TOKEN_SPLIT = /[^A-Za-z0-9_.@/-]+/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Dependency names declared by a manifest, lowercased. */
export function manifestPackages(fileName: string, content: string): string[] {
  if (path.basename(fileName) === 'package.json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      logDebug('Unreadable package.json skipped', { fileName, error: getErrorMessage(error) });
      return [];
    }
    if (!isRecord(parsed)) return [];
    const names: string[] = [];
    for (const key of ['dependencies', 'devDependencies', 'peerDependencies']) {
      const section = parsed[key];
      if (isRecord(section)) names.push(...Object.keys(section));
    }
    return names.map((name) => name.toLowerCase());
  }

  return content
    .split(MANIFEST_TOKEN_SPLIT)
    .map((token) => token.toLowerCase())
    .filter((token) => token.length > 0);
}

function countLines(content: string): number {
  let lines = 0;
  for (const line of content.split('\n')) {
    if (line.trim()) lines++;
  }
  return lines;
}

export function projectTypeFor(techStack: ReadonlySet<string>, config: AnalysisConfig, fallback: ProjectType): ProjectType {
  for (const rule of config.projectTypeRules) {
    if (rule.anyOf.some((tech) => techStack.has(tech.toLowerCase()))) return rule.projectType;
  }
  return fallback;
}

export class ProjectAnalyzer {
  constructor(
    private readonly config: AnalysisConfig,
    private readonly defaultProjectType: ProjectType,
  ) {}

  async analyze(directory: string): Promise<ProjectProfile> {
    const root = path.resolve(directory);
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) throw new ValidationError('path', 'a readable directory', root);

    const files = await glob('**/*', {
      cwd: root,
      ignore: [...this.config.exclude],
      nodir: true,
      posix: true,
      dot: true,
    });
    files.sort();
    const truncated = files.length > this.config.maxFiles;
    const considered = truncated ? files.slice(0, this.config.maxFiles) : files;

    const manifests = new Set(this.config.manifests);
    const languages = new Set<string>();
    const packages = new Set<string>();
    let linesEstimated = 0;
    let filesAnalyzed = 0;

    for (const relativePath of considered) {
      const baseName = path.posix.basename(relativePath);
      const extension = path.posix.extname(relativePath).slice(1).toLowerCase();
      const language = extension ? this.config.extensions[extension] : undefined;
      const isManifest = manifests.has(baseName);
      if (language === undefined && !isManifest) continue;

      let content: string;
      try {
        content = await fs.readFile(path.join(root, relativePath), 'utf8');
      } catch (error) {
        // Removed or unreadable since the walk.
        logDebug('Project file skipped', { relativePath, error: getErrorMessage(error) });
        continue;
      }

      if (language !== undefined) {
        languages.add(language);
        linesEstimated += countLines(content);
        filesAnalyzed++;
      }
      if (isManifest) {
        for (const name of manifestPackages(baseName, content)) packages.add(name);
      }
    }

    const frameworks = Object.entries(this.config.frameworks)
      .filter(([, aliases]) => aliases.some((alias) => packages.has(alias.toLowerCase())))
      .map(([framework]) => framework)
      .sort();
    const techStack = new Set([...languages, ...frameworks]);

    const profile: ProjectProfile = {
      root,
      filesAnalyzed,
      linesEstimated,
      techStack: [...techStack].sort(),
      frameworks,
      projectType: projectTypeFor(techStack, this.config, this.defaultProjectType),
      truncated,
    };
    logDebug('Project analysed', { root, projectType: profile.projectType, techStack: profile.techStack });
    return profile;
  }
}

/**
 * Merge a profile into a task context. Explicit `tech_stack` entries come
 * first; an explicit `project_type` wins over the detected one.
 */
export function withProjectContext(context: TaskContext, profile: ProjectProfile): TaskContext {
  const explicit = contextValues(context, 'tech_stack');
  const seen = new Set(explicit.map((tech) => tech.toLowerCase()));
  const techStack = [...explicit, ...profile.techStack.filter((tech) => !seen.has(tech))];
  return {
    ...context,
    tech_stack: techStack,
    project_type: context.project_type ?? profile.projectType,
  };
}

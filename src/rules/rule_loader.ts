/**
 * @fileoverview Rule definition loading
 *
 * Reads rule definitions from a YAML file or a directory of YAML files. Each
 * file holds a `rules:` list (and an optional `version:`). Without a
 * configured path the bundled catalog in rules/default_rules.yaml is used.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { z } from 'zod';
import { ParseError, RuleCatalogError, getErrorMessage } from '../core/errors.js';
import { compareIds } from '../utils/compare.js';
import { RuleCatalog } from './rule_catalog.js';

export const BUNDLED_RULES_PATH = fileURLToPath(new URL('../../rules/default_rules.yaml', import.meta.url));

const RuleFileSchema = z.object({
  version: z.union([z.string(), z.number()]).optional(),
  rules: z.array(z.unknown()),
}).passthrough();

const RULE_FILE_PATTERN = /\.ya?ml$/i;

interface RuleFile {
  filePath: string;
  version: string | undefined;
  definitions: unknown[];
}

async function readRuleFile(filePath: string): Promise<RuleFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new RuleCatalogError(`cannot read ${filePath}: ${getErrorMessage(error)}`, [], filePath);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ParseError('yaml', getErrorMessage(error), filePath);
  }

  const file = RuleFileSchema.safeParse(parsed);
  if (!file.success) {
    throw new RuleCatalogError(`${filePath} must contain a "rules" list`, [], filePath);
  }
  return {
    filePath,
    version: file.data.version === undefined ? undefined : String(file.data.version),
    definitions: file.data.rules,
  };
}

async function listRuleFiles(rulesPath: string): Promise<string[]> {
  let stat;
  try {
    stat = await fs.stat(rulesPath);
  } catch {
    throw new RuleCatalogError(`rules path does not exist: ${rulesPath}`, [], rulesPath);
  }
  if (!stat.isDirectory()) return [rulesPath];

  const entries = await fs.readdir(rulesPath, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && RULE_FILE_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort(compareIds)
    .map((name) => path.join(rulesPath, name));
  if (files.length === 0) {
    throw new RuleCatalogError(`no rule files (*.yaml, *.yml) in ${rulesPath}`, [], rulesPath);
  }
  return files;
}

/**
 * Load and validate a catalog. Definitions from several files are merged;
 * an id defined twice anywhere is a RuleCatalogError.
 */
export async function loadRuleCatalog(rulesPath: string = BUNDLED_RULES_PATH): Promise<RuleCatalog> {
  const files = await Promise.all((await listRuleFiles(rulesPath)).map(readRuleFile));
  const definitions = files.flatMap((file) => file.definitions);
  const versions = files.map((file) => file.version).filter((version): version is string => version !== undefined);

  // A single labelled file keeps its label; merged directories get a content hash.
  const version = files.length === 1 && versions.length === 1 ? versions[0] : undefined;
  return RuleCatalog.load(definitions, { version, source: rulesPath });
}

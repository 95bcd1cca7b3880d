import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ParseError, RuleCatalogError } from '../../core/errors.js';
import { loadRuleCatalog } from '../rule_loader.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ruleweaver-rules-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

async function write(name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, 'utf8');
  return filePath;
}

describe('loadRuleCatalog', () => {
  it('should load the bundled catalog by default', async () => {
    const catalog = await loadRuleCatalog();

    expect(catalog.size).toBe(15);
    expect(catalog.version).toBe('1');
    expect(catalog.mandatory().map((rule) => rule.id)).toEqual(['00_policy']);
    expect(catalog.get('20_security_basics').applicabilityTags).toContain('jwt');
  });

  it('should keep the version label of a single file', async () => {
    const file = await write('rules.yaml', [
      'version: "2026.1"',
      'rules:',
      '  - id: a',
      '    title: A',
      '    category: api',
    ].join('\n'));

    const catalog = await loadRuleCatalog(file);

    expect(catalog.version).toBe('2026.1');
    expect(catalog.source).toBe(file);
  });

  it('should merge every YAML file of a directory', async () => {
    await write('b.yml', 'rules:\n  - { id: b, title: B, category: api }\n');
    await write('a.yaml', 'version: 3\nrules:\n  - { id: a, title: A, category: policy, mandatory: true }\n');
    await write('notes.txt', 'ignored');

    const catalog = await loadRuleCatalog(dir);

    expect(catalog.all().map((rule) => rule.id)).toEqual(['a', 'b']);
    expect(catalog.version).toMatch(/^[0-9a-f]{12}$/);
  });

  it('should reject an id defined in two files', async () => {
    await write('a.yaml', 'rules:\n  - { id: same, title: A, category: api }\n');
    await write('b.yaml', 'rules:\n  - { id: same, title: B, category: api }\n');

    await expect(loadRuleCatalog(dir)).rejects.toThrow('duplicate rule ids: same');
  });

  it('should reject a directory without rule files', async () => {
    await expect(loadRuleCatalog(dir)).rejects.toBeInstanceOf(RuleCatalogError);
  });

  it('should reject a missing path', async () => {
    await expect(loadRuleCatalog(path.join(dir, 'missing.yaml'))).rejects.toThrow(/rules path does not exist/);
  });

  it('should reject a file without a rules list', async () => {
    const file = await write('rules.yaml', 'version: 1\n');

    await expect(loadRuleCatalog(file)).rejects.toThrow(/must contain a "rules" list/);
  });

  it('should report malformed YAML as a ParseError', async () => {
    const file = await write('rules.yaml', 'rules: [unclosed\n');

    await expect(loadRuleCatalog(file)).rejects.toBeInstanceOf(ParseError);
  });
});

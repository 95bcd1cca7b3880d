import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { testConfig } from '../../__tests__/fixtures.js';
import { ValidationError } from '../../core/errors.js';
import {
  manifestPackages,
  ProjectAnalyzer,
  projectTypeFor,
  withProjectContext,
  type ProjectProfile,
} from '../project_analyzer.js';

const config = testConfig().analysis;

let root: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'ruleweaver-analyzer-'));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

async function write(relativePath: string, content: string): Promise<void> {
  const file = path.join(root, relativePath);
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf8');
}

function analyzer(overrides: Partial<typeof config> = {}): ProjectAnalyzer {
  return new ProjectAnalyzer({ ...config, ...overrides }, 'web_app');
}

describe('ProjectAnalyzer', () => {
  it('should detect an ML project from its requirements', async () => {
    await write('requirements.txt', 'scikit-learn>=1.4\npandas\n');
    await write('model/train.py', 'import sklearn\n\n\ndef fit():\n    pass\n');

    const profile = await analyzer().analyze(root);

    expect(profile).toEqual({
      root,
      filesAnalyzed: 1,
      linesEstimated: 3,
      techStack: ['python', 'scikit-learn'],
      frameworks: ['scikit-learn'],
      projectType: 'ml_ai',
      truncated: false,
    });
  });

  it('should classify a Go service as API microservices', async () => {
    await write('go.mod', 'module example.com/orders\n\ngo 1.22\n');
    await write('cmd/orders/main.go', 'package main\n');

    const profile = await analyzer().analyze(root);

    expect(profile.techStack).toEqual(['go']);
    expect(profile.projectType).toBe('api_microservices');
  });

  it('should prefer a frontend framework over the plain language rule', async () => {
    await write('package.json', JSON.stringify({ dependencies: { react: '^18.3.0' }, devDependencies: { typescript: '^5.4.0' } }));
    await write('src/App.tsx', 'export const App = () => null;\n');

    const profile = await analyzer().analyze(root);

    expect(profile.frameworks).toEqual(['react']);
    expect(profile.techStack).toEqual(['react', 'typescript']);
    expect(profile.projectType).toBe('web_app');
  });

  it('should skip excluded directories', async () => {
    await write('index.js', 'module.exports = 1;\n');
    await write('node_modules/left-pad/index.py', 'print(1)\n');

    const profile = await analyzer().analyze(root);

    expect(profile.techStack).toEqual(['javascript']);
    expect(profile.filesAnalyzed).toBe(1);
  });

  it('should fall back to the default type when nothing is recognised', async () => {
    await write('README.md', '# Notes\n');

    const profile = await analyzer().analyze(root);

    expect(profile.techStack).toEqual([]);
    expect(profile.filesAnalyzed).toBe(0);
    expect(profile.projectType).toBe('web_app');
  });

  it('should stop walking at maxFiles', async () => {
    await write('a.py', 'x = 1\n');
    await write('b.go', 'package b\n');
    await write('c.rs', 'fn main() {}\n');

    const profile = await analyzer({ maxFiles: 2 }).analyze(root);

    expect(profile.truncated).toBe(true);
    expect(profile.techStack).toEqual(['go', 'python']);
  });

  it('should reject a missing directory', async () => {
    await expect(analyzer().analyze(path.join(root, 'missing'))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('manifestPackages', () => {
  it('should read every dependency section of package.json', () => {
    const content = JSON.stringify({
      dependencies: { Express: '^4.0.0' },
      devDependencies: { vitest: '^2.0.0' },
      peerDependencies: { '@angular/core': '^17.0.0' },
    });

    expect(manifestPackages('web/package.json', content)).toEqual(['express', 'vitest', '@angular/core']);
  });

  it('should ignore a package.json that does not parse', () => {
    expect(manifestPackages('package.json', '{ "dependencies": ')).toEqual([]);
  });

  it('should tokenise other manifests', () => {
    expect(manifestPackages('requirements.txt', 'Django==5.0\ntorch>=2.1  # gpu\n')).toEqual([
      'django',
      '5.0',
      'torch',
      '2.1',
      'gpu',
    ]);
  });
});

describe('projectTypeFor', () => {
  it('should apply the first matching rule', () => {
    expect(projectTypeFor(new Set(['python', 'pytorch', 'fastapi']), config, 'library')).toBe('ml_ai');
    expect(projectTypeFor(new Set(['kotlin']), config, 'library')).toBe('mobile_app');
    expect(projectTypeFor(new Set(['ruby']), config, 'library')).toBe('library');
  });
});

describe('withProjectContext', () => {
  const profile: ProjectProfile = {
    root: '/srv/app',
    filesAnalyzed: 4,
    linesEstimated: 120,
    techStack: ['fastapi', 'python'],
    frameworks: ['fastapi'],
    projectType: 'api_microservices',
    truncated: false,
  };

  it('should put explicit stack entries first without duplicates', () => {
    expect(withProjectContext({ tech_stack: 'Python', domain: 'billing' }, profile)).toEqual({
      tech_stack: ['Python', 'fastapi'],
      domain: 'billing',
      project_type: 'api_microservices',
    });
  });

  it('should keep an explicit project type', () => {
    expect(withProjectContext({ project_type: 'library' }, profile)).toEqual({
      project_type: 'library',
      tech_stack: ['fastapi', 'python'],
    });
  });
});

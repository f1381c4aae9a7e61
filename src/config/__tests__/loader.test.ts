import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'node:path';
import { ConfigError } from '../../core/errors.js';
import { createDefaultRegistry } from '../../rules/registry.js';
import { componentSelectorRule } from '../../rules/angular/component_selector.js';
import { subscriptionCleanupRule } from '../../rules/angular/subscription_cleanup.js';
import { cleanupWorkspace, createWorkspaceWithFiles } from '../../__tests__/helpers/workspace.js';
import {
  BUILTIN_EXCLUDE,
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG_YAML,
  DEFAULT_INCLUDE,
  loadConfig,
  parseConfigText,
  resolveConfig,
  settingsForFile,
  validateRuleSettings,
} from '../loader.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('resolveConfig', () => {
  it('fills every default', () => {
    expect(resolveConfig()).toEqual({
      configPath: undefined,
      include: DEFAULT_INCLUDE,
      exclude: BUILTIN_EXCLUDE,
      maxFileBytes: 1_000_000,
      maxWarnings: -1,
      rules: {},
      overrides: [],
    });
  });

  it('normalizes rule settings and appends built-in excludes', () => {
    const text = `include: ['app/**/*.ts']
exclude: ['**/generated/**']
maxWarnings: 5
rules:
  rxjs/finnish-notation: off
  angular/component-selector: [error, { prefix: acme }]
  ngrx/no-inline-selector: [error]
overrides:
  - files: ['**/*.spec.ts']
    rules:
      angular/subscription-cleanup: off
`;

    const config = resolveConfig(parseConfigText(text, 'cfg.yaml'), 'cfg.yaml');

    expect(config.include).toEqual(['app/**/*.ts']);
    expect(config.exclude).toEqual(['**/generated/**', ...BUILTIN_EXCLUDE]);
    expect(config.maxWarnings).toBe(5);
    expect(config.rules).toEqual({
      'rxjs/finnish-notation': { level: 'off' },
      'angular/component-selector': { level: 'error', options: { prefix: 'acme' } },
      'ngrx/no-inline-selector': { level: 'error' },
    });
    expect(config.overrides).toEqual([
      { files: ['**/*.spec.ts'], rules: { 'angular/subscription-cleanup': { level: 'off' } } },
    ]);
  });
});

describe('parseConfigText', () => {
  it('treats an empty document as an empty config', () => {
    expect(parseConfigText('', 'cfg.yaml')).toEqual({});
  });

  it('reports YAML syntax errors', () => {
    expect(() => parseConfigText('rules: [unclosed', 'cfg.yaml')).toThrow(/^Invalid YAML: /);
  });

  it('lists every schema violation', () => {
    const error = catchError(() => parseConfigText('maxWarnings: -2\ncolour: red\n', 'cfg.yaml'));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      configPath: 'cfg.yaml',
      issues: ['maxWarnings: Number must be greater than or equal to -1', "Unrecognized key(s) in object: 'colour'"],
    });
  });
});

describe('validateRuleSettings', () => {
  const registry = createDefaultRegistry();

  it('rejects unknown rules with a suggestion and invalid options', () => {
    const config = resolveConfig(
      {
        rules: {
          'rxjs/finish-notation': 'warning',
          'angular/subscription-cleanup': ['error', { completingOperators: 'take' }],
        },
        overrides: [{ files: ['**/*.ts'], rules: { 'angular/component-selector': ['error', { extra: 1 }] } }],
      },
      'cfg.yaml',
    );

    const error = catchError(() => validateRuleSettings(config, registry));

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      issues: [
        'rules.rxjs/finish-notation: unknown rule (did you mean "rxjs/finnish-notation"?)',
        'rules.angular/subscription-cleanup: completingOperators: Expected array, received string',
        "overrides.0.rules.angular/component-selector: Unrecognized key(s) in object: 'extra'",
      ],
    });
  });

  it('accepts valid settings', () => {
    const config = resolveConfig({ rules: { 'angular/component-selector': ['error', { prefix: ['app', 'admin'] }] } });

    expect(() => validateRuleSettings(config, registry)).not.toThrow();
  });
});

describe('settingsForFile', () => {
  const config = resolveConfig({
    rules: { 'angular/subscription-cleanup': 'warning' },
    overrides: [
      { files: ['**/*.spec.ts'], rules: { 'angular/subscription-cleanup': 'off' } },
      { files: ['src/legacy/**'], rules: { 'angular/component-selector': ['warning', { prefix: 'old' }] } },
    ],
  });

  it('starts from the rule default and applies matching overrides in order', () => {
    expect(settingsForFile(config, 'src/app/heroes.ts', subscriptionCleanupRule)).toEqual({ level: 'warning' });
    expect(settingsForFile(config, 'src/app/heroes.spec.ts', subscriptionCleanupRule)).toEqual({ level: 'off' });
    expect(settingsForFile(config, 'src/app/heroes.ts', componentSelectorRule)).toEqual({ level: 'error' });
    expect(settingsForFile(config, 'src/legacy/old.ts', componentSelectorRule)).toEqual({
      level: 'warning',
      options: { prefix: 'old' },
    });
  });
});

describe('loadConfig', () => {
  let workspace = '';

  afterEach(async () => {
    if (workspace) await cleanupWorkspace(workspace);
    workspace = '';
  });

  it('uses defaults when no config file exists', async () => {
    workspace = await createWorkspaceWithFiles({ 'src/app.ts': '' });

    expect(await loadConfig(workspace)).toEqual(resolveConfig());
  });

  it('discovers .convention-lint.yml', async () => {
    workspace = await createWorkspaceWithFiles({ '.convention-lint.yml': 'maxWarnings: 0\n' });

    const config = await loadConfig(workspace);

    expect(config.configPath).toBe(path.join(workspace, '.convention-lint.yml'));
    expect(config.maxWarnings).toBe(0);
  });

  it('loads the default config written by init', async () => {
    workspace = await createWorkspaceWithFiles({ '.convention-lint.yaml': DEFAULT_CONFIG_YAML });

    const config = await loadConfig(workspace);

    expect(config.rules['angular/component-selector']).toEqual({ level: 'error', options: { prefix: 'app' } });
    expect(config.overrides[0]?.rules['angular/subscription-cleanup']).toEqual({ level: 'off' });
  });

  it('prefers an explicit path, then the environment variable', async () => {
    workspace = await createWorkspaceWithFiles({
      '.convention-lint.yaml': 'maxWarnings: 1\n',
      'config/explicit.yaml': 'maxWarnings: 2\n',
      'config/env.yaml': 'maxWarnings: 3\n',
    });

    process.env[CONFIG_PATH_ENV] = 'config/env.yaml';

    expect((await loadConfig(workspace, { configPath: 'config/explicit.yaml' })).maxWarnings).toBe(2);
    expect((await loadConfig(workspace)).maxWarnings).toBe(3);
  });

  it('fails when an explicit config file is missing', async () => {
    workspace = await createWorkspaceWithFiles({});

    await expect(loadConfig(workspace, { configPath: 'missing.yaml' })).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'Config file not found',
      configPath: path.join(workspace, 'missing.yaml'),
    });
  });
});

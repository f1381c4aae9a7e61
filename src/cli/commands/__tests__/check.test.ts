import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { CliError } from '../../errors.js';
import { cleanupWorkspace, createWorkspaceWithFiles } from '../../../__tests__/helpers/workspace.js';
import { checkCommand, parseMaxWarnings } from '../check.js';

describe('parseMaxWarnings', () => {
  it('accepts integers from -1 up', () => {
    expect(parseMaxWarnings(undefined)).toBeUndefined();
    expect(parseMaxWarnings('-1')).toBe(-1);
    expect(parseMaxWarnings('0')).toBe(0);
    expect(parseMaxWarnings('12')).toBe(12);
  });

  it('rejects anything else', () => {
    expect(() => parseMaxWarnings('lots')).toThrow(CliError);
    expect(() => parseMaxWarnings('-2')).toThrow('--max-warnings must be an integer >= -1, got "-2"');
    expect(() => parseMaxWarnings('1.5')).toThrow('--max-warnings must be an integer >= -1, got "1.5"');
  });
});

describe('checkCommand', () => {
  let workspace = '';
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    workspace = await createWorkspaceWithFiles({
      'src/app/hero.service.ts': 'const ticks = interval(1000);\n',
    });
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    await cleanupWorkspace(workspace);
  });

  const run = (...args: string[]) => checkCommand({ workspace, args, rawArgs: ['check', ...args] });

  it('prints the text report and passes with unlimited warnings', async () => {
    expect(await run()).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      [
        'src/app/hero.service.ts',
        '  1:7  warning  Observable variable "ticks" should end with "$"  rxjs/finnish-notation',
        '',
        '✖ 1 problem (0 errors, 1 warning)',
      ].join('\n'),
    );
  });

  it('fails when warnings exceed --max-warnings', async () => {
    expect(await run('--max-warnings', '0')).toBe(1);
  });

  it('prints JSON', async () => {
    expect(await run('--format', 'json')).toBe(0);

    const report = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(report).toMatchObject({ files: 1, errorCount: 0, warningCount: 1 });
  });

  it('prints nothing in github format for a clean run', async () => {
    expect(await run('--format', 'github', '--rule', 'ngrx/action-type-format')).toBe(0);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('rejects unknown formats', async () => {
    await expect(run('--format', 'xml')).rejects.toThrow('Unknown format "xml". Expected one of: text, json, github');
  });

  it('rejects unknown options', async () => {
    await expect(run('--bogus')).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT' });
  });
});

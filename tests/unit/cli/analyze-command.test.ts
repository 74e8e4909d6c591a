/**
 * Unit tests for analyze CLI command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTempProject, SAMPLE_SITE, type TempProjectResult } from '../../helpers/fixtures.js';
import { ProcessExit, stubProcess, type ProcessStubs } from '../../helpers/process.js';

async function runAnalyze(args: string[]): Promise<void> {
  const { analyzeCommand } = await import('../../../src/cli/commands/analyze.js');
  await analyzeCommand.parseAsync(args, { from: 'user' });
}

describe('CLI analyze command', () => {
  let project: TempProjectResult;
  let stubs: ProcessStubs;

  beforeEach(() => {
    vi.resetModules();
    project = createTempProject({ 'site.py': SAMPLE_SITE });
    stubs = stubProcess();
  });

  afterEach(() => {
    stubs.restore();
    project.cleanup();
  });

  it('prints the text report', async () => {
    await runAnalyze([project.getFilePath('site.py')]);

    expect(stubs.log).toHaveBeenCalledTimes(1);
    const output = stubs.output();
    expect(output.startsWith('Dataclasses:\nItem\n  name\nState\n')).toBe(true);
    expect(output).toContain('\nRoutes:\nindex(state)\n');
    expect(output).toContain('\n    State --> Item\n');
  });

  it('prints JSON with --json', async () => {
    await runAnalyze([project.getFilePath('site.py'), '--json']);

    const report = JSON.parse(stubs.output());
    expect(report.routes.map((r: { name: string }) => r.name)).toEqual(['index', 'details']);
    expect(report.callGraph).toEqual({ index: ['Page', 'details'], details: ['Page', 'index'] });
  });

  it('applies markers from a config file beside the source', async () => {
    project.addFile('drafter-lens.config.json', JSON.stringify({ analysis: { recordMarkers: ['record'] } }));
    project.addFile('custom.py', '@record\nclass Item:\n    name: str\n');

    await runAnalyze([project.getFilePath('custom.py'), '--json']);

    expect(JSON.parse(stubs.output()).records.map((r: { name: string }) => r.name)).toEqual(['Item']);
  });

  it('uses an explicit config file', async () => {
    const configPath = project.addFile('conf/lens.json', JSON.stringify({ analysis: { routeMarkers: ['page'] } }));
    project.addFile('pages.py', '@page\ndef home(state):\n    return Page(state, [])\n');

    await runAnalyze([project.getFilePath('pages.py'), '--json', '-c', configPath]);

    expect(JSON.parse(stubs.output()).routes).toHaveLength(1);
  });

  it('exits when the file does not exist', async () => {
    const missing = project.getFilePath('missing.py');

    await expect(runAnalyze([missing])).rejects.toBeInstanceOf(ProcessExit);

    expect(stubs.error.mock.calls[0]).toEqual([`File not found: ${missing}`]);
    expect(stubs.exit).toHaveBeenCalledWith(1);
  });

  it('reports syntax errors', async () => {
    project.addFile('broken.py', 'def broken(:\n');

    await expect(runAnalyze([project.getFilePath('broken.py')])).rejects.toBeInstanceOf(ProcessExit);

    expect(stubs.error.mock.calls[0]?.[0]).toBe('Error:');
    expect(String(stubs.error.mock.calls[0]?.[1])).toContain('(line 1, column ');
    expect(stubs.exit).toHaveBeenCalledWith(1);
  });
});

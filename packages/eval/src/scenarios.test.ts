import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '@plugin-evals/shared';
import { DEFAULT_SCENARIOS_DIR, listScenarios, loadScenario } from './scenarios';

describe('loadScenario', () => {
  let scenariosDir: string | undefined;

  async function withScenario(name: string, fileName: string, content: string): Promise<string> {
    scenariosDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-scenarios-'));
    await fs.mkdir(path.join(scenariosDir, name));
    await fs.writeFile(path.join(scenariosDir, name, fileName), content);
    return scenariosDir;
  }

  afterEach(async () => {
    if (scenariosDir) {
      await fs.rm(scenariosDir, { recursive: true, force: true });
      scenariosDir = undefined;
    }
  });

  it('loads a JSON scenario and names it after its directory', async () => {
    const dir = await withScenario(
      'demo',
      'scenario.json',
      JSON.stringify({
        name: 'declared-elsewhere',
        success_criteria: [{ type: 'file_contains', file: 'main.py', patterns: ['x'] }],
        scoring: { code_modified: { points: 10 } },
      }),
    );

    expect(await loadScenario('demo', dir)).toEqual({
      name: 'demo',
      success_criteria: [
        { type: 'file_contains', file: 'main.py', patterns: ['x'], description: '' },
      ],
      scoring: { code_modified: { points: 10 } },
    });
  });

  it('loads a YAML scenario', async () => {
    const dir = await withScenario(
      'yaml-demo',
      'scenario.yaml',
      [
        'success_criteria:',
        '  - type: code_runs',
        '    description: Runs',
        'scoring:',
        '  code_runs:',
        '    points: 5',
      ].join('\n'),
    );

    const scenario = await loadScenario('yaml-demo', dir);

    expect(scenario.success_criteria).toEqual([
      { type: 'code_runs', command: 'python main.py', timeout: 60, description: 'Runs' },
    ]);
    expect(scenario.scoring).toEqual({ code_runs: { points: 5 } });
  });

  it('fails with a ConfigError for a missing scenario', async () => {
    scenariosDir = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-scenarios-'));

    await expect(loadScenario('absent', scenariosDir)).rejects.toThrow(/^Scenario not found: absent/);
  });

  it('names the available scenarios when one is missing', async () => {
    const dir = await withScenario('demo', 'scenario.yaml', 'success_criteria: []\n');
    await fs.mkdir(path.join(dir, 'empty-dir'));

    await expect(loadScenario('absent', dir)).rejects.toThrow(
      `Scenario not found: absent (looked in ${path.join(dir, 'absent')}). Available: demo`,
    );
  });

  it('fails with a ConfigError for an invalid scenario', async () => {
    const dir = await withScenario(
      'broken',
      'scenario.json',
      JSON.stringify({ scoring: { code_runs: { points: 'lots' } } }),
    );

    await expect(loadScenario('broken', dir)).rejects.toBeInstanceOf(ConfigError);
  });

  it('fails with a ConfigError for unparseable content', async () => {
    const dir = await withScenario('garbled', 'scenario.json', '{"scoring": ');

    await expect(loadScenario('garbled', dir)).rejects.toThrow(/^Could not parse /);
  });

  it('rejects names that leave the scenarios directory', async () => {
    await expect(loadScenario('../etc', os.tmpdir())).rejects.toThrow('Invalid scenario name: "../etc"');
  });

  it('lists scenario directories', async () => {
    const dir = await withScenario('b-scenario', 'scenario.json', '{}');
    await fs.mkdir(path.join(dir, 'a-scenario'));
    await fs.writeFile(path.join(dir, 'a-scenario', 'scenario.yml'), 'scoring: {}');
    await fs.mkdir(path.join(dir, 'not-a-scenario'));

    expect(await listScenarios(dir)).toEqual(['a-scenario', 'b-scenario']);
  });
});

describe('bundled scenarios', () => {
  it('all load and score only known categories', async () => {
    const names = await listScenarios(DEFAULT_SCENARIOS_DIR);
    expect(names).toEqual(['create-prompt-and-dataset', 'integration-with-prompt']);

    for (const name of names) {
      const scenario = await loadScenario(name);
      expect(scenario.success_criteria.every((c) => c.type !== 'unknown')).toBe(true);
      expect(Object.keys(scenario.scoring).length).toBeGreaterThan(0);
    }
  });

  it('each carry a prompt and a starting project for sessions', async () => {
    for (const name of await listScenarios(DEFAULT_SCENARIOS_DIR)) {
      const scenario = await loadScenario(name);
      expect(scenario.user_prompt?.length).toBeGreaterThan(0);
      const project = await fs.stat(path.join(DEFAULT_SCENARIOS_DIR, name, 'project'));
      expect(project.isDirectory()).toBe(true);
    }
  });
});

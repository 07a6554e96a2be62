import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import {
  ConfigError,
  ScenarioFileSchema,
  errorMessage,
  formatIssues,
  type Scenario,
} from '@plugin-evals/shared';

/** Scenario definitions shipped with this package. */
export const DEFAULT_SCENARIOS_DIR = fileURLToPath(new URL('../scenarios', import.meta.url));

export const SCENARIO_FILE_NAMES = ['scenario.json', 'scenario.yaml', 'scenario.yml'] as const;

async function findScenarioFile(dir: string): Promise<string | undefined> {
  for (const fileName of SCENARIO_FILE_NAMES) {
    const candidate = path.join(dir, fileName);
    if (await fs.pathExists(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Loads `<scenariosDir>/<name>/scenario.json` (or `.yaml`). The directory
 * name is the scenario's identity.
 */
export async function loadScenario(
  name: string,
  scenariosDir: string = DEFAULT_SCENARIOS_DIR,
): Promise<Scenario> {
  if (name.trim() === '' || name.includes('/') || name.includes('\\') || name.startsWith('.')) {
    throw new ConfigError(`Invalid scenario name: "${name}"`);
  }

  const scenarioPath = await findScenarioFile(path.join(scenariosDir, name));
  if (!scenarioPath) {
    const available = await listScenarios(scenariosDir);
    throw new ConfigError(
      `Scenario not found: ${name} (looked in ${path.join(scenariosDir, name)}). ` +
        `Available: ${available.length > 0 ? available.join(', ') : 'none'}`,
    );
  }

  let raw: unknown;
  try {
    raw = yaml.load(await fs.readFile(scenarioPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not parse ${scenarioPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = ScenarioFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid scenario ${name}:\n${formatIssues(parsed.error)}`);
  }

  return { ...parsed.data, name };
}

/** Names of every directory under `scenariosDir` that holds a scenario file. */
export async function listScenarios(scenariosDir: string = DEFAULT_SCENARIOS_DIR): Promise<string[]> {
  if (!(await fs.pathExists(scenariosDir))) return [];
  const entries = await fs.readdir(scenariosDir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory() && (await findScenarioFile(path.join(scenariosDir, entry.name)))) {
      names.push(entry.name);
    }
  }
  return names.sort();
}

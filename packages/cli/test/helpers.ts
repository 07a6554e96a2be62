import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { OutputSink } from '../src/output';

export interface CapturedSink extends OutputSink {
  out: string[];
  err: string[];
}

export function captureSink(): CapturedSink {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    log: (message) => out.push(message),
    error: (message) => err.push(message),
  };
}

export const DEMO_SCENARIO = {
  description: 'Demo integration',
  success_criteria: [
    {
      type: 'file_contains',
      file: 'main.py',
      patterns: ['gpt-4o-mini'],
      description: 'Model kept',
    },
    {
      type: 'api_verify',
      method: 'search_completions',
      description: 'Completion logged',
    },
  ],
  scoring: {
    code_modified: { points: 10 },
    completion_logged: { points: 30 },
  },
};

/** Temp workspace with a `scenarios/demo` definition and a `project` directory. */
export async function makeWorkspace(mainPy: string): Promise<{
  root: string;
  scenariosDir: string;
  projectDir: string;
}> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-cli-'));
  const scenariosDir = path.join(root, 'scenarios');
  const projectDir = path.join(root, 'project');
  await fs.mkdir(path.join(scenariosDir, 'demo'), { recursive: true });
  await fs.writeFile(
    path.join(scenariosDir, 'demo', 'scenario.json'),
    JSON.stringify(DEMO_SCENARIO, null, 2),
  );
  await fs.mkdir(projectDir);
  await fs.writeFile(path.join(projectDir, 'main.py'), mainPy);
  return { root, scenariosDir, projectDir };
}

export const SESSION_PROMPT = 'Switch the model to gpt-4o-mini';

/** Stand-in assistant: edits main.py and records the arguments it was given. */
const AGENT_SOURCE = [
  "const fs = require('fs');",
  "fs.writeFileSync('main.py', \"MODEL = 'gpt-4o-mini'\\n\");",
  "fs.writeFileSync('argv.json', JSON.stringify(process.argv.slice(2)));",
  "console.log('edited main.py');",
].join('\n');

/**
 * Temp workspace whose `demo` scenario has a prompt and a starting project,
 * plus a node script to run as the assistant.
 */
export async function makeSessionWorkspace(): Promise<{
  root: string;
  scenariosDir: string;
  resultsDir: string;
  agentCommand: string;
}> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'evals-cli-run-'));
  const scenariosDir = path.join(root, 'scenarios');
  const projectDir = path.join(scenariosDir, 'demo', 'project');
  await fs.mkdir(projectDir, { recursive: true });
  await fs.writeFile(
    path.join(scenariosDir, 'demo', 'scenario.json'),
    JSON.stringify({ ...DEMO_SCENARIO, user_prompt: SESSION_PROMPT, timeout: 10 }, null, 2),
  );
  await fs.writeFile(path.join(projectDir, 'main.py'), "MODEL = 'other-model'\n");
  const agentPath = path.join(root, 'agent.js');
  await fs.writeFile(agentPath, AGENT_SOURCE);
  return {
    root,
    scenariosDir,
    resultsDir: path.join(root, 'results'),
    agentCommand: `node ${agentPath}`,
  };
}

import path from 'path';
import fs from 'fs/promises';
import { DirectorySink, JsonFileChangeSource } from '../../src/collaborators.js';
import { mergeConfig } from '../../src/config/loader.js';
import { buildOracle, buildOracles, type PipelineDeps } from '../../src/pipeline.js';
import { createFixtureRepo, PASSING_ORACLE, ScriptedActor, type FixtureRepo } from '../helpers/fixture-repo.js';

describe('buildOracle', () => {
  let fixture: FixtureRepo;
  let tasksDir: string;
  let outputDir: string;
  let workspaceRoot: string;
  let deps: PipelineDeps;

  beforeAll(async () => {
    fixture = await createFixtureRepo();
    tasksDir = path.join(fixture.dir, 'tasks');
    outputDir = path.join(fixture.dir, 'out');
    workspaceRoot = path.join(fixture.dir, 'workspaces');
    await fs.mkdir(tasksDir);
    await fs.writeFile(path.join(tasksDir, 'example-scheme-7.json'), JSON.stringify({
      diff: fixture.diff,
      base_revision: fixture.baseCommit,
      title: 'Accept uppercase URL schemes',
    }));
    await fs.writeFile(path.join(tasksDir, 'example-scheme-8.json'), JSON.stringify({
      diff: fixture.diff.split('diff --git a/tests/')[0],
      base_revision: fixture.baseCommit,
    }));

    deps = {
      config: mergeConfig({
        workspace: { root: workspaceRoot },
        session: { maxTurns: 2, reminders: [] },
        screening: { extraRunners: ['^bash tests/'] },
      }),
      changeSource: new JsonFileChangeSource(tasksDir),
      actor: new ScriptedActor(() => ({ kind: 'submit', script: PASSING_ORACLE })),
      sink: new DirectorySink(outputDir),
    };
  });

  afterAll(async () => {
    await fixture.cleanup();
  });

  it('produces and stores an oracle for a change, then removes the workspace', async () => {
    const result = await buildOracle({ repo: 'example/scheme', changeId: '7', source: fixture.repoPath }, deps);

    expect(result).toMatchObject({ instanceId: 'example-scheme-7', status: 'accepted', turns: 1 });
    const location = path.join(outputDir, 'example-scheme-7');
    if (result.status === 'accepted') expect(result.location).toBe(location);
    expect(await fs.readFile(path.join(location, 'eval_script.sh'), 'utf-8')).toBe(PASSING_ORACLE);
    const metadata: unknown = JSON.parse(await fs.readFile(path.join(location, 'oracle.json'), 'utf-8'));
    expect(metadata).toMatchObject({
      instanceId: 'example-scheme-7',
      repo: 'example/scheme',
      changeId: '7',
      baseRevision: fixture.baseCommit,
      title: 'Accept uppercase URL schemes',
      testFiles: ['tests/test_scheme.sh'],
      fixFiles: ['src/scheme.sh'],
      ignoredPaths: ['CHANGELOG.md'],
      buggyExitCode: 1,
      fixedExitCode: 0,
      turns: 1,
    });
    await expect(fs.access(path.join(workspaceRoot, 'example-scheme-7'))).rejects.toThrow();
  });

  it('reports a change without tests as rejected input', async () => {
    const result = await buildOracle({ repo: 'example/scheme', changeId: '8', source: fixture.repoPath }, deps);
    expect(result).toMatchObject({ instanceId: 'example-scheme-8', status: 'rejected-input' });
  });

  it('runs a batch in order and records failures without stopping', async () => {
    const results = await buildOracles([
      { repo: 'example/scheme', changeId: '404', source: fixture.repoPath },
      { repo: 'example/scheme', changeId: '8', source: fixture.repoPath },
      { repo: 'example/scheme', changeId: '7', source: fixture.repoPath },
    ], deps);

    expect(results.map(result => [result.instanceId, result.status])).toEqual([
      ['example-scheme-404', 'failed'],
      ['example-scheme-8', 'rejected-input'],
      ['example-scheme-7', 'accepted'],
    ]);
    expect(results[0]).toMatchObject({ code: 'TASK_NOT_FOUND', error: 'No task record for example/scheme#404' });
  });
});

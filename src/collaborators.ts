import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { instanceId } from './output/artifact.js';
import type { OracleRecord } from './output/types.js';
import { OracleError, OracleErrorCode, describeError } from './shared/errors.js';
import { childLogger, type Logger } from './shared/logger.js';

export type { ProposingActor } from './session/types.js';

export interface ChangeRecord {
  diff: string;
  baseRevision: string;
  title?: string;
  description?: string;
}

/** Where bug-fix changes come from: a code host, a dataset, a directory. */
export interface ChangeSource {
  fetchChange(repo: string, changeId: string): Promise<ChangeRecord>;
}

/** Receives accepted oracles; returns where the record was stored. */
export interface ArtifactSink {
  store(record: OracleRecord): Promise<string>;
}

const taskFileSchema = z.object({
  diff: z.string().min(1),
  base_revision: z.string().min(1),
  title: z.string().optional(),
  description: z.string().nullable().optional(),
});

/** Reads task records saved as `<dir>/<instance id>.json`. */
export class JsonFileChangeSource implements ChangeSource {
  constructor(private readonly dir: string) {}

  async fetchChange(repo: string, changeId: string): Promise<ChangeRecord> {
    const file = path.join(this.dir, `${instanceId(repo, changeId)}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new OracleError(OracleErrorCode.TASK_NOT_FOUND, `No task record for ${repo}#${changeId}`, { file });
      }
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new OracleError(OracleErrorCode.INVALID_DIFF, `Task record is not valid JSON: ${file}`, {
        cause: describeError(err),
      });
    }
    const parsed = taskFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new OracleError(OracleErrorCode.INVALID_DIFF, `Malformed task record ${file}: ${issues.join('; ')}`, { issues });
    }
    return {
      diff: parsed.data.diff,
      baseRevision: parsed.data.base_revision,
      title: parsed.data.title,
      description: parsed.data.description ?? undefined,
    };
  }
}

/**
 * Writes each accepted oracle to its own directory:
 * eval_script.sh, test.patch, fix.patch and oracle.json.
 */
export class DirectorySink implements ArtifactSink {
  private readonly logger: Logger;

  constructor(private readonly outputDir: string, logger?: Logger) {
    this.logger = childLogger('sink', logger);
  }

  async store(record: OracleRecord): Promise<string> {
    const dir = path.join(this.outputDir, record.instanceId);
    await fs.mkdir(dir, { recursive: true });

    const { oracleScript, testChangeSet, fixChangeSet, ...metadata } = record;
    await fs.writeFile(path.join(dir, 'eval_script.sh'), oracleScript, { encoding: 'utf-8', mode: 0o755 });
    await fs.writeFile(path.join(dir, 'test.patch'), testChangeSet, 'utf-8');
    await fs.writeFile(path.join(dir, 'fix.patch'), fixChangeSet, 'utf-8');
    await fs.writeFile(path.join(dir, 'oracle.json'), `${JSON.stringify(metadata, null, 2)}\n`, 'utf-8');

    this.logger.info({ instanceId: record.instanceId, dir }, 'stored oracle');
    return dir;
  }
}

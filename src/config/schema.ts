import os from 'os';
import path from 'path';
import { z } from 'zod';

const labelSchema = z.enum(['test', 'fix', 'ignore']);

const patternListSchema = z.array(z.string().min(1)).superRefine((patterns, ctx) => {
  patterns.forEach((pattern, index) => {
    try {
      new RegExp(pattern);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: `Invalid regular expression: ${pattern}` });
    }
  });
});

export const configSchema = z.object({
  workspace: z.object({
    root: z.string().min(1),
    keep: z.boolean(),
    cleanIgnored: z.boolean(),
    threeWayApply: z.boolean(),
    repositoryUrlTemplate: z.string().includes('{repo}', { message: 'repositoryUrlTemplate must contain {repo}' }),
  }),
  execution: z.object({
    commandTimeoutMs: z.number().int().positive(),
    oracleTimeoutMs: z.number().int().positive(),
    environmentFailureExitCodes: z.array(z.number().int().min(1).max(255)),
    outputLimits: z.object({
      stdout: z.number().int().nonnegative(),
      stderr: z.number().int().nonnegative(),
    }),
  }),
  session: z.object({
    maxTurns: z.number().int().positive(),
    fixedTimeoutRetries: z.number().int().nonnegative(),
    reminders: z.array(z.object({
      turn: z.number().int().positive(),
      message: z.string().min(1),
    })),
  }),
  classification: z.object({
    testPatterns: patternListSchema,
    fixPatterns: patternListSchema,
    ignorePatterns: patternListSchema,
    precedence: z.array(labelSchema).length(3).refine(
      labels => new Set(labels).size === 3,
      { message: 'precedence must list test, fix and ignore exactly once' }
    ),
    requireFixChanges: z.boolean(),
  }),
  screening: z.object({
    extraRunners: patternListSchema,
  }),
});

export type OracleConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: OracleConfig = {
  workspace: {
    root: path.join(os.tmpdir(), 'regression-oracle'),
    keep: false,
    cleanIgnored: false,
    threeWayApply: true,
    repositoryUrlTemplate: 'https://github.com/{repo}.git',
  },
  execution: {
    commandTimeoutMs: 120_000,
    oracleTimeoutMs: 300_000,
    environmentFailureExitCodes: [126, 127],
    outputLimits: { stdout: 3000, stderr: 2000 },
  },
  session: {
    maxTurns: 30,
    fixedTimeoutRetries: 0,
    reminders: [
      {
        turn: 10,
        message: 'You have explored for a while. Submit evaluation.sh with submit_eval_script now; running the specific test from the test changes is usually enough.',
      },
      {
        turn: 20,
        message: 'The turn budget is running out. Submit evaluation.sh now: install dependencies if needed, then run the test that the test changes add.',
      },
    ],
  },
  classification: {
    testPatterns: [
      '(^|/)([Tt]ests?|__tests__|[Ss]pecs?|[Tt]esting|testdata|fixtures)/',
      '(^|/)test_[^/]*$',
      '_test\\.[^/]+$',
      '\\.(test|spec)\\.[^/]+$',
      '(^|/)(conftest|tests)\\.py$',
      '(^|/|[a-z0-9_])Tests?\\.(java|kt|cs|scala|swift|php)$',
      '[a-z0-9_]Tests\\.[^/]+$',
    ],
    fixPatterns: [
      '(^|/)(src|lib|pkg|internal|cmd|app)/',
    ],
    ignorePatterns: [
      '(^|/)(CHANGELOG|CHANGES|HISTORY|NEWS|AUTHORS|CONTRIBUTING|CONTRIBUTORS|README|LICENSE|COPYING)[^/]*$',
      '(^|/)([Cc]hange[Ll]og|[Rr]eadme|[Ll]icense)[^/]*$',
      '\\.(md|MD|rst|adoc)$',
      '^[Dd]ocs?/',
      '^\\.github/',
      '(^|/)\\.gitignore$',
    ],
    precedence: ['test', 'fix', 'ignore'],
    requireFixChanges: true,
  },
  screening: {
    extraRunners: [],
  },
};

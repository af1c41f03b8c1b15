import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const actorResponseSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('command'),
    command: z.string().min(1),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('switch'),
    target: z.enum(['buggy', 'fixed']),
  }),
  z.object({
    kind: z.literal('submit'),
    script: z.string().min(1),
  }),
  z.object({
    kind: z.literal('abandon'),
    reason: z.string().default(''),
  }),
]);

export type ActorResponse = z.infer<typeof actorResponseSchema>;

export interface ToolDef {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

// ── Actor tools ────────────────────────────────────────────────
// Adapters for tool-calling actors advertise these and translate the calls
// back with parseToolCall().

const bashInput = z.object({
  command: z.string().min(1).describe('The bash command to execute'),
});
const submitInput = z.object({
  script_content: z.string().min(1).describe('The complete content of evaluation.sh, starting with #!/bin/bash'),
});
const abandonInput = z.object({
  reason: z.string().optional().describe('Why no discriminating script can be written'),
});
const noInput = z.object({});

const actorTools: ToolDef[] = [
  {
    name: 'bash',
    description: 'Execute a bash command in the repository checkout. Use it to explore files, install dependencies and run tests. Keep commands focused.',
    inputSchema: bashInput,
  },
  {
    name: 'switch-to-resolved',
    description: 'Put the repository in the FIXED state: test changes and fix changes applied. Tests should pass here.',
    inputSchema: noInput,
  },
  {
    name: 'switch-to-bug',
    description: 'Put the repository back in the BUGGY state: only the test changes applied. Tests should fail here.',
    inputSchema: noInput,
  },
  {
    name: 'submit_eval_script',
    description: 'Submit evaluation.sh. It is screened and then run in both the buggy and fixed states; you get the exit codes back if it is rejected.',
    inputSchema: submitInput,
  },
  {
    name: 'abandon',
    description: 'Give up on this change when no discriminating script can be written.',
    inputSchema: abandonInput,
  },
];

export function actionTools(): Array<{ name: string; description: string; inputSchema: ReturnType<typeof zodToJsonSchema> }> {
  return actorTools.map(tool => ({
    name: tool.name,
    description: tool.description,
    inputSchema: zodToJsonSchema(tool.inputSchema),
  }));
}

export type ToolCallResult =
  | { ok: true; response: ActorResponse }
  | { ok: false; message: string };

export function parseToolCall(name: string, input: unknown): ToolCallResult {
  const fail = (error: z.ZodError): ToolCallResult => ({
    ok: false,
    message: `Invalid input for ${name}: ${error.issues.map(issue => issue.message).join('; ')}`,
  });

  switch (name) {
    case 'bash': {
      const parsed = bashInput.safeParse(input);
      return parsed.success ? { ok: true, response: { kind: 'command', command: parsed.data.command } } : fail(parsed.error);
    }
    case 'switch-to-resolved':
      return { ok: true, response: { kind: 'switch', target: 'fixed' } };
    case 'switch-to-bug':
      return { ok: true, response: { kind: 'switch', target: 'buggy' } };
    case 'submit_eval_script': {
      const parsed = submitInput.safeParse(input);
      return parsed.success ? { ok: true, response: { kind: 'submit', script: parsed.data.script_content } } : fail(parsed.error);
    }
    case 'abandon': {
      const parsed = abandonInput.safeParse(input ?? {});
      return parsed.success ? { ok: true, response: { kind: 'abandon', reason: parsed.data.reason ?? '' } } : fail(parsed.error);
    }
    default:
      return { ok: false, message: `Unknown tool: ${name}` };
  }
}

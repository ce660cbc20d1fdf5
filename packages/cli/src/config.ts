// ============================================================================
// @sufftree/cli — Configuration
// ============================================================================

import { SuffixTreeError } from '@sufftree/core';
import { z } from 'zod';

/**
 * Thrown when flags or environment values do not validate.
 */
export class CliConfigError extends SuffixTreeError {
  constructor(message: string) {
    super(message);
    this.name = 'CliConfigError';
  }
}

export const cliOptionsSchema = z
  .object({
    text: z.string().optional(),
    file: z.string().min(1).optional(),
    hex: z
      .string()
      .regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected an even number of hex digits')
      .optional(),
    children: z.enum(['dense', 'sparse']).default('dense'),
    format: z.enum(['tree', 'stats', 'suffixes']).default('tree'),
    verify: z.boolean().default(false),
    terminator: z
      .string()
      .regex(/^[\x00-\x7f]$/, 'expected a single ASCII character')
      .optional(),
    help: z.boolean().default(false),
  })
  .refine(
    (o) => [o.text, o.file, o.hex].filter((source) => source !== undefined).length <= 1,
    { message: 'use only one of <text>, --file and --hex' },
  );

export type CliOptions = z.infer<typeof cliOptionsSchema>;

const VALUE_FLAGS = new Set(['file', 'hex', 'children', 'format', 'terminator']);
const BOOLEAN_FLAGS = new Set(['verify', 'help']);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
    .join('; ');
}

/**
 * Read options from argv (without the node and script entries) and the
 * environment. `SUFFTREE_CHILDREN` sets the default child table strategy.
 */
export function parseCliOptions(
  argv: readonly string[],
  env: Record<string, string | undefined> = {},
): CliOptions {
  const raw: Record<string, unknown> = {};
  if (env.SUFFTREE_CHILDREN !== undefined) raw.children = env.SUFFTREE_CHILDREN;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const name = arg.slice(2);
      if (VALUE_FLAGS.has(name)) {
        if (i + 1 >= argv.length) throw new CliConfigError(`--${name} needs a value`);
        raw[name] = argv[++i];
      } else if (BOOLEAN_FLAGS.has(name)) {
        raw[name] = true;
      } else {
        throw new CliConfigError(`unknown flag --${name}`);
      }
    } else if (raw.text === undefined) {
      raw.text = arg;
    } else {
      throw new CliConfigError(`unexpected argument "${arg}"`);
    }
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) throw new CliConfigError(formatIssues(result.error));
  return result.data;
}

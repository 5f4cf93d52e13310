import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

import { ENCODING, normalizeEncoding } from '../domain/encoding';
import type { Encoding } from '../domain/encoding';
import { InvalidOptionError, errorMessage } from '../domain/errors';

export type ToolkitConfig = {
  tempDirectory: string;
  logLevel: string;
  defaultEncoding: Encoding;
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const configSchema = z.object({
  FS_TOOLKIT_TMPDIR: z
    .string()
    .min(1)
    .optional()
    .transform((value) => path.resolve(value ?? os.tmpdir())),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FS_TOOLKIT_ENCODING: z
    .string()
    .default(ENCODING.UTF8)
    .transform((label, context): Encoding => {
      try {
        return normalizeEncoding(label);
      } catch (error) {
        context.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
        return z.NEVER;
      }
    }),
});

/**
 * Read toolkit settings from the environment. Callers load this once at
 * startup and pass it on explicitly.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ToolkitConfig => {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidOptionError(`Invalid configuration: ${details}`);
  }

  return {
    tempDirectory: parsed.data.FS_TOOLKIT_TMPDIR,
    logLevel: parsed.data.LOG_LEVEL,
    defaultEncoding: parsed.data.FS_TOOLKIT_ENCODING,
  };
};

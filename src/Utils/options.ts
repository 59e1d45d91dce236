import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { logError, logInfo } from './logger';
import { optionsSchema, protocolSchema, qosSchema } from './options.schema';

export type ServiceOptions = z.infer<typeof optionsSchema>;
export type Protocol = z.infer<typeof protocolSchema>;
export type QoS = z.infer<typeof qosSchema>;

export const DEFAULT_OPTIONS_PATH = 'options.json';

/** Validates raw options, filling in defaults. Throws a ZodError on invalid input. */
export const parseOptions = (raw: unknown): ServiceOptions => optionsSchema.parse(raw);

/**
 * Reads and validates the options file. A missing file yields the defaults.
 * Validation issues are logged one per line before the error is rethrown.
 */
export const loadOptions = (path: string = process.env.OPTIONS_PATH || DEFAULT_OPTIONS_PATH): ServiceOptions => {
  if (!existsSync(path)) {
    logInfo(`[Options] ${path} not found, using defaults`);
    return parseOptions({});
  }

  try {
    const fileContents = readFileSync(path);
    return parseOptions(JSON.parse(fileContents.toString()));
  } catch (error) {
    if (error instanceof z.ZodError) {
      logError(`Error validating ${path}:`);
      for (const issue of error.issues) {
        logError(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
    } else {
      logError(`Error reading or parsing ${path}:`, error);
    }
    throw error;
  }
};

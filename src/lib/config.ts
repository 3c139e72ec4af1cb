/**
 * Run configuration (config.json)
 */

import { z } from 'zod';
import type { Config } from '../types';
import { TranscriptError, errorMessage } from './errors';
import { readTextFile } from './fs';

export const DEFAULT_CONFIG_PATH = 'config.json';

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((value) => value || undefined);

const configSchema = z
  .object({
    video_url: optionalText,
    video_id: optionalText,
  })
  .refine((config) => Boolean(config.video_url || config.video_id), {
    message: 'either "video_url" or "video_id" must be set',
  });

/**
 * Validate an already-decoded config value
 */
export function parseConfig(value: unknown, source = DEFAULT_CONFIG_PATH): Config {
  const result = configSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new TranscriptError('InvalidConfig', 'config', `Invalid config in ${source}: ${details}`, {
      input: source,
    });
  }
  return result.data;
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfig(path = DEFAULT_CONFIG_PATH): Promise<Config> {
  let text: string;
  try {
    text = await readTextFile(path);
  } catch (error) {
    throw new TranscriptError('InvalidConfig', 'config', `Failed to read ${path}`, { input: path, cause: error });
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new TranscriptError('InvalidConfig', 'config', `${path} is not valid JSON: ${errorMessage(error)}`, {
      input: path,
    });
  }

  return parseConfig(value, path);
}

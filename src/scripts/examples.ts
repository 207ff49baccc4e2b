import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';

/** One natural-language command and the host script it should produce */
export const ScriptExampleSchema = z.object({
  voice: z.string().min(1),
  lua: z.string().min(1),
});

export type ScriptExample = z.infer<typeof ScriptExampleSchema>;

export const DEFAULT_EXAMPLES: ScriptExample[] = [
  {
    voice: 'Show me the sun',
    lua: [
      '-- Focus the camera on the Sun',
      'openspace.navigation.setNavigationState({',
      '  Anchor = "Sun",',
      '  Position = { 0, 0, 50000000000 },',
      '  Up = { 0, 1, 0 }',
      '})',
    ].join('\n'),
  },
];

const EXAMPLE_EXTENSIONS = new Set(['.json', '.lua']);

/**
 * Load example pairs from a directory. Each .json or .lua file holds a JSON
 * object `{ "voice": ..., "lua": ... }`; anything else is skipped with a
 * warning. Falls back to DEFAULT_EXAMPLES when nothing usable is found.
 */
export async function loadExamples(dir?: string): Promise<ScriptExample[]> {
  const logger = getLogger();
  if (!dir) return DEFAULT_EXAMPLES;

  let entries: string[];
  try {
    entries = (await readdir(dir)).filter(name => EXAMPLE_EXTENSIONS.has(extname(name))).sort();
  } catch (err) {
    logger.warn({ dir, error: toError(err).message }, 'Cannot read examples directory');
    return DEFAULT_EXAMPLES;
  }

  const examples: ScriptExample[] = [];
  for (const name of entries) {
    const path = join(dir, name);
    try {
      const result = ScriptExampleSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
      if (result.success) {
        examples.push(result.data);
      } else {
        logger.warn({ path }, 'Skipping example: expected { voice, lua }');
      }
    } catch (err) {
      logger.warn({ path, error: toError(err).message }, 'Skipping unreadable example');
    }
  }

  if (examples.length === 0) {
    logger.warn({ dir }, 'No example commands found, using default example');
    return DEFAULT_EXAMPLES;
  }
  return examples;
}

import type { ScriptExample } from './examples.js';

export const SYSTEM_PROMPT = `You convert spoken navigation commands for a 3D astronomy visualization into Lua scripts the application can execute.

You receive the transcribed text of a voice command and answer with Lua code only.

When reading a command, look for:
- target celestial objects
- navigation actions (zoom, rotate, focus)
- timing and transition details
- extra parameters such as speed, distance or orientation

CONSTRAINTS:
- Only use functions and methods that appear in the examples
- Keep the naming conventions of the examples
- Preserve any timing or transition parameters given in the command
- Handle unrecognized commands or objects with a Lua comment explaining why nothing was done
- Output ONLY Lua code, with no markdown fences
- Do not end lines with semicolons; separate table entries with commas
- Explain the code with comments starting with --`;

export function formatExamples(examples: ScriptExample[]): string {
  const blocks = examples.map(example => `\nVoice Command: ${example.voice}\nLua Script:\n${example.lua}\n`);
  return `EXAMPLES:\n${blocks.join('')}`;
}

/**
 * Strip markdown fences, normalize line endings, trim trailing whitespace on
 * each line and drop blank lines at either end.
 */
export function cleanScript(script: string): string {
  const lines = script
    .replace(/```lua/g, '')
    .replace(/```/g, '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trimEnd());

  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;

  return lines.slice(start, end).join('\n');
}

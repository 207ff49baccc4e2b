export { ScriptGenerator, formatTimestamp, scriptFileName, type ChatClient, type GeneratedScript, type ScriptGeneratorOptions } from './script-generator.js';
export { loadExamples, DEFAULT_EXAMPLES, ScriptExampleSchema, type ScriptExample } from './examples.js';
export { SYSTEM_PROMPT, formatExamples, cleanScript } from './prompt.js';

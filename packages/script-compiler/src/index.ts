// Compiler
export { compile, collectPreambles, DEFAULT_DESCRIPTION } from './compiler.js';
export type { CompileOptions, CompiledScript } from './compiler.js';

// Templates
export { TemplateLibrary, createTemplateLibrary, placeholdersOf } from './library.js';
export type { ScriptTemplate, ScriptFragment, SlotSpec } from './library.js';
export { BUILTIN_TEMPLATES } from './templates.js';
export { PREAMBLES, isPreambleId } from './preambles.js';
export type { PreambleId } from './preambles.js';

// Python literals
export { pythonFloat, pythonInt, pythonString } from './python.js';

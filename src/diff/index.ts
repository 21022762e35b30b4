export { DiffEngine, applyLineEdits, splitLines, type DiffResult, type DiffEngineOptions } from './diff-engine.js';

/**
 * Structural analysis exports.
 */
export * from './types.js';
export * from './analyzer.js';
export { createPythonParser, extractPythonStructure, PythonStructureAdapter } from './tree-sitter/python-ast.js';

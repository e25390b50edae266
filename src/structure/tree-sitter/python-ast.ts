/**
 * Python structure extraction using tree-sitter.
 * Collects class method counts and function parameter counts.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import type { ClassShape, FileStructure, FunctionShape, StructureAdapter } from '../types.js';
import {
  createContext,
  findNodesOfType,
  getNodeText,
  getParentOfType,
  getStartLine,
  hasSyntaxErrors,
  type TreeSitterContext,
} from './TreeSitterUtils.js';

/** Python tree-sitter node types for definitions */
const PyDefinitionNodes = {
  CLASS_DEFINITION: 'class_definition',
  FUNCTION_DEFINITION: 'function_definition',
  DECORATED_DEFINITION: 'decorated_definition',
} as const;

/** Python tree-sitter node types for parameters */
const PyParameterNodes = {
  IDENTIFIER: 'identifier',
  TYPED_PARAMETER: 'typed_parameter',
  DEFAULT_PARAMETER: 'default_parameter',
  TYPED_DEFAULT_PARAMETER: 'typed_default_parameter',
  LIST_SPLAT_PATTERN: 'list_splat_pattern',
  DICTIONARY_SPLAT_PATTERN: 'dictionary_splat_pattern',
  KEYWORD_SEPARATOR: 'keyword_separator',
} as const;

const SCOPE_TYPES = [PyDefinitionNodes.CLASS_DEFINITION, PyDefinitionNodes.FUNCTION_DEFINITION];

/** Implicit receivers, skipped when they lead a method's parameter list */
const RECEIVER_NAMES = new Set(['self', 'cls']);

/**
 * Creates a Python parser instance.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python);
  return parser;
}

/**
 * Extracts class and function shapes from Python source.
 * Returns null if the source has syntax errors or the parser fails.
 */
export function extractPythonStructure(
  parser: Parser,
  sourceCode: string
): FileStructure | null {
  let ctx: TreeSitterContext;
  try {
    ctx = createContext(parser, sourceCode);
  } catch {
    return null;
  }

  const root = ctx.tree.rootNode;
  if (hasSyntaxErrors(root)) return null;

  return {
    classes: extractClasses(root, ctx),
    functions: extractFunctions(root, ctx),
  };
}

function extractClasses(root: Parser.SyntaxNode, ctx: TreeSitterContext): ClassShape[] {
  return findNodesOfType(root, [PyDefinitionNodes.CLASS_DEFINITION]).map((node) => {
    const nameNode = node.childForFieldName('name');
    return {
      name: nameNode ? getNodeText(nameNode, ctx.sourceCode) : '<anonymous>',
      line: getStartLine(node),
      methodCount: countMethods(node),
    };
  });
}

function countMethods(classNode: Parser.SyntaxNode): number {
  const bodyNode = classNode.childForFieldName('body');
  if (!bodyNode) return 0;

  let count = 0;
  for (const child of bodyNode.children) {
    if (child.type === PyDefinitionNodes.FUNCTION_DEFINITION) {
      count++;
    } else if (
      child.type === PyDefinitionNodes.DECORATED_DEFINITION &&
      child.children.some((c) => c.type === PyDefinitionNodes.FUNCTION_DEFINITION)
    ) {
      count++;
    }
  }
  return count;
}

function extractFunctions(root: Parser.SyntaxNode, ctx: TreeSitterContext): FunctionShape[] {
  return findNodesOfType(root, [PyDefinitionNodes.FUNCTION_DEFINITION]).map((node) => {
    const nameNode = node.childForFieldName('name');
    const isMethod = getParentOfType(node, SCOPE_TYPES)?.type === PyDefinitionNodes.CLASS_DEFINITION;
    const paramsNode = node.childForFieldName('parameters');
    return {
      name: nameNode ? getNodeText(nameNode, ctx.sourceCode) : '<anonymous>',
      line: getStartLine(node),
      parameterCount: paramsNode ? countPositionalParameters(paramsNode, isMethod, ctx) : 0,
      isMethod,
    };
  });
}

/**
 * Positional parameters stop at `*`, `*args` or `**kwargs`;
 * a leading self/cls of a method is not counted.
 */
function countPositionalParameters(
  paramsNode: Parser.SyntaxNode,
  isMethod: boolean,
  ctx: TreeSitterContext
): number {
  let count = 0;
  let position = 0;

  for (const param of paramsNode.namedChildren) {
    const target = param.type === PyParameterNodes.TYPED_PARAMETER
      ? (param.namedChildren[0] ?? param)
      : param;

    if (
      target.type === PyParameterNodes.LIST_SPLAT_PATTERN ||
      target.type === PyParameterNodes.DICTIONARY_SPLAT_PATTERN ||
      target.type === PyParameterNodes.KEYWORD_SEPARATOR
    ) {
      break;
    }

    let name: string | null = null;
    if (target.type === PyParameterNodes.IDENTIFIER) {
      name = getNodeText(target, ctx.sourceCode);
    } else if (
      target.type === PyParameterNodes.DEFAULT_PARAMETER ||
      target.type === PyParameterNodes.TYPED_DEFAULT_PARAMETER
    ) {
      const nameNode = target.childForFieldName('name');
      name = nameNode ? getNodeText(nameNode, ctx.sourceCode) : null;
    }
    if (name === null) continue;

    if (!(isMethod && position === 0 && RECEIVER_NAMES.has(name))) {
      count++;
    }
    position++;
  }

  return count;
}

/**
 * Structure adapter for Python, backed by one parser instance.
 */
export class PythonStructureAdapter implements StructureAdapter {
  readonly language = 'python';
  readonly extensions = ['.py', '.pyi'];
  private readonly parser: Parser;

  constructor(parser: Parser = createPythonParser()) {
    this.parser = parser;
  }

  extract(sourceCode: string): FileStructure | null {
    return extractPythonStructure(this.parser, sourceCode);
  }
}

/**
 * Structural analysis types.
 */

/** Shape of a class declaration. */
export interface ClassShape {
  name: string;
  /** 1-based declaration line */
  line: number;
  methodCount: number;
}

/** Shape of a function or method declaration. */
export interface FunctionShape {
  name: string;
  /** 1-based declaration line */
  line: number;
  /** Positional parameters, receiver excluded */
  parameterCount: number;
  isMethod: boolean;
}

/** What structural checks need from a parsed file. */
export interface FileStructure {
  classes: ClassShape[];
  functions: FunctionShape[];
}

/**
 * Turns source text of one language into a FileStructure.
 * Returns null when the source does not parse.
 */
export interface StructureAdapter {
  readonly language: string;
  readonly extensions: readonly string[];
  extract(sourceCode: string): FileStructure | null;
}

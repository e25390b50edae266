/**
 * Tests for Python structure extraction.
 */
import { describe, it, expect } from 'vitest';
import {
  createPythonParser,
  extractPythonStructure,
  PythonStructureAdapter,
} from '../../../../src/structure/tree-sitter/python-ast.js';

const parser = createPythonParser();

function extract(source: string) {
  const structure = extractPythonStructure(parser, source);
  if (!structure) throw new Error('Expected source to parse');
  return structure;
}

describe('extractPythonStructure', () => {
  it('should count plain and decorated methods', () => {
    const source = [
      'class Service:',
      '    """Docs."""',
      '    limit = 3',
      '',
      '    def start(self):',
      '        pass',
      '',
      '    @staticmethod',
      '    def build():',
      '        pass',
      '',
      '    @property',
      '    def name(self):',
      '        return "svc"',
    ].join('\n');

    expect(extract(source).classes).toEqual([{ name: 'Service', line: 1, methodCount: 3 }]);
  });

  it('should not count methods of nested classes', () => {
    const source = [
      'class Outer:',
      '    def a(self):',
      '        pass',
      '',
      '    class Inner:',
      '        def b(self):',
      '            pass',
      '',
      '        def c(self):',
      '            pass',
    ].join('\n');

    expect(extract(source).classes).toEqual([
      { name: 'Outer', line: 1, methodCount: 1 },
      { name: 'Inner', line: 5, methodCount: 2 },
    ]);
  });

  it('should count positional parameters up to a splat', () => {
    const source = 'def f(self, a, b=1, *args, c, **kwargs):\n    pass\n';

    expect(extract(source).functions).toEqual([
      { name: 'f', line: 1, parameterCount: 3, isMethod: false },
    ]);
  });

  it('should skip the receiver of methods', () => {
    const source = [
      'class Repo:',
      '    def save(self, entity: dict, commit: bool = True, *, retries):',
      '        pass',
      '',
      '    @classmethod',
      '    def load(cls, key):',
      '        pass',
    ].join('\n');

    expect(extract(source).functions).toEqual([
      { name: 'save', line: 2, parameterCount: 2, isMethod: true },
      { name: 'load', line: 6, parameterCount: 1, isMethod: true },
    ]);
  });

  it('should treat functions nested in methods as functions', () => {
    const source = [
      'class Job:',
      '    def run(self):',
      '        def step(self, x):',
      '            return x',
      '        return step',
    ].join('\n');

    expect(extract(source).functions.map((f) => [f.name, f.isMethod, f.parameterCount])).toEqual([
      ['run', true, 0],
      ['step', false, 2],
    ]);
  });

  it('should return null for source with syntax errors', () => {
    expect(extractPythonStructure(parser, 'def broken(:\n    pass')).toBeNull();
    expect(extractPythonStructure(parser, 'class Missing\n    pass')).toBeNull();
  });

  it('should handle empty source', () => {
    expect(extract('')).toEqual({ classes: [], functions: [] });
  });

  it('should handle sources larger than the default parser buffer', () => {
    const body = Array.from({ length: 3000 }, (_, i) => `value_${i} = ${i}`).join('\n');

    expect(extract(`${body}\ndef last(a):\n    return a\n`).functions).toEqual([
      { name: 'last', line: 3001, parameterCount: 1, isMethod: false },
    ]);
  });
});

describe('PythonStructureAdapter', () => {
  it('should describe the language it handles', () => {
    const adapter = new PythonStructureAdapter(parser);

    expect(adapter.language).toBe('python');
    expect(adapter.extensions).toEqual(['.py', '.pyi']);
    expect(adapter.extract('class A:\n    pass\n')?.classes).toEqual([{ name: 'A', line: 1, methodCount: 0 }]);
  });
});

/**
 * Tests for structural analysis.
 */
import { describe, it, expect } from 'vitest';
import {
  StructuralAnalyzer,
  STRUCTURAL_CONFIDENCE,
} from '../../../src/structure/analyzer.js';
import type { FileStructure, StructureAdapter } from '../../../src/structure/types.js';
import { pythonClassWithMethods } from '../../helpers/matches.js';

class FixedAdapter implements StructureAdapter {
  readonly language = 'fixture';
  readonly extensions = ['.fx'];

  constructor(private readonly result: FileStructure | null | Error) {}

  extract(): FileStructure | null {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

const analyzer = new StructuralAnalyzer();

describe('StructuralAnalyzer', () => {
  describe('god classes', () => {
    it.each([16, 18, 20])('should flag a class with %i methods once', (count) => {
      const matches = analyzer.analyzeStructure(pythonClassWithMethods('Registry', count), 'registry.py');

      expect(matches).toHaveLength(1);
      expect(matches[0]).toMatchObject({
        patternType: 'anti',
        patternName: 'god_class',
        severity: 'high',
        lineNumber: 1,
        description: `God class with ${count} methods`,
        confidence: STRUCTURAL_CONFIDENCE,
      });
    });

    it('should not flag fifteen methods', () => {
      expect(analyzer.analyzeStructure(pythonClassWithMethods('Registry', 15), 'registry.py')).toEqual([]);
    });

    it('should report the class declaration line', () => {
      const source = 'import os\n\n' + pythonClassWithMethods('Registry', 16);

      expect(analyzer.analyzeStructure(source, 'registry.py').map((m) => m.lineNumber)).toEqual([3]);
    });
  });

  describe('long parameter lists', () => {
    it('should flag more than five positional parameters', () => {
      const matches = analyzer.analyzeStructure(
        'def connect(host, port, user, password, database, timeout, retries):\n    pass\n',
        'db.py'
      );

      expect(matches).toEqual([
        {
          patternType: 'anti',
          patternName: 'long_parameter_list',
          severity: 'medium',
          description: 'Function with 7 parameters',
          lineNumber: 1,
          context: 'def connect(...)',
          confidence: 0.9,
          isLanguageFeature: false,
        },
      ]);
    });

    it('should not count self or keyword-only parameters', () => {
      const source = [
        'class Client:',
        '    def send(self, a, b, c, d, e, *, f, g):',
        '        pass',
      ].join('\n');

      expect(analyzer.analyzeStructure(source, 'client.py')).toEqual([]);
    });

    it('should order matches by line', () => {
      const source = [
        'def late(a, b, c, d, e, f):',
        '    pass',
        '',
        pythonClassWithMethods('Early', 16),
      ].join('\n');

      expect(analyzer.analyzeStructure(source, 'mixed.py').map((m) => [m.patternName, m.lineNumber])).toEqual([
        ['long_parameter_list', 1],
        ['god_class', 4],
      ]);
    });
  });

  describe('adapter resolution', () => {
    const shape: FileStructure = {
      classes: [{ name: 'Huge', line: 7, methodCount: 40 }],
      functions: [],
    };

    it('should support python by default', () => {
      expect(analyzer.supports('python')).toBe(true);
      expect(analyzer.supports('java')).toBe(false);
      expect(analyzer.supportedLanguages).toEqual(['python']);
    });

    it('should return nothing for an unsupported language', () => {
      expect(analyzer.analyzeStructure(pythonClassWithMethods('Registry', 16), 'registry.rb', 'ruby')).toEqual([]);
    });

    it('should pick the adapter by extension when no language is given', () => {
      const custom = new StructuralAnalyzer({ adapters: [new FixedAdapter(shape)] });

      expect(custom.analyzeStructure('', 'huge.fx').map((m) => m.lineNumber)).toEqual([7]);
    });

    it('should fall back to the default language for unknown extensions', () => {
      const custom = new StructuralAnalyzer({
        adapters: [new FixedAdapter(shape)],
        defaultLanguage: 'fixture',
      });

      expect(custom.analyzeStructure('', 'huge.txt')).toHaveLength(1);
    });

    it('should not throw when an adapter fails', () => {
      const custom = new StructuralAnalyzer({ adapters: [new FixedAdapter(new Error('parser crashed'))] });

      expect(custom.analyzeStructure('', 'huge.fx', 'fixture')).toEqual([]);
    });

    it('should return nothing when the adapter reports syntax errors', () => {
      const custom = new StructuralAnalyzer({ adapters: [new FixedAdapter(null)] });

      expect(custom.analyzeStructure('', 'huge.fx', 'fixture')).toEqual([]);
    });
  });

  describe('measureStructure', () => {
    it('should tell unmeasured source from clean source', () => {
      const failing = new StructuralAnalyzer({ adapters: [new FixedAdapter(null)] });
      const clean = new StructuralAnalyzer({ adapters: [new FixedAdapter({ classes: [], functions: [] })] });

      expect(failing.measureStructure('', 'a.fx', 'fixture')).toBeNull();
      expect(clean.measureStructure('', 'a.fx', 'fixture')).toEqual([]);
      expect(clean.measureStructure('', 'a.go', 'go')).toBeNull();
    });
  });

  describe('thresholds', () => {
    it('should take custom thresholds', () => {
      const strict = new StructuralAnalyzer({ godClassMethodThreshold: 2, longParameterThreshold: 1 });
      const source = pythonClassWithMethods('Small', 3) + 'def pair(a, b):\n    pass\n';

      expect(strict.analyzeStructure(source, 'small.py').map((m) => m.description)).toEqual([
        'God class with 3 methods',
        'Function with 2 parameters',
      ]);
    });
  });

  it('should return nothing for malformed source', () => {
    expect(analyzer.analyzeStructure('def broken(:\n    pass', 'broken.py')).toEqual([]);
  });
});

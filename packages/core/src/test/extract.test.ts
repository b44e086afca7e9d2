/**
 * Unit extraction tests — covers merge/extract.ts against the real
 * TypeScript grammar.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { ParseFailure } from '../merge/errors.js';
import { extractSnapshot } from '../merge/index.js';
import { loadAstGrep, type AstGrepModule } from '../merge/parser.js';
import { hashUnitText } from '../merge/shared.js';

let astGrep: AstGrepModule;

beforeAll(async () => {
  astGrep = await loadAstGrep();
});

const SOURCE = [
  "import { a } from './a';",
  'import b from "./b";',
  '',
  '// Adds one.',
  'export function inc(x: number): number {',
  '  return x + 1;',
  '}',
  '',
  'const LIMIT = 10; // upper bound',
  '',
  'class Box {}',
  '',
  'interface Shape { size: number }',
  '',
  'console.log(LIMIT);',
  '',
].join('\n');

describe('extractUnits', () => {
  it('keys top-level units by kind and name, in source order', () => {
    const { units } = extractSnapshot(astGrep, SOURCE, 'src/shapes.ts', 'base');
    expect(units.map(u => u.key)).toEqual([
      'import:./a',
      'import:./b',
      'function:inc',
      'variable:LIMIT',
      'class:Box',
      'type:Shape',
      'anonymous-at-position-0',
    ]);
    expect(units.map(u => u.kind)).toEqual(['import', 'import', 'function', 'variable', 'class', 'type', 'statement']);
  });

  it('folds a leading comment and a same-line trailing comment into the unit', () => {
    const { units } = extractSnapshot(astGrep, SOURCE, 'src/shapes.ts', 'base');
    const inc = units.find(u => u.key === 'function:inc');
    const limit = units.find(u => u.key === 'variable:LIMIT');

    expect(inc?.text).toBe('// Adds one.\nexport function inc(x: number): number {\n  return x + 1;\n}');
    expect(limit?.text).toBe('const LIMIT = 10; // upper bound');
  });

  it('records ranges that slice the unit text out of the source', () => {
    const { units } = extractSnapshot(astGrep, SOURCE, 'src/shapes.ts', 'base');
    for (const unit of units) {
      expect(SOURCE.slice(unit.start, unit.end)).toBe(unit.text);
      expect(unit.hash).toBe(hashUnitText(unit.text));
    }
  });

  it('marks positional keys as ambiguous', () => {
    const { units } = extractSnapshot(astGrep, SOURCE, 'src/shapes.ts', 'base');
    expect(units.filter(u => u.ambiguous).map(u => u.key)).toEqual(['anonymous-at-position-0']);
  });

  it('keeps the first parameter and identifier occurrences of named functions', () => {
    const { units } = extractSnapshot(astGrep, SOURCE, 'src/shapes.ts', 'base');
    const inc = units.find(u => u.key === 'function:inc');

    expect(inc?.signature?.firstParam).toEqual({ name: 'x', start: 33, end: 34 });
    expect(inc?.signature?.identifiers.map(o => o.name)).toEqual(['inc', 'x', 'x']);
  });

  it('suffixes repeated keys', () => {
    const source = [
      'function pick(a: string): string;',
      'function pick(a: number): number;',
      'function pick(a: any): any {',
      '  return a;',
      '}',
      '',
    ].join('\n');
    const { units } = extractSnapshot(astGrep, source, 'src/pick.ts', 'a');
    expect(units.map(u => u.key)).toEqual(['function:pick', 'function:pick#2', 'function:pick#3']);
  });

  it('keeps a comment separated by a blank line as its own unit', () => {
    const { units } = extractSnapshot(astGrep, '// header\n\nconst a = 1;\n', 'src/a.ts', 'b');
    expect(units.map(u => [u.key, u.text])).toEqual([
      ['anonymous-at-position-0', '// header'],
      ['variable:a', 'const a = 1;'],
    ]);
  });

  it('returns no units for an empty source', () => {
    expect(extractSnapshot(astGrep, '  \n', 'src/empty.ts', 'base').units).toEqual([]);
  });

  it('throws ParseFailure for an unclosed block', () => {
    expect(() => extractSnapshot(astGrep, 'function f() {\n  return 1;\n', 'src/f.ts', 'base')).toThrow(ParseFailure);
  });

  it('throws ParseFailure for an unclosed call', () => {
    expect(() => extractSnapshot(astGrep, 'const b = f(1;\n', 'src/f.ts', 'b')).toThrow(ParseFailure);
  });

  it('throws ParseFailure naming the snapshot', () => {
    expect(() => extractSnapshot(astGrep, 'const = = = ;\n}}}', 'src/broken.ts', 'a')).toThrow(ParseFailure);
    expect(() => extractSnapshot(astGrep, 'const = = = ;\n}}}', 'src/broken.ts', 'a'))
      .toThrow(/^Failed to parse a version of src\/broken\.ts/);
  });
});

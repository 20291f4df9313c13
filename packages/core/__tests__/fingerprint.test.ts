import { beforeAll, describe, expect, it } from 'vitest';
import { fingerprintSymbol } from '../src/fingerprint/fingerprint.js';
import { loadPythonParser, type PythonParser } from '../src/parser/python-parser.js';

let parser: PythonParser;

beforeAll(async () => {
  parser = await loadPythonParser();
});

function fp(source: string, name: string): string | null {
  return fingerprintSymbol(source, name, parser);
}

function lines(...rows: string[]): string {
  return rows.join('\n') + '\n';
}

const BASE = lines(
  'def total(items, scale=1):',
  '    acc = 0',
  '    for item in items:',
  '        acc += item * scale',
  '    return compute(acc, scale)',
);

describe('fingerprintSymbol', () => {
  // ── Invariance ──────────────────────────────────────────────────────────

  describe('unchanged structure', () => {
    it('should return a 64-character hex digest', () => {
      expect(fp(BASE, 'total')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should ignore comments', () => {
      const commented = lines(
        'def total(items, scale=1):  # sums things',
        '    # start at zero',
        '    acc = 0',
        '    for item in items:',
        '        acc += item * scale  # weighted',
        '    return compute(acc, scale)',
      );
      expect(fp(commented, 'total')).toBe(fp(BASE, 'total'));
    });

    it('should ignore line breaks and trailing commas inside brackets', () => {
      const reformatted = lines(
        'def total(',
        '    items,',
        '    scale=1,',
        '):',
        '    acc = 0',
        '    for item in items:',
        '        acc += item * scale',
        '    return compute(',
        '        acc,',
        '        scale,',
        '    )',
      );
      expect(fp(reformatted, 'total')).toBe(fp(BASE, 'total'));
    });

    it('should ignore redundant parentheses', () => {
      const wrapped = BASE.replace('acc += item * scale', 'acc += (item * scale)');
      expect(fp(wrapped, 'total')).toBe(fp(BASE, 'total'));
    });

    it('should ignore adding or editing a docstring', () => {
      const documented = lines(
        'def total(items, scale=1):',
        '    """Weighted sum of items."""',
        '    acc = 0',
        '    for item in items:',
        '        acc += item * scale',
        '    return compute(acc, scale)',
      );
      const reworded = documented.replace('Weighted sum of items.', 'Sum, weighted.');
      expect(fp(documented, 'total')).toBe(fp(BASE, 'total'));
      expect(fp(reworded, 'total')).toBe(fp(BASE, 'total'));
    });

    it('should ignore renaming local variables', () => {
      const renamed = lines(
        'def total(items, scale=1):',
        '    running = 0',
        '    for value in items:',
        '        running += value * scale',
        '    return compute(running, scale)',
      );
      expect(fp(renamed, 'total')).toBe(fp(BASE, 'total'));
    });

    it('should ignore quote style of string literals', () => {
      const single = lines('def greet():', "    return 'hello'");
      const double = lines('def greet():', '    return "hello"');
      expect(fp(single, 'greet')).toBe(fp(double, 'greet'));
    });

    it('should not depend on surrounding definitions or position in the file', () => {
      const moved = lines('import os', '', '', 'def helper():', '    pass', '', '') + BASE;
      expect(fp(moved, 'total')).toBe(fp(BASE, 'total'));
    });
  });

  // ── Sensitivity ─────────────────────────────────────────────────────────

  describe('changed structure', () => {
    it('should change when a parameter is added', () => {
      const changed = BASE.replace('def total(items, scale=1):', 'def total(items, scale=1, offset=0):');
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when a parameter is renamed', () => {
      const changed = BASE.replace(/scale/g, 'factor');
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when a default value changes', () => {
      const changed = BASE.replace('scale=1', 'scale=2');
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when control flow changes', () => {
      const changed = lines(
        'def total(items, scale=1):',
        '    acc = 0',
        '    for item in items:',
        '        if item:',
        '            acc += item * scale',
        '    return compute(acc, scale)',
      );
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when an operator changes', () => {
      const changed = BASE.replace('acc += item * scale', 'acc -= item * scale');
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when a called function changes', () => {
      const changed = BASE.replace('compute(', 'combine(');
      expect(fp(changed, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should change when an attribute name changes', () => {
      const a = lines('def read(conn):', '    return conn.fetch_one()');
      const b = lines('def read(conn):', '    return conn.fetch_all()');
      expect(fp(a, 'read')).not.toBe(fp(b, 'read'));
    });

    it('should change when a keyword argument name changes', () => {
      const a = lines('def build():', '    data = load(strict=True)', '    return data');
      const b = lines('def build():', '    data = load(lenient=True)', '    return data');
      expect(fp(a, 'build')).not.toBe(fp(b, 'build'));
    });

    it('should change when a decorator is added', () => {
      const decorated = '@cached\n' + BASE;
      expect(fp(decorated, 'total')).not.toBe(fp(BASE, 'total'));
    });

    it('should distinguish slices that differ only in their colons', () => {
      const a = lines('def head(xs):', '    return xs[:2]');
      const b = lines('def head(xs):', '    return xs[2:]');
      expect(fp(a, 'head')).not.toBe(fp(b, 'head'));
    });
  });

  // ── Lookup ──────────────────────────────────────────────────────────────

  describe('symbol lookup', () => {
    const source = lines(
      'LIMIT = 10',
      '',
      'class Cart:',
      '    """Shopping cart."""',
      '',
      '    def add(self, item):',
      '        self.items.append(item)',
      '',
      '    def clear(self):',
      '        self.items = []',
    );

    it('should fingerprint methods by Class.method', () => {
      const add = fp(source, 'Cart.add');
      expect(add).toMatch(/^[0-9a-f]{64}$/);
      expect(add).not.toBe(fp(source, 'Cart.clear'));
    });

    it('should change the class fingerprint when a method body changes', () => {
      const changed = source.replace('self.items = []', 'self.items = None');
      expect(fp(changed, 'Cart')).not.toBe(fp(source, 'Cart'));
      expect(fp(changed, 'Cart.add')).toBe(fp(source, 'Cart.add'));
    });

    it('should fingerprint constants from their assignment', () => {
      const changed = source.replace('LIMIT = 10', 'LIMIT = 20');
      expect(fp(source, 'LIMIT')).toMatch(/^[0-9a-f]{64}$/);
      expect(fp(changed, 'LIMIT')).not.toBe(fp(source, 'LIMIT'));
    });

    it('should return null for names that are not defined', () => {
      expect(fp(source, 'missing')).toBeNull();
      expect(fp(source, 'Cart.missing')).toBeNull();
    });

    it('should return null for sources with syntax errors', () => {
      expect(fp('def broken(:\n    pass\n', 'broken')).toBeNull();
    });
  });
});

import { afterEach, describe, expect, it } from 'vitest';
import {
  classifyInlineCode,
  extractAllReferences,
  extractReferences,
  isInternalModule,
} from '../src/refs/reference-extractor.js';
import { findDocSection, scanMarkdown } from '../src/refs/markdown.js';
import type { Logger } from '../src/logger.js';
import { createProject, removeProject, SHOP_PROJECT } from './helpers/project.js';

const KNOWN = new Set(['charge', 'Order', 'Order.summary', 'MAX_ITEMS']);

// ── classifyInlineCode ──────────────────────────────────────────────────────

describe('classifyInlineCode', () => {
  it('should classify internal file paths as file refs', () => {
    expect(classifyInlineCode('app/services/billing.py', KNOWN)).toBe('file');
    expect(classifyInlineCode('docs/setup.md', KNOWN)).toBe('file');
    expect(classifyInlineCode('scripts/deploy.sh', KNOWN)).toBe('file');
  });

  it('should ignore file paths outside the internal roots', () => {
    expect(classifyInlineCode('vendor/lib.py', KNOWN)).toBeNull();
    expect(classifyInlineCode('README.md', KNOWN)).toBeNull();
  });

  it('should classify known names as symbol refs', () => {
    expect(classifyInlineCode('charge', KNOWN)).toBe('symbol');
    expect(classifyInlineCode('charge()', KNOWN)).toBe('symbol');
    expect(classifyInlineCode('Order.summary', KNOWN)).toBe('symbol');
    expect(classifyInlineCode('billing.charge', KNOWN)).toBe('symbol');
  });

  it('should classify dotted names under an internal package as symbol refs', () => {
    expect(classifyInlineCode('app.services.billing.unknown_name', KNOWN)).toBe('symbol');
  });

  it('should ignore unknown names and other code', () => {
    expect(classifyInlineCode('unknown', KNOWN)).toBeNull();
    expect(classifyInlineCode('os.path', KNOWN)).toBeNull();
    expect(classifyInlineCode('npm install', KNOWN)).toBeNull();
    expect(classifyInlineCode('x = 1', KNOWN)).toBeNull();
  });
});

describe('isInternalModule', () => {
  it('should accept modules under an internal package or ending in a known symbol', () => {
    expect(isInternalModule('app.services.billing', KNOWN)).toBe(true);
    expect(isInternalModule('scripts', KNOWN)).toBe(true);
    expect(isInternalModule('vendor.Order', KNOWN)).toBe(true);
  });

  it('should reject third-party modules', () => {
    expect(isInternalModule('os.path', KNOWN)).toBe(false);
    expect(isInternalModule('requests', KNOWN)).toBe(false);
  });
});

// ── extractReferences ───────────────────────────────────────────────────────

describe('extractReferences', () => {
  it('should extract inline refs with their line numbers', () => {
    const content = [
      '# Billing',
      '',
      'Call `charge` with an `Order`, see `app/services/billing.py`.',
      'Unrelated `print` and `pip install`.',
    ].join('\n');

    expect(extractReferences(content, KNOWN)).toEqual([
      { text: 'charge', kind: 'symbol', line: 3 },
      { text: 'Order', kind: 'symbol', line: 3 },
      { text: 'app/services/billing.py', kind: 'file', line: 3 },
    ]);
  });

  it('should extract internal imports from python fences only', () => {
    const content = [
      '```python',
      'from app.services.billing import charge',
      'import os',
      '  import app.models.order',
      '`charge` inside a fence is not prose',
      '```',
      '',
      '```bash',
      'from app.services.billing import charge',
      '```',
      '',
      '```',
      'import scripts.tools.report',
      '```',
    ].join('\n');

    expect(extractReferences(content, KNOWN)).toEqual([
      { text: 'from app.services.billing import charge', kind: 'import', line: 2 },
      { text: 'import app.models.order', kind: 'import', line: 4 },
      { text: 'import scripts.tools.report', kind: 'import', line: 13 },
    ]);
  });

  it('should treat an unclosed fence as running to the end of the document', () => {
    const content = ['Before `charge`.', '```py', 'from app.x import y', 'After `charge`.'].join('\n');

    expect(extractReferences(content, KNOWN)).toEqual([
      { text: 'charge', kind: 'symbol', line: 1 },
      { text: 'from app.x import y', kind: 'import', line: 3 },
    ]);
  });

  it('should deduplicate identical refs on the same line only', () => {
    const content = ['`charge` then `charge` again', '`charge`'].join('\n');

    expect(extractReferences(content, KNOWN)).toEqual([
      { text: 'charge', kind: 'symbol', line: 1 },
      { text: 'charge', kind: 'symbol', line: 2 },
    ]);
  });

  it('should trim whitespace inside code spans', () => {
    expect(extractReferences('Use ` charge `.', KNOWN)).toEqual([
      { text: 'charge', kind: 'symbol', line: 1 },
    ]);
  });

  it('should honour a custom internal scope', () => {
    const scope = { internalRoots: ['src/'], internalPackages: ['core'] };

    expect(
      extractReferences('See `src/main.py`, `app/x.py` and `core.engine.run`.', KNOWN, scope),
    ).toEqual([
      { text: 'src/main.py', kind: 'file', line: 1 },
      { text: 'core.engine.run', kind: 'symbol', line: 1 },
    ]);
  });
});

// ── Markdown helpers ────────────────────────────────────────────────────────

describe('scanMarkdown', () => {
  it('should tag fence markers and fenced lines', () => {
    const content = ['text', '```js', 'code', '```', 'more'].join('\n');

    expect(scanMarkdown(content).map((l) => l.context)).toEqual([
      'prose',
      'fence',
      'code',
      'fence',
      'prose',
    ]);
  });
});

describe('findDocSection', () => {
  const content = [
    '# Guide', // 1
    '', // 2
    '## Billing', // 3
    'Uses `charge`.', // 4
    '```python', // 5
    '# not a heading', // 6
    'from app.x import y', // 7
    '```', // 8
    '#hashtag is not a heading', // 9
    '### Deep dive', // 10
  ].join('\n');

  it('should return the nearest heading above the line', () => {
    expect(findDocSection(content, 4)).toBe('Billing');
    expect(findDocSection(content, 1)).toBe('Guide');
    expect(findDocSection(content, 10)).toBe('Deep dive');
  });

  it('should ignore comment lines inside fences and hashtags', () => {
    expect(findDocSection(content, 7)).toBe('Billing');
    expect(findDocSection(content, 9)).toBe('Billing');
  });

  it('should return null when no heading precedes the line', () => {
    expect(findDocSection('plain text\n# Later', 1)).toBeNull();
  });
});

// ── extractAllReferences ────────────────────────────────────────────────────

describe('extractAllReferences', () => {
  let root: string | null = null;

  afterEach(async () => {
    if (root) await removeProject(root);
    root = null;
  });

  it('should extract from every doc and skip the index directory', async () => {
    root = await createProject({
      ...SHOP_PROJECT,
      'docs/empty.md': '# Nothing to see\n',
      'docs/.drafts/wip.md': 'The `charge` function.\n',
    });

    const refs = await extractAllReferences({
      root,
      docDirs: ['docs'],
      knownSymbols: new Set(['charge', 'Order']),
      indexDir: 'docs/indexes',
    });

    expect(refs.doc_count).toBe(1);
    expect(refs.ref_count).toBe(4);
    expect(refs.docs).toEqual({
      'docs/guide.md': [
        { text: 'charge', kind: 'symbol', line: 5 },
        { text: 'app/services/billing.py', kind: 'file', line: 6 },
        { text: 'Order', kind: 'symbol', line: 10 },
        { text: 'from app.services.billing import charge', kind: 'import', line: 13 },
      ],
    });
  });

  it('should skip docs that are not valid UTF-8 with a warning', async () => {
    root = await createProject({
      'docs/good.md': 'The `charge` function.\n',
      // "caf\xe9 `charge`" in Latin-1
      'docs/latin1.md': new Uint8Array([0x63, 0x61, 0x66, 0xe9, 0x20, 0x60, 0x63, 0x68, 0x61, 0x72, 0x67, 0x65, 0x60, 0x0a]),
    });
    const warnings: string[] = [];
    const logger: Logger = {
      debug() {},
      info() {},
      warn(_component, message) {
        warnings.push(message);
      },
      error() {},
    };

    const refs = await extractAllReferences({
      root,
      docDirs: ['docs'],
      knownSymbols: new Set(['charge']),
      logger,
    });

    expect(Object.keys(refs.docs)).toEqual(['docs/good.md']);
    expect(warnings).toEqual(['Skipping docs/latin1.md: not valid UTF-8']);
  });
});

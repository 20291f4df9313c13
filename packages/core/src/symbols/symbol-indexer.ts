import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { DEFAULT_SKIP_DIRS, SOURCE_EXTENSION } from '../config.js';
import { discoverFiles } from '../discovery/files.js';
import { decodeUtf8 } from '../fingerprint/hash.js';
import { createNullLogger, type Logger } from '../logger.js';
import { loadPythonParser, type PythonParser } from '../parser/python-parser.js';
import { assertNever, classifyModule, functionSignature } from '../parser/syntax.js';
import type { SymbolEntry, SymbolIndex } from '../types.js';

const COMPONENT = 'symbol-indexer';
const BATCH_SIZE = 50;

export interface BuildSymbolIndexOptions {
  root: string;
  sourceDirs: string[];
  skipDirs?: string[];
  logger?: Logger;
  parser?: PythonParser;
}

/** A named definition found in one module, before it is keyed by name. */
export interface ModuleSymbol {
  name: string;
  entry: SymbolEntry;
}

/**
 * Top-level functions, classes, direct methods (as `Class.method`) and
 * upper-case module constants of one module, in source order. Null when the
 * module has syntax errors.
 */
export function indexModule(
  file: string,
  content: string,
  parser: PythonParser,
): ModuleSymbol[] | null {
  return parser.withModule(content, (module) => {
    const found: ModuleSymbol[] = [];

    for (const statement of classifyModule(module)) {
      switch (statement.kind) {
        case 'function':
          found.push({
            name: statement.name,
            entry: {
              file,
              line: statement.node.startPosition.row + 1,
              kind: 'function',
              signature: functionSignature(statement.node),
            },
          });
          break;
        case 'class':
          found.push({
            name: statement.name,
            entry: {
              file,
              line: statement.node.startPosition.row + 1,
              kind: 'class',
              signature: `class ${statement.name}`,
            },
          });
          for (const method of statement.methods) {
            found.push({
              name: `${statement.name}.${method.name}`,
              entry: {
                file,
                line: method.node.startPosition.row + 1,
                kind: 'method',
                signature: functionSignature(method.node),
              },
            });
          }
          break;
        case 'constant':
          for (const name of statement.names) {
            found.push({
              name,
              entry: {
                file,
                line: statement.node.startPosition.row + 1,
                kind: 'constant',
                signature: name,
              },
            });
          }
          break;
        case 'other':
          break;
        default:
          assertNever(statement);
      }
    }

    return found;
  });
}

/**
 * Scan every Python source under the configured directories and map each
 * defined name to all of its definitions. Files that cannot be read, decoded
 * or parsed are skipped with a warning.
 */
export async function buildSymbolIndex(options: BuildSymbolIndexOptions): Promise<SymbolIndex> {
  const logger = options.logger ?? createNullLogger();
  const parser = options.parser ?? (await loadPythonParser());

  const files = await discoverFiles({
    root: options.root,
    dirs: options.sourceDirs,
    extension: SOURCE_EXTENSION,
    skipDirs: options.skipDirs ?? DEFAULT_SKIP_DIRS,
  });
  logger.debug(COMPONENT, 'Discovered source files', { count: files.length });

  const symbols = new Map<string, SymbolEntry[]>();

  // Reads run concurrently per batch; parsing stays sequential and in path order.
  for (let i = 0; i < files.length; i += BATCH_SIZE) {
    const batch = files.slice(i, i + BATCH_SIZE);
    const contents = await Promise.all(
      batch.map(async (file) => {
        try {
          return await readFile(resolve(options.root, file));
        } catch (error) {
          logger.warn(COMPONENT, `Skipping unreadable file ${file}`, {
            reason: error instanceof Error ? error.message : String(error),
          });
          return null;
        }
      }),
    );

    batch.forEach((file, j) => {
      const bytes = contents[j];
      if (!bytes) {
        return;
      }
      const content = decodeUtf8(bytes);
      if (content === null) {
        logger.warn(COMPONENT, `Skipping ${file}: not valid UTF-8`);
        return;
      }
      const found = indexModule(file, content, parser);
      if (found === null) {
        logger.warn(COMPONENT, `Skipping ${file}: syntax error`);
        return;
      }
      for (const { name, entry } of found) {
        const entries = symbols.get(name);
        if (entries) {
          entries.push(entry);
        } else {
          symbols.set(name, [entry]);
        }
      }
    });
  }

  let symbolCount = 0;
  // fromEntries defines own keys, so a name like `__proto__` stays a plain entry
  const sorted: Record<string, SymbolEntry[]> = Object.fromEntries(
    [...symbols.keys()].sort().map((name): [string, SymbolEntry[]] => {
      const entries = (symbols.get(name) ?? []).sort(compareEntries);
      symbolCount += entries.length;
      return [name, entries];
    }),
  );

  logger.info(COMPONENT, 'Symbol index built', {
    symbols: symbolCount,
    names: Object.keys(sorted).length,
    files: files.length,
  });

  return {
    generated: new Date().toISOString(),
    symbol_count: symbolCount,
    file_count: files.length,
    symbols: sorted,
  };
}

function compareEntries(a: SymbolEntry, b: SymbolEntry): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return a.line - b.line;
}

/** Every name with at least one definition. */
export function getKnownSymbols(index: SymbolIndex): Set<string> {
  return new Set(Object.keys(index.symbols));
}

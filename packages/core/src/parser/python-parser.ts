import { createRequire } from 'node:module';
import path from 'node:path';
import Parser from 'web-tree-sitter';
import { ParserInitError } from '../errors.js';

// Use createRequire to resolve WASM file paths from tree-sitter-wasms
const require = createRequire(import.meta.url);

const PYTHON_WASM_FILE = 'tree-sitter-python.wasm';

export type SyntaxNode = Parser.SyntaxNode;

/**
 * Python parser backed by web-tree-sitter (WASM), so no native compilation is
 * needed. Obtain the shared instance through `loadPythonParser()`.
 */
export class PythonParser {
  private readonly parser: Parser;

  private constructor(parser: Parser) {
    this.parser = parser;
  }

  static async create(): Promise<PythonParser> {
    try {
      await Parser.init();
      const parser = new Parser();
      const wasmPackagePath = require.resolve('tree-sitter-wasms/package.json');
      const wasmPath = path.join(path.dirname(wasmPackagePath), 'out', PYTHON_WASM_FILE);
      const language = await Parser.Language.load(wasmPath);
      parser.setLanguage(language);
      return new PythonParser(parser);
    } catch (error) {
      throw new ParserInitError(error);
    }
  }

  /**
   * Parse `content` and hand the module node to `visit`. Returns null without
   * calling `visit` when the source has syntax errors. The tree is released
   * before returning, so `visit` must not leak nodes.
   */
  withModule<T>(content: string, visit: (module: SyntaxNode) => T): T | null {
    const tree: Parser.Tree | null = this.parser.parse(content);
    if (!tree) {
      return null;
    }

    try {
      if (tree.rootNode.hasError) {
        return null;
      }
      return visit(tree.rootNode);
    } finally {
      tree.delete();
    }
  }
}

let shared: Promise<PythonParser> | null = null;

/**
 * Initialize web-tree-sitter and the Python grammar once per process.
 * A failed load is not cached, so a later call retries.
 */
export function loadPythonParser(): Promise<PythonParser> {
  if (!shared) {
    shared = PythonParser.create().catch((error: unknown) => {
      shared = null;
      throw error;
    });
  }
  return shared;
}

/**
 * Where a Markdown line sits relative to fenced code blocks. `fence` lines
 * open or close a block; `python` lines are inside a plain, `python` or `py`
 * fence; `code` lines are inside a fence for any other language.
 */
export type LineContext = 'prose' | 'fence' | 'python' | 'code';

export interface MarkdownLine {
  /** 1-based. */
  line: number;
  text: string;
  context: LineContext;
}

const FENCE_RE = /^\s*```/;
const PYTHON_FENCE_RE = /^\s*```(?:python|py)?\s*$/;
const HEADING_RE = /^#{1,6}(?:\s|$)/;

/** Split a document into lines tagged with their fence context. An unclosed fence runs to the end. */
export function scanMarkdown(content: string): MarkdownLine[] {
  const result: MarkdownLine[] = [];
  let open: 'python' | 'code' | null = null;

  content.split(/\r?\n/).forEach((text, i) => {
    const line = i + 1;
    if (FENCE_RE.test(text)) {
      if (open === null) {
        open = PYTHON_FENCE_RE.test(text) ? 'python' : 'code';
      } else {
        open = null;
      }
      result.push({ line, text, context: 'fence' });
      return;
    }
    result.push({ line, text, context: open ?? 'prose' });
  });

  return result;
}

/**
 * Text of the nearest heading at or above `line`, with its `#` markers
 * stripped. Headings inside fenced code blocks do not count.
 */
export function findDocSection(content: string, line: number): string | null {
  const lines = scanMarkdown(content);
  for (let i = Math.min(line, lines.length) - 1; i >= 0; i--) {
    const entry = lines[i];
    if (entry && entry.context === 'prose' && HEADING_RE.test(entry.text)) {
      return entry.text.replace(/^#+/, '').trim();
    }
  }
  return null;
}

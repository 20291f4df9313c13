import type { FixContext } from '../types.js';

/** Markdown instructions for whoever (or whatever) repairs one issue. */
export function generateFixPrompt(context: Omit<FixContext, 'prompt'>): string {
  const parts = [
    `Fix the following ${context.issue_type} reference in \`${context.doc_path}\`:`,
    '',
    `**Reference:** \`${context.ref}\` (line ${context.line})`,
    `**Issue:** ${context.reason}`,
  ];

  if (context.doc_section) {
    parts.push(`**Section:** ${context.doc_section}`);
  }

  const candidates = context.candidates ?? [];

  switch (context.issue_type) {
    case 'stale':
      if (context.current_code) {
        parts.push(
          '',
          '**Current code:**',
          '```python',
          context.current_code,
          '```',
          '',
          'Update the documentation to accurately describe the current code.',
        );
      }
      break;
    case 'broken':
      if (candidates.length > 0) {
        parts.push('', '**Possible matches:**', ...candidates.map((c) => `- \`${c}\``));
        parts.push(
          '',
          'Update the reference to point to the correct target, or remove it if no longer relevant.',
        );
      }
      break;
    case 'ambiguous':
      if (candidates.length > 0) {
        parts.push(
          '',
          '**Ambiguous - found in multiple locations:**',
          ...candidates.map((c) => `- \`${c}\``),
        );
        parts.push(
          '',
          'Qualify the reference to be unambiguous (e.g., `app.auth.services.function_name`).',
        );
      }
      break;
  }

  return parts.join('\n');
}

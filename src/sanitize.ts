const THINK_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const UNCLOSED_THINK = /<think>[\s\S]*$/i;
const STRAY_THINK_TAG = /<\/?think>/gi;
const FENCED = /^```[^\n`]*\r?\n([\s\S]*?)\r?\n?```\s*$/;
const LEADING_FENCE = /^```[^\n`]*(\r?\n|$)/;

/**
 * Removes what chat models tend to wrap around an answer: reasoning
 * `<think>` blocks and a surrounding Markdown fence. Markup that belongs to the
 * translated file itself (HTML, JSX, XML) is left alone.
 */
export function cleanModelOutput(raw: string): string {
  let text = raw
    .replace(THINK_BLOCK, '')
    .replace(UNCLOSED_THINK, '')
    .replace(STRAY_THINK_TAG, '');

  const trimmed = text.trim();
  const fenced = trimmed.match(FENCED);
  if (fenced) {
    text = fenced[1];
  } else if (LEADING_FENCE.test(trimmed)) {
    text = trimmed.replace(LEADING_FENCE, '');
  }

  return text.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd();
}

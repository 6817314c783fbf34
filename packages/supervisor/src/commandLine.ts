export const COMMAND_PLACEHOLDER = '%s';

/** Characters a backslash escapes inside double quotes. */
const DOUBLE_QUOTE_ESCAPES = new Set(['"', '\\', '$', '`']);

/**
 * Splits a command line into words the way a POSIX shell does before any
 * expansion: unquoted whitespace separates words, quotes group, and a
 * backslash escapes the next character. Nothing else is special, so
 * `format=(string)I420`, `a|b` and `*.mp4` each stay one word and `$NAME`
 * stays literal.
 *
 * An unterminated quote runs to the end of the line.
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i);
    const next = line.charAt(i + 1);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && DOUBLE_QUOTE_ESCAPES.has(next)) {
        word += next;
        i += 1;
      } else {
        word += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) words.push(word);
      word = '';
      inWord = false;
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '\\' && i + 1 < line.length) {
      word += next;
      i += 1;
    } else {
      word += ch;
    }
  }

  if (inWord) words.push(word);
  return words;
}

/**
 * Substitutes `template` into the invocation pattern and splits the result into
 * an argument vector.
 *
 * buildCommandVector('gst-launch-1.0 %s', 'videotestsrc num-buffers=10 ! fakesink')
 *   -> ['gst-launch-1.0', 'videotestsrc', 'num-buffers=10', '!', 'fakesink']
 */
export function buildCommandVector(invocation: string, template: string): string[] {
  const idx = invocation.indexOf(COMMAND_PLACEHOLDER);
  if (idx < 0) throw new Error(`invocation pattern has no ${COMMAND_PLACEHOLDER}: ${invocation}`);
  const line = `${invocation.slice(0, idx)}${template}${invocation.slice(idx + COMMAND_PLACEHOLDER.length)}`;
  return splitShellWords(line);
}

// Tooling inside a container may decorate its output with terminal control
// sequences, banners or trailing prompts. scrubJson() reduces such output to
// the first top-level JSON value it contains.
import { HarnessError, HarnessErrorCode } from './errors.js';

// CSI (colors, cursor), OSC (window title, hyperlinks) and readline's
// \x01/\x02 prompt markers.
const CONTROL_SEQUENCES = /\x1b\[[0-9;?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)|[\x01\x02]/g;

export function stripControlSequences(output: string): string {
  return output.replace(CONTROL_SEQUENCES, '');
}

// Index one past the close of the value opening at `start`, or -1 if unbalanced.
function findValueEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

export function scrubJson(output: string): string {
  const clean = stripControlSequences(output);
  const brace = clean.indexOf('{');
  const bracket = clean.indexOf('[');
  const start = brace >= 0 && (bracket < 0 || brace < bracket) ? brace : bracket;
  if (start < 0) return clean.trim();

  const end = findValueEnd(clean, start);
  return (end < 0 ? clean.slice(start) : clean.slice(start, end)).trim();
}

export function parseScrubbed(output: string): unknown {
  const json = scrubJson(output);
  try {
    const value: unknown = JSON.parse(json);
    return value;
  } catch (err) {
    throw new HarnessError(
      HarnessErrorCode.PROTOCOL_VIOLATION,
      'Command output does not contain a JSON value',
      { output: output.slice(0, 500) },
      { cause: err }
    );
  }
}

// file: src/Redactor.ts
import { parseDirective } from './DirectiveParser';
import { Directive, LocatedDirective, PrivateRegion } from './ComposePrimitives';

/** Placeholder emitted in place of a hinted private region. */
export const HINT_LINE = '// TODO: your code here.';
/** Statement emitted after the hint for `unimplemented` regions. */
export const UNIMPLEMENTED_LINE = 'unimplemented!()';

/**
 * Splits source text into lines. A trailing newline does not produce an extra
 * empty line, and a `\r` before each newline is dropped.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Finds the first line at or after `start` that carries a directive.
 *
 * @throws Error naming the 1-based line when a directive is malformed.
 */
export function findDirective(lines: readonly string[], start: number): LocatedDirective | null {
  for (let i = start; i < lines.length; i++) {
    let directive: Directive | null;
    try {
      directive = parseDirective(lines[i]);
    } catch (err: unknown) {
      throw new Error(`failed to parse directive on line ${i + 1}`, { cause: err });
    }
    if (directive) {
      return { line: i, ...directive };
    }
  }
  return null;
}

/**
 * Resolves the private region opened by `found`.
 * `begin_private` blocks extend to the first `end_private`; a `private` line
 * inside a block is ordinary content, and another `begin_private` is an error.
 */
export function resolveRegion(lines: readonly string[], found: LocatedDirective): PrivateRegion {
  const begin = found.line;
  switch (found.kind) {
    case 'end_private':
      throw new Error(`unpaired 'end_private' on line ${begin + 1}`);
    case 'private':
      return { begin, end: begin + 1, properties: found.properties };
    case 'begin_private': {
      let next = findDirective(lines, begin + 1);
      while (next) {
        if (next.kind === 'begin_private') {
          throw new Error(`nested 'begin_private' on line ${next.line + 1} is not supported`);
        }
        if (next.kind === 'end_private') {
          return { begin, end: next.line + 1, properties: found.properties };
        }
        next = findDirective(lines, next.line + 1);
      }
      throw new Error(`unclosed 'begin_private' on line ${begin + 1}`);
    }
  }
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

/**
 * Appends the replacement for `region` to `out` and returns where copying resumes.
 */
function emitRegion(lines: readonly string[], region: PrivateRegion, out: string[]): number {
  const { begin, end, properties } = region;
  if (properties.has('no_hint')) {
    // Swallow one of the two blank lines that would otherwise meet here
    const blankAround =
      begin > 0 && isBlank(lines[begin - 1]) && end < lines.length && isBlank(lines[end]);
    return blankAround ? end + 1 : end;
  }
  const indent = /^\s*/.exec(lines[begin])?.[0] ?? '';
  out.push(indent + HINT_LINE);
  if (properties.has('unimplemented')) {
    out.push(indent + UNIMPLEMENTED_LINE);
  }
  return end;
}

/**
 * Replaces every private region in `lines` with its placeholder (or nothing).
 * Lines outside private regions are copied unchanged.
 *
 * @param lines - The lines of one source file.
 * @returns The transformed lines.
 * @throws Error on malformed directives or badly paired blocks, naming the 1-based line.
 */
export function redactLines(lines: readonly string[]): string[] {
  const out: string[] = [];
  let cursor = 0;
  let found = findDirective(lines, cursor);
  while (found) {
    const region = resolveRegion(lines, found);
    for (let i = cursor; i < region.begin; i++) {
      out.push(lines[i]);
    }
    cursor = emitRegion(lines, region, out);
    found = findDirective(lines, cursor);
  }
  for (let i = cursor; i < lines.length; i++) {
    out.push(lines[i]);
  }
  return out;
}

/**
 * Redacts the text of one source file. Every output line ends with `\n`.
 */
export function redactSource(text: string): string {
  return redactLines(splitLines(text))
    .map(line => line + '\n')
    .join('');
}

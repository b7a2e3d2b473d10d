// file: src/DirectiveParser.ts
import {
  Directive,
  DirectiveKind,
  DirectiveProperty,
  DIRECTIVE_KINDS,
  DIRECTIVE_PROPERTIES
} from './ComposePrimitives';

const COMMENT_OPENER = '//';
const CONTROL_PREFIX = 'compose::';
// A keyword glued to more identifier text (e.g. `privateX`) is not that keyword
const IDENTIFIER_CHAR = /^[A-Za-z0-9_]/;

/**
 * Decodes the compose directive on a single line, if there is one.
 * A line carries a directive only when `compose::` follows a `//` comment opener.
 *
 * @param line - One line of source text.
 * @returns The decoded directive, or null when the line has none.
 * @throws Error on an unknown command, an unclosed property list or an unknown property.
 */
export function parseDirective(line: string): Directive | null {
  const commentAt = line.indexOf(COMMENT_OPENER);
  if (commentAt < 0) {
    return null;
  }
  const prefixAt = line.indexOf(CONTROL_PREFIX, commentAt + COMMENT_OPENER.length);
  if (prefixAt < 0) {
    return null;
  }
  const command = line.slice(prefixAt + CONTROL_PREFIX.length);
  const kind = matchKind(command);
  if (!kind) {
    throw new Error(`unknown command '${command.trim()}'`);
  }
  return { kind, properties: parseProperties(command.slice(kind.length)) };
}

function matchKind(command: string): DirectiveKind | undefined {
  return DIRECTIVE_KINDS.find(
    k => command.startsWith(k) && !IDENTIFIER_CHAR.test(command.slice(k.length))
  );
}

/**
 * Parses the optional `(prop, prop)` list following a directive keyword.
 */
function parseProperties(rest: string): Set<DirectiveProperty> {
  const properties = new Set<DirectiveProperty>();
  const open = rest.indexOf('(');
  if (open < 0) {
    return properties;
  }
  const trimmed = rest.trimEnd();
  if (!trimmed.endsWith(')')) {
    throw new Error(`unclosed parenthesis in '${trimmed.trim()}'`);
  }
  const inner = trimmed.slice(open + 1, trimmed.length - 1);
  if (inner.trim() === '') {
    return properties;
  }
  for (const raw of inner.split(',')) {
    const token = raw.trim();
    const property = DIRECTIVE_PROPERTIES.find(p => p === token);
    if (!property) {
      throw new Error(`unknown property '${token}'`);
    }
    properties.add(property);
  }
  return properties;
}

// file: src/ComposePrimitives.ts
/**
 * The kinds of compose directives supported in source files.
 */
export type DirectiveKind = 'private' | 'begin_private' | 'end_private';

/**
 * Flags that may follow a directive in parentheses.
 * `no_hint` drops the placeholder; `unimplemented` adds a panicking statement after it.
 */
export type DirectiveProperty = 'no_hint' | 'unimplemented';

export const DIRECTIVE_KINDS: readonly DirectiveKind[] = ['private', 'begin_private', 'end_private'];
export const DIRECTIVE_PROPERTIES: readonly DirectiveProperty[] = ['no_hint', 'unimplemented'];

/**
 * A directive decoded from a single line.
 */
export interface Directive {
  kind: DirectiveKind;
  properties: ReadonlySet<DirectiveProperty>;
}

/**
 * A directive together with the 0-based index of the line it was found on.
 */
export interface LocatedDirective extends Directive {
  line: number;
}

/**
 * Half-open line range [begin, end) hidden from the output.
 */
export interface PrivateRegion {
  begin: number;
  end: number;
  /** Properties of the directive that opened the region. */
  properties: ReadonlySet<DirectiveProperty>;
}

/**
 * Contents of the compose config file, already validated.
 */
export interface ComposeConfig {
  /** Entries (relative to the input root) mirrored into the output. */
  entries: string[];
  /** Entry names skipped at every depth while copying. */
  noCopy: string[];
  /** Top-level names never removed when pruning. */
  noRemove: string[];
  /** Extra workspace members listed under tools. */
  workspaceTools: string[];
}

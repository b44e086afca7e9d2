/**
 * Grammar parser seam over @ast-grep/napi.
 *
 * The merge engine receives the ast-grep module as a parameter so there's
 * no top-level import: callers load it once with loadAstGrep() (or hand in
 * a stand-in) and every snapshot is parsed through parseSnapshot().
 */

import * as path from 'node:path';
import { ParseFailure, ParserUnavailableError, UnsupportedLanguageError } from './errors.js';
import type { SnapshotLabel } from './shared.js';

// ---------------------------------------------------------------------------
// Types for dependency injection
// ---------------------------------------------------------------------------

/** Minimal interface for the ast-grep/napi module. */
export interface AstGrepModule {
  parse(lang: AstGrepLang, src: string): AstGrepRoot;
  Lang: Record<string, AstGrepLang>;
}

/** Opaque language identifier (the ast-grep Lang enum value). */
export type AstGrepLang = string;

export interface AstGrepRoot {
  root(): AstGrepNode;
}

export interface AstGrepPos {
  line: number;
  column: number;
  index: number;
}

export interface AstGrepRange {
  start: AstGrepPos;
  end: AstGrepPos;
}

/** Minimal SgNode interface. */
export interface AstGrepNode {
  kind(): string;
  text(): string;
  children(): AstGrepNode[];
  isNamed(): boolean;
  range(): AstGrepRange;
  field(name: string): AstGrepNode | null;
  findAll(rule: { rule: { kind: string } }): AstGrepNode[];
}

/** A parsed snapshot: the tree root plus a converter from parser offsets to string offsets. */
export interface ParsedSource {
  root: AstGrepNode;
  source: string;
  offsetOf(pos: AstGrepPos): number;
}

// ---------------------------------------------------------------------------
// Language mapping
// ---------------------------------------------------------------------------

/** Map file extension to ast-grep Lang enum key. Returns null for unsupported extensions. */
export function mapExtensionToLang(ext: string): string | null {
  switch (ext) {
    case '.ts':
    case '.mts':
    case '.cts':
      return 'TypeScript';
    case '.tsx': return 'Tsx';
    default: return null;
  }
}

export function isSupportedPath(filePath: string): boolean {
  return mapExtensionToLang(path.extname(filePath)) !== null;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isAstGrepModule(value: unknown): value is AstGrepModule {
  return typeof value === 'object'
    && value !== null
    && 'parse' in value
    && typeof value.parse === 'function'
    && 'Lang' in value
    && typeof value.Lang === 'object'
    && value.Lang !== null;
}

/**
 * Load @ast-grep/napi via dynamic import. The module is CommonJS, so its
 * exports may sit on the namespace or on `default` depending on the loader.
 */
export async function loadAstGrep(): Promise<AstGrepModule> {
  let mod: unknown;
  try {
    const moduleName = '@ast-grep/napi';
    mod = await import(/* webpackIgnore: true */ moduleName);
  } catch (err) {
    throw new ParserUnavailableError(err instanceof Error ? err.message : String(err));
  }

  if (isAstGrepModule(mod)) return mod;
  if (typeof mod === 'object' && mod !== null && 'default' in mod && isAstGrepModule(mod.default)) {
    return mod.default;
  }
  throw new ParserUnavailableError('module does not expose parse() and Lang');
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Zero-width leaf: tree-sitter's MISSING token for an unclosed `{`, `(` or similar. */
function isMissingLeaf(node: AstGrepNode, children: AstGrepNode[]): boolean {
  if (children.length > 0) return false;
  const { start, end } = node.range();
  return start.index === end.index;
}

/** First ERROR node or MISSING token below the root, in source order. */
function firstErrorNode(root: AstGrepNode): AstGrepNode | null {
  const visit = (node: AstGrepNode): AstGrepNode | null => {
    if (node.kind() === 'ERROR') return node;
    const children = node.children();
    if (node !== root && isMissingLeaf(node, children)) return node;
    for (const child of children) {
      const found = visit(child);
      if (found) return found;
    }
    return null;
  };
  return visit(root);
}

/**
 * Build the offset converter. ast-grep reports string indices for JS
 * callers, but older builds reported UTF-8 byte offsets; the width of the
 * root node's range against its text length tells the two apart.
 */
function createOffsetMapper(root: AstGrepNode, source: string): (pos: AstGrepPos) => number {
  const { start, end } = root.range();
  if (Buffer.byteLength(source, 'utf8') === source.length
    || end.index - start.index === root.text().length) {
    return pos => pos.index;
  }

  const bytes = Buffer.from(source, 'utf8');
  const cache = new Map<number, number>();
  return pos => {
    const cached = cache.get(pos.index);
    if (cached !== undefined) return cached;
    const offset = bytes.subarray(0, pos.index).toString('utf8').length;
    cache.set(pos.index, offset);
    return offset;
  };
}

/**
 * Parse one snapshot of a file. Throws UnsupportedLanguageError for paths
 * outside the wired grammar and ParseFailure when the tree has error or
 * missing nodes.
 */
export function parseSnapshot(
  astGrep: AstGrepModule,
  source: string,
  filePath: string,
  label: SnapshotLabel,
): ParsedSource {
  const langKey = mapExtensionToLang(path.extname(filePath));
  const lang = langKey ? astGrep.Lang[langKey] : undefined;
  if (!lang) throw new UnsupportedLanguageError(filePath);

  const root = astGrep.parse(lang, source).root();
  const error = firstErrorNode(root);
  if (error) {
    throw new ParseFailure(label, filePath, error.range().start.line + 1);
  }

  return { root, source, offsetOf: createOffsetMapper(root, source) };
}

/**
 * Unit extraction — walks the direct children of a parsed file and turns
 * them into ordered, keyed units. Nested declarations (methods, inner
 * functions) stay inside their enclosing unit's text.
 *
 * Pure: takes a ParsedSource, returns Unit[].
 */

import type { AstGrepNode, ParsedSource } from './parser.js';
import { hashUnitText, type FunctionSignature, type Occurrence, type Unit, type UnitKind } from './shared.js';

// ---------------------------------------------------------------------------
// Node kind tables (tree-sitter TypeScript grammar)
// ---------------------------------------------------------------------------

const DECLARATION_KINDS: Record<string, UnitKind> = {
  function_declaration: 'function',
  generator_function_declaration: 'function',
  function_signature: 'function',
  class_declaration: 'class',
  abstract_class_declaration: 'class',
  lexical_declaration: 'variable',
  variable_declaration: 'variable',
  interface_declaration: 'type',
  type_alias_declaration: 'type',
  enum_declaration: 'type',
};

/** Kinds of `export default <value>` expressions that still read as declarations. */
const DEFAULT_VALUE_KINDS: Record<string, UnitKind> = {
  function_expression: 'function',
  function: 'function',
  generator_function: 'function',
  arrow_function: 'function',
  class: 'class',
};

const PARAMETER_KINDS = new Set(['required_parameter', 'optional_parameter']);

const SHORTHAND_KINDS = ['shorthand_property_identifier', 'shorthand_property_identifier_pattern'];

export const ANONYMOUS_KEY_PREFIX = 'anonymous-at-position-';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface UnitDescription {
  kind: UnitKind;
  name: string | null;
  /** The declaration node (inside any export wrapper), for signature extraction. */
  declaration: AstGrepNode | null;
}

/** A top-level span before it becomes a Unit. Comment-only spans have no node. */
interface Span {
  node: AstGrepNode | null;
  start: number;
  end: number;
}

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

function stripQuotes(raw: string): string {
  return raw.replace(/^['"`]/, '').replace(/['"`]$/, '');
}

function importSpecifier(node: AstGrepNode): string | null {
  const source = node.field('source') ?? node.children().find(c => c.kind() === 'string') ?? null;
  if (source) return stripQuotes(source.text());
  const match = node.text().match(/['"]([^'"]+)['"]/);
  return match?.[1] ?? null;
}

function declarationName(decl: AstGrepNode, kind: UnitKind): string | null {
  if (kind === 'variable') {
    const declarator = decl.children().find(c => c.kind() === 'variable_declarator');
    const name = declarator?.field('name');
    return name ? name.text().replace(/\s+/g, ' ') : null;
  }
  return decl.field('name')?.text() ?? null;
}

function describeDeclaration(decl: AstGrepNode): UnitDescription | null {
  const kind = DECLARATION_KINDS[decl.kind()];
  if (!kind) return null;
  return { kind, name: declarationName(decl, kind), declaration: decl };
}

function describeExport(node: AstGrepNode): UnitDescription {
  const decl = node.field('declaration')
    ?? node.children().find(c => DECLARATION_KINDS[c.kind()] !== undefined)
    ?? null;
  if (decl) {
    const described = describeDeclaration(decl);
    if (described) return described;
  }

  // export default <expression>: no name to key on
  const value = node.field('value');
  const valueKind = value ? DEFAULT_VALUE_KINDS[value.kind()] : undefined;
  return { kind: valueKind ?? 'statement', name: null, declaration: null };
}

function describe(node: AstGrepNode): UnitDescription {
  const kind = node.kind();
  if (kind === 'import_statement') {
    return { kind: 'import', name: importSpecifier(node), declaration: null };
  }
  if (kind === 'export_statement') {
    return describeExport(node);
  }
  return describeDeclaration(node) ?? { kind: 'statement', name: null, declaration: null };
}

// ---------------------------------------------------------------------------
// Function signatures
// ---------------------------------------------------------------------------

function extractSignature(
  decl: AstGrepNode,
  parsed: ParsedSource,
  unitStart: number,
): FunctionSignature {
  const toOccurrence = (node: AstGrepNode): Occurrence => {
    const { start, end } = node.range();
    return {
      name: node.text(),
      start: parsed.offsetOf(start) - unitStart,
      end: parsed.offsetOf(end) - unitStart,
    };
  };

  let firstParam: Occurrence | null = null;
  const params = decl.field('parameters');
  const first = params?.children().find(c => PARAMETER_KINDS.has(c.kind()));
  if (first) {
    const pattern = first.field('pattern') ?? first.children().find(c => c.isNamed()) ?? null;
    if (pattern?.kind() === 'identifier') firstParam = toOccurrence(pattern);
  }

  const collect = (kinds: string[]) => kinds
    .flatMap(kind => decl.findAll({ rule: { kind } }))
    .map(toOccurrence)
    .sort((x, y) => x.start - y.start);

  return {
    firstParam,
    identifiers: collect(['identifier']),
    shorthands: collect(SHORTHAND_KINDS),
  };
}

// ---------------------------------------------------------------------------
// Span collection
// ---------------------------------------------------------------------------

function newlineCount(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

/**
 * Group top-level nodes into spans. Comment runs directly above a node
 * (no blank line in between) join that node's span; a comment on the
 * same line as the end of the previous span joins that span; any other
 * comment run becomes a span of its own.
 */
function collectSpans(parsed: ParsedSource): Span[] {
  const { root, source } = parsed;
  const spans: Span[] = [];
  let pending: { start: number; end: number } | null = null;

  const flushPending = () => {
    if (pending) spans.push({ node: null, start: pending.start, end: pending.end });
    pending = null;
  };

  for (const node of root.children()) {
    if (!node.isNamed()) continue;
    const { start: startPos, end: endPos } = node.range();
    const start = parsed.offsetOf(startPos);
    const end = parsed.offsetOf(endPos);
    const last = spans[spans.length - 1];

    if (node.kind() === 'comment') {
      if (!pending && last && newlineCount(source.slice(last.end, start)) === 0) {
        last.end = end;
        continue;
      }
      if (pending && newlineCount(source.slice(pending.end, start)) > 1) {
        flushPending();
      }
      pending = pending ? { start: pending.start, end } : { start, end };
      continue;
    }

    let spanStart = start;
    if (pending) {
      if (newlineCount(source.slice(pending.end, start)) <= 1) {
        spanStart = pending.start;
        pending = null;
      } else {
        flushPending();
      }
    }
    spans.push({ node, start: spanStart, end });
  }
  flushPending();

  return spans;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract the ordered top-level units of a parsed snapshot.
 *
 * Keys are `<kind>:<name>`, or `import:<specifier>` for imports. A key
 * repeated within the snapshot gets a `#n` suffix from its second
 * occurrence on. Units without a determinable name get a positional
 * fallback key and are marked ambiguous.
 */
export function extractUnits(parsed: ParsedSource): Unit[] {
  const units: Unit[] = [];
  const seen = new Map<string, number>();
  let anonymousCount = 0;

  for (const span of collectSpans(parsed)) {
    const described: UnitDescription = span.node
      ? describe(span.node)
      : { kind: 'statement', name: null, declaration: null };
    const text = parsed.source.slice(span.start, span.end);

    let key: string;
    if (described.name !== null) {
      const baseKey = `${described.kind}:${described.name}`;
      const count = (seen.get(baseKey) ?? 0) + 1;
      seen.set(baseKey, count);
      key = count === 1 ? baseKey : `${baseKey}#${count}`;
    } else {
      key = `${ANONYMOUS_KEY_PREFIX}${anonymousCount++}`;
    }

    const unit: Unit = {
      kind: described.kind,
      key,
      name: described.name,
      start: span.start,
      end: span.end,
      text,
      hash: hashUnitText(text),
      ambiguous: described.name === null,
    };
    if (described.kind === 'function' && described.declaration && described.name !== null) {
      unit.signature = extractSignature(described.declaration, parsed, span.start);
    }
    units.push(unit);
  }

  return units;
}

export function isAnonymousKey(key: string): boolean {
  return key.startsWith(ANONYMOUS_KEY_PREFIX);
}

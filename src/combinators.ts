/**
 * Text parser combinators used by the grammar loader.
 *
 * Every result carries the furthest failure seen while producing it, even a
 * successful one: a list that stops at `;` still remembers that `,` would
 * have continued it. Composed parsers merge these, so a failure reports
 * every expectation recorded at the furthest offset reached.
 */

import type { SourcePosition } from "./types.js";

/** What would have been accepted at `pos`. */
export interface Failure {
  readonly pos: number;
  readonly expected: readonly string[];
}

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T; readonly pos: number; readonly furthest: Failure | null }
  | ({ readonly ok: false } & Failure);

export interface TextParser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): TextParser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
  };
}

export function ok<T>(value: T, pos: number, furthest: Failure | null = null): ParseResult<T> {
  return { ok: true, value, pos, furthest };
}

export function fail<T>(pos: number, ...expected: string[]): ParseResult<T> {
  return { ok: false, pos, expected };
}

/** The later of two failures; at the same offset, both expectation lists in order. */
export function furthest(earlier: Failure | null, later: Failure | null): Failure | null {
  if (!earlier) return later;
  if (!later) return earlier;
  if (earlier.pos !== later.pos) return earlier.pos > later.pos ? earlier : later;
  const expected = [...earlier.expected];
  for (const e of later.expected) if (!expected.includes(e)) expected.push(e);
  return { pos: earlier.pos, expected };
}

/** Fold an earlier failure into `result`. A failed result may move forward to it. */
export function merge<T>(result: ParseResult<T>, earlier: Failure | null): ParseResult<T> {
  if (result.ok) return ok(result.value, result.pos, furthest(earlier, result.furthest));
  const f = furthest(earlier, result) ?? result;
  return { ok: false, pos: f.pos, expected: f.expected };
}

/** Convert a zero-based offset into a source position with 1-based line/column. */
export function positionAt(input: string, offset: number): SourcePosition {
  let line = 1;
  let column = 1;
  for (let i = 0; i < offset && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset };
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export function char(c: string): TextParser<string> {
  return mkParser<string>((input, pos) => (input[pos] === c ? ok(c, pos + 1) : fail(pos, `'${c}'`)));
}

/** Match `pattern` at the current offset only. */
export function regex(pattern: RegExp, expected = `/${pattern.source}/`): TextParser<string> {
  const sticky = new RegExp(pattern.source, "y");
  return mkParser<string>((input, pos) => {
    sticky.lastIndex = pos;
    const m = sticky.exec(input);
    return m ? ok(m[0], pos + m[0].length) : fail(pos, expected);
  });
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export function seq<A, B>(a: TextParser<A>, b: TextParser<B>): TextParser<[A, B]> {
  return mkParser<[A, B]>((input, pos) => {
    const ra = a.parse(input, pos);
    if (!ra.ok) return ra;
    const rb = merge(b.parse(input, ra.pos), ra.furthest);
    if (!rb.ok) return rb;
    return ok([ra.value, rb.value], rb.pos, rb.furthest);
  });
}

export function map<A, B>(p: TextParser<A>, f: (a: A) => B): TextParser<B> {
  return mkParser<B>((input, pos) => {
    const r = p.parse(input, pos);
    return r.ok ? ok(f(r.value), r.pos, r.furthest) : r;
  });
}

/** `open p close`, keeping the value of `p`. */
export function between<O, T, C>(open: TextParser<O>, p: TextParser<T>, close: TextParser<C>): TextParser<T> {
  return map(seq(seq(open, p), close), ([[, value]]) => value);
}

/**
 * One or more items separated by `sep`. A separator must be followed by an
 * item; the separator that ends the list is kept as an expectation.
 */
export function sepBy1<T, S>(item: TextParser<T>, sep: TextParser<S>): TextParser<T[]> {
  return mkParser<T[]>((input, pos) => {
    const first = item.parse(input, pos);
    if (!first.ok) return first;
    const items: T[] = [first.value];
    let cur = first.pos;
    let seen = first.furthest;
    for (;;) {
      const rs = sep.parse(input, cur);
      if (!rs.ok) {
        seen = furthest(seen, rs);
        break;
      }
      const ri = merge(item.parse(input, rs.pos), furthest(seen, rs.furthest));
      if (!ri.ok) return ri;
      items.push(ri.value);
      cur = ri.pos;
      seen = ri.furthest;
    }
    return ok(items, cur, seen);
  });
}

/** Defers building `f()` until first use, for recursive grammars. */
export function lazy<T>(f: () => TextParser<T>): TextParser<T> {
  let cached: TextParser<T> | null = null;
  return mkParser<T>((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}

/**
 * Helpers for reading syntax trees.
 */

import type { SyntaxChild, SyntaxNode, Token } from "./types.js";

export function isToken(child: SyntaxChild): child is Token {
  return "kind" in child;
}

export function isNode(child: SyntaxChild): child is SyntaxNode {
  return "type" in child && child.type === "node";
}

function collect(children: readonly SyntaxChild[], out: Token[]): void {
  for (const child of children) {
    if (isToken(child)) {
      out.push(child);
      continue;
    }
    switch (child.type) {
      case "node":
        collect(child.children, out);
        break;
      case "repeat":
        for (const match of child.matches) collect(match, out);
        break;
      case "optional":
        if (child.match) collect(child.match, out);
        break;
    }
  }
}

/** Every token under `root`, in input order. */
export function tokensOf(root: SyntaxChild): Token[] {
  const out: Token[] = [];
  collect([root], out);
  return out;
}

/** The matched token texts joined by `separator`. */
export function textOf(root: SyntaxChild, separator = " "): string {
  return tokensOf(root)
    .map((token) => token.text)
    .join(separator);
}

/** First direct child node tagged `tag`. */
export function findChild(node: SyntaxNode, tag: string): SyntaxNode | undefined {
  for (const child of node.children) {
    if (isNode(child) && child.tag === tag) return child;
  }
  return undefined;
}

function formatChildren(children: readonly SyntaxChild[]): string {
  return children.map(formatTree).join(" ");
}

/**
 * Compact rendering for tests and logs.
 *
 * @example
 * formatTree(tree); // "r([a] {b; b} c)"
 */
export function formatTree(child: SyntaxChild): string {
  if (isToken(child)) return child.text;
  switch (child.type) {
    case "node":
      return `${child.tag}(${formatChildren(child.children)})`;
    case "repeat":
      return `{${child.matches.map(formatChildren).join("; ")}}`;
    case "optional":
      return child.match === null ? "[]" : `[${formatChildren(child.match)}]`;
  }
}

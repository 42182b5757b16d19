/**
 * KeyValues text reader shared by VMT and gameinfo.txt parsing.
 *
 * Keys and values may be quoted or bare, `//` starts a comment, and a
 * value may instead be a `{ ... }` block of further pairs.
 */

export interface KeyValueNode {
  key: string;
  value: string | KeyValueNode[];
}

type KeyValueToken =
  | { kind: 'text'; value: string }
  | { kind: 'open' }
  | { kind: 'close' };

function tokenize(text: string): KeyValueToken[] {
  const tokens: KeyValueToken[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i]!;
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '/' && text[i + 1] === '/') {
      const eol = text.indexOf('\n', i);
      i = eol === -1 ? text.length : eol;
    } else if (ch === '{') {
      tokens.push({ kind: 'open' });
      i++;
    } else if (ch === '}') {
      tokens.push({ kind: 'close' });
      i++;
    } else if (ch === '"') {
      let end = i + 1;
      while (end < text.length && text[end] !== '"' && text[end] !== '\n') end++;
      tokens.push({ kind: 'text', value: text.slice(i + 1, end) });
      i = text[end] === '"' ? end + 1 : end;
    } else {
      let end = i;
      while (end < text.length && !/[\s{}"]/.test(text[end]!)) end++;
      tokens.push({ kind: 'text', value: text.slice(i, end) });
      i = end;
    }
  }

  return tokens;
}

/** Platform conditionals such as `[$X360]` trail a value and are ignored. */
function isConditional(token: KeyValueToken | undefined): boolean {
  return token?.kind === 'text' && /^\[.*\]$/.test(token.value);
}

function parseNodes(tokens: readonly KeyValueToken[], start: number): { nodes: KeyValueNode[]; next: number } {
  const nodes: KeyValueNode[] = [];
  let i = start;

  while (i < tokens.length) {
    const token = tokens[i]!;
    if (token.kind === 'close') return { nodes, next: i + 1 };
    if (token.kind === 'open') {
      // anonymous block; keep its children
      const inner = parseNodes(tokens, i + 1);
      nodes.push(...inner.nodes);
      i = inner.next;
      continue;
    }

    const valueToken = tokens[i + 1];
    if (!valueToken || valueToken.kind === 'close') {
      nodes.push({ key: token.value, value: '' });
      i++;
      continue;
    }
    if (valueToken.kind === 'open') {
      const inner = parseNodes(tokens, i + 2);
      nodes.push({ key: token.value, value: inner.nodes });
      i = inner.next;
    } else {
      nodes.push({ key: token.value, value: valueToken.value });
      i += 2;
    }
    if (isConditional(tokens[i])) i++;
  }

  return { nodes, next: i };
}

export function parseKeyValues(text: string): KeyValueNode[] {
  return parseNodes(tokenize(text), 0).nodes;
}

/** First block named `key` (case-insensitive), searched depth-first. */
export function findBlock(nodes: readonly KeyValueNode[], key: string): KeyValueNode[] | null {
  const wanted = key.toLowerCase();
  for (const node of nodes) {
    if (typeof node.value === 'string') continue;
    if (node.key.toLowerCase() === wanted) return node.value;
    const nested = findBlock(node.value, key);
    if (nested) return nested;
  }
  return null;
}

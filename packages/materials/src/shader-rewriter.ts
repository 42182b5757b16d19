/**
 * Rewrites include and texture references in copied VMT text.
 *
 * Only the referenced value changes; indentation, key spelling, quoting of
 * the key, trailing text and line endings stay as they were. Comment text
 * and lines whose reference was not relocated pass through unchanged.
 */

import { normalizeTextureReference } from './search-roots.js';
import { toTextureRole } from './texture-roles.js';

export interface RewritePlan {
  /** New value for the patch `include` line. */
  includeReference?: string;
  /** Lower-cased normalized texture reference → new reference. */
  textureReferences: ReadonlyMap<string, string>;
}

const INCLUDE_PAIR = /(^|[\s{])("?)(include)\2(\s+)(?:"[^"]*"|[^\s"{}]+)/gi;
const KEY_VALUE_PAIR = /("?)(\$[A-Za-z0-9_]+)\1(\s+)(?:"([^"]*)"|([^\s"{}]+))/g;

export function textureReferenceKey(value: string): string {
  return normalizeTextureReference(value).toLowerCase();
}

function splitComment(line: string): [string, string] {
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') inQuote = !inQuote;
    else if (!inQuote && ch === '/' && line[i + 1] === '/') return [line.slice(0, i), line.slice(i)];
  }
  return [line, ''];
}

function rewriteLine(line: string, plan: RewritePlan): string {
  const [code, comment] = splitComment(line);
  if (code.trim() === '') return line;

  let rewritten = code;
  if (plan.includeReference !== undefined) {
    const reference = plan.includeReference;
    rewritten = rewritten.replace(
      INCLUDE_PAIR,
      (_match, lead: string, quote: string, keyword: string, gap: string) =>
        `${lead}${quote}${keyword}${quote}${gap}"${reference}"`,
    );
  }

  rewritten = rewritten.replace(
    KEY_VALUE_PAIR,
    (match, quote: string, key: string, gap: string, quoted: string | undefined, bare: string | undefined) => {
      if (!toTextureRole(key)) return match;
      const original = textureReferenceKey(quoted ?? bare ?? '');
      const replacement = plan.textureReferences.get(original);
      if (replacement === undefined || replacement.toLowerCase() === original) return match;
      return `${quote}${key}${quote}${gap}"${replacement}"`;
    },
  );

  return rewritten + comment;
}

export function rewriteShaderText(text: string, plan: RewritePlan): string {
  // Odd indices hold the original line endings.
  return text
    .split(/(\r?\n)/)
    .map((part, index) => (index % 2 === 0 ? rewriteLine(part, plan) : part))
    .join('');
}

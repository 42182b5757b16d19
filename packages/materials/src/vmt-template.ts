/**
 * Writes a VMT beside an exported VTF from a template file.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

/**
 * Fill a template: every `$basetexture` line points at `textureReference`,
 * and quoted `"$key"` names lose their quotes. Indentation is kept.
 */
export function renderVmtTemplate(template: string, textureReference: string): string {
  return template
    .split(/\r?\n/)
    .map((line) => {
      const indent = /^\s*/.exec(line)?.[0] ?? '';
      const body = line.slice(indent.length);
      if (/^"?\$basetexture\b"?/i.test(body)) {
        return `${indent}$basetexture "${textureReference}"`;
      }
      const quotedKey = /^"(\$[A-Za-z0-9_]+)"(.*)$/.exec(body);
      return quotedKey ? `${indent}${quotedKey[1]}${quotedKey[2]}` : line;
    })
    .join('\n');
}

/** Texture reference for `vtfPath` inside `materialsRoot`; just the stem when outside it. */
export function textureReferenceFor(vtfPath: string, materialsRoot: string): string {
  const relative = path.relative(materialsRoot, vtfPath);
  const stem = path.basename(vtfPath, path.extname(vtfPath));
  if (relative.startsWith('..') || path.isAbsolute(relative)) return stem;
  return relative.split(path.sep).join('/').replace(/\.vtf$/i, '');
}

/** Write `<vtf stem>.vmt` next to `vtfPath`; returns the written path. */
export function writeVmtFromTemplate(templatePath: string, vtfPath: string, materialsRoot: string): string {
  const destination = path.join(path.dirname(vtfPath), `${path.basename(vtfPath, path.extname(vtfPath))}.vmt`);
  const rendered = renderVmtTemplate(readFileSync(templatePath, 'utf8'), textureReferenceFor(vtfPath, materialsRoot));
  writeFileSync(destination, rendered);
  return destination;
}

import { describe, expect, it } from 'vitest';

import { ownTextures, parseShaderDescriptor } from './shader-descriptor.js';

describe('parseShaderDescriptor', () => {
  it('extracts allow-listed texture keys from a flat shader', () => {
    const descriptor = parseShaderDescriptor(
      [
        '// hero cloth',
        '"VertexLitGeneric"',
        '{',
        '\t"$BaseTexture" "models\\hero\\cloth1_d"',
        '\t$bumpmap models/hero/cloth1_n [$WIN32]',
        '\t$surfaceprop "cloth"',
        '\t"Proxies"',
        '\t{',
        '\t\tAnimatedTexture { animatedtexturevar $detail }',
        '\t}',
        '}',
      ].join('\n'),
      'cloth1.vmt',
    );

    expect(descriptor.kind).toBe('flat');
    if (descriptor.kind !== 'flat') return;
    expect(descriptor.shader).toBe('VertexLitGeneric');
    expect([...descriptor.textures]).toEqual([
      ['$basetexture', 'models\\hero\\cloth1_d'],
      ['$bumpmap', 'models/hero/cloth1_n'],
    ]);
  });

  it('reads include, insert and replace blocks of a patch shader', () => {
    const descriptor = parseShaderDescriptor(
      [
        'Patch',
        '{',
        '\tinclude "materials/models/hero/base.vmt"',
        '\tinsert { $detail "models/shared/noise" $basetexture "models/hero/b" }',
        '\treplace',
        '\t{',
        '\t\t$basetexture "models/hero/c"',
        '\t}',
        '}',
      ].join('\n'),
      'patch.vmt',
    );

    expect(descriptor.kind).toBe('patch');
    if (descriptor.kind !== 'patch') return;
    expect(descriptor.includeTarget).toBe('materials/models/hero/base.vmt');
    expect(descriptor.insertTextures.get('$detail')).toBe('models/shared/noise');
    expect(descriptor.replaceTextures.get('$basetexture')).toBe('models/hero/c');
    expect([...ownTextures(descriptor)]).toEqual([
      ['$detail', 'models/shared/noise'],
      ['$basetexture', 'models/hero/c'],
    ]);
  });

  it('treats a patch without include as having no include target', () => {
    const descriptor = parseShaderDescriptor('patch { replace { $envmapmask "x/y" } }', 'p.vmt');

    expect(descriptor.kind === 'patch' && descriptor.includeTarget).toBeNull();
  });
});

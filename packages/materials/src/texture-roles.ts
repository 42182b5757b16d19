/**
 * Shader keys that name a texture file. Anything else in a VMT is a plain
 * parameter and never followed.
 */
export const TEXTURE_ROLES = [
  '$basetexture',
  '$basetexture2',
  '$bumpmap',
  '$bumpmap2',
  '$normalmap',
  '$envmapmask',
  '$detail',
  '$selfillummask',
  '$lightwarptexture',
  '$phongexponenttexture',
  '$phongwarptexture',
  '$blendmodulatetexture',
  '$ambientoccltexture',
  '$iris',
  '$corneatexture',
  '$emissiveblendbasetexture',
  '$emissiveblendtexture',
  '$emissiveblendflowtexture',
] as const;

export type TextureRole = (typeof TEXTURE_ROLES)[number];

const ROLE_SET: ReadonlySet<string> = new Set(TEXTURE_ROLES);

function isTextureRoleKey(key: string): key is TextureRole {
  return ROLE_SET.has(key);
}

/** Case-insensitive lookup; null for keys outside the allow-list. */
export function toTextureRole(key: string): TextureRole | null {
  const lower = key.toLowerCase();
  return isTextureRoleKey(lower) ? lower : null;
}

export type TextureMap = ReadonlyMap<TextureRole, string>;

/**
 * Material matcher: first-hit keyword classification of contract text
 *
 * The reference table is ordered most-specific first: the first non-generic
 * row with a keyword occurring as a substring of the text wins. There is no
 * scoring beyond table order. When nothing matches, the generic sentinel row
 * (MAT_GEN) is returned if the table has one.
 */

import type { MaterialProfile } from "@/types";
import { GENERIC_MATERIAL_ID } from "@/constants/materials";

export function isGenericMaterial(profile: MaterialProfile): boolean {
  return profile.materialId.toUpperCase() === GENERIC_MATERIAL_ID;
}

/**
 * Match text against the material reference table
 *
 * @param text - Free text (typically title + description); matched case-insensitively
 * @param materials - Reference rows in table order
 * @returns The matched profile, the generic fallback, or null when neither exists
 *
 * @example
 * matchMaterial("Resurfacing of A38 with asphalt", materials) // asphalt row
 */
export function matchMaterial(
  text: string,
  materials: readonly MaterialProfile[],
): MaterialProfile | null {
  const haystack = text.toLowerCase();

  for (const profile of materials) {
    if (isGenericMaterial(profile)) continue;

    if (profile.keywords.some((keyword) => keyword && haystack.includes(keyword))) {
      return profile;
    }
  }

  return materials.find(isGenericMaterial) ?? null;
}

/**
 * VR Detection: VR resolution for implicit transfer syntax
 *
 * Implicit VR streams carry no VR on the wire. The VR is taken from the
 * injected dictionary; group lengths and private creators follow fixed rules;
 * anything else is read as UN.
 */

import { dicomDictionary, type VrLookup } from './dictionary';
import { tagElement, tagGroup } from './tagUtils';

/**
 * VR types that have explicit length (2 bytes reserved + 4 bytes length)
 */
export const EXPLICIT_LENGTH_VR = new Set([
  'OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'SQ', 'SV', 'UC', 'UN', 'UR', 'UT', 'UV',
]);

/** VRs whose value is raw bytes */
export const BINARY_VR = new Set(['OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'UN']);

/** VRs whose value is a list of fixed-width binary numbers */
export const NUMERIC_VR = new Set(['US', 'SS', 'UL', 'SL', 'FL', 'FD', 'AT', 'SV', 'UV']);

/**
 * Detect VR for a tag in implicit VR transfer syntax
 * @returns Detected VR or 'UN' if unknown
 */
export function detectVR(tag: number, dictionary: VrLookup = dicomDictionary): string {
  const entry = dictionary.lookup(tag);
  if (entry) {
    return entry.vr;
  }

  const group = tagGroup(tag);
  const element = tagElement(tag);

  if (element === 0x0000) {
    return 'UL'; // Group length
  }

  if ((group & 1) === 1 && element >= 0x0010 && element <= 0x00ff) {
    return 'LO'; // Private creator
  }

  return 'UN';
}

/**
 * Check if VR requires explicit length encoding
 */
export function requiresExplicitLength(vr: string): boolean {
  return EXPLICIT_LENGTH_VR.has(vr);
}

/**
 * A two-letter VR must be two upper-case ASCII letters
 */
export function isValidVR(vr: string): boolean {
  return /^[A-Z]{2}$/.test(vr);
}

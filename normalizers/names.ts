/**
 * Worker name normalisation
 *
 * The shift plan writes people as "J. Kowalski", sometimes with a tag
 * ("J. Kowalski PLAKATY") or a handover ("A. Nowak/J. Kowalski").
 */

import { collapseWhitespace } from './utils.js';

/**
 * Letters without a Unicode decomposition to their base letter
 */
const UNDECOMPOSABLE_LETTERS: Record<string, string> = {
  ł: 'l',
  đ: 'd',
  ø: 'o',
  ß: 'ss',
};

/**
 * Lower-case a string and fold diacritics to plain ASCII letters
 *
 * @example removeAccents('Żółć') // 'zolc'
 */
export function removeAccents(text: string): string {
  return text
    .toLowerCase()
    .replace(/[łđøß]/g, (letter) => UNDECOMPOSABLE_LETTERS[letter] ?? letter)
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Return a person's name in "J. Doe" form
 *
 * @param fullName - First and last name, e.g. "Jan Kowalski"
 * @throws Error if fewer than two name parts are given
 */
export function toShortName(fullName: string): string {
  const parts = collapseWhitespace(fullName).split(' ').filter((part) => part.length > 0);
  if (parts.length < 2) {
    throw new Error(`Expected a first and last name, got "${fullName}"`);
  }

  const initial = parts[0].charAt(0);
  const lastName = parts[parts.length - 1];
  return `${initial}. ${lastName}`;
}

/**
 * Key used to compare a short name against cleaned name cells
 *
 * @example toMatchKey('J. Kowalski') // 'j.kowalski'
 */
export function toMatchKey(shortName: string): string {
  return removeAccents(shortName).replace(/\s+/g, '');
}

/**
 * Clean a name cell for comparison with {@link toMatchKey}
 *
 * Spaces and annotation tags are removed; for "old/new" handovers the name
 * after the first slash is kept.
 */
export function cleanNameCell(value: string, annotationTags: string[] = []): string {
  let cleaned = value.replace(/\s+/g, '');
  for (const tag of annotationTags) {
    cleaned = cleaned.split(tag.replace(/\s+/g, '')).join('');
  }

  if (cleaned.length <= 1) {
    return cleaned;
  }

  if (cleaned.includes('/')) {
    cleaned = cleaned.split('/')[1];
  }
  return removeAccents(cleaned);
}

/**
 * Note and bookmark constants shared by the restructurer and the
 * WordprocessingML collaborator.
 */

/**
 * Endnote ids Word reserves for the separator and continuation-separator
 * notes. They never carry citation text.
 */
export const SEPARATOR_NOTE_IDS: ReadonlySet<string> = new Set(['0', '-1']);

/**
 * First numeric bookmark id handed out per conversion. Kept well above the
 * ids Word assigns to bookmarks already in a document.
 *
 * @constant
 * @default 10000
 */
export const FIRST_BOOKMARK_ID = 10000;

export const BOOKMARK_NAME_PREFIX = 'REF_NOTE_';

export const NOTES_HEADING = 'Notes';

export const NOTE_NUMBER_SEPARATOR = '. ';

export const INCIPIT_LABEL_SUFFIX = ': ';

export function isSeparatorNoteId(id: string): boolean {
  return SEPARATOR_NOTE_IDS.has(id);
}

export function compareNoteIds(a: string, b: string): number {
  return Number(a) - Number(b);
}

import { customAlphabet, nanoid } from "nanoid";

/**
 * ID generation utilities.
 *
 * Operation IDs use the default nanoid alphabet. Temporary table names need
 * a valid unquoted SQL identifier on every dialect, so they draw from
 * lowercase letters and digits only.
 */

/**
 * Generates a new unique ID.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;

const TABLE_ID_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyz";

/**
 * Generates a 16-character `[0-9a-z]` suffix for temporary table names.
 */
export const generateTableId: IdGenerator = customAlphabet(
  TABLE_ID_ALPHABET,
  16,
);

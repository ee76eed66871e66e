/**
 * UUID generation utilities
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique record identifier
 * @returns A unique UUID v4 string
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Validate if a string is a valid UUID
 * @param id - The string to validate
 * @returns true if valid UUID, false otherwise
 */
export function isValidUUID(id: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  return uuidRegex.test(id);
}

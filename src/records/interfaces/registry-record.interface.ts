/**
 * @fileoverview Registry Record Interfaces
 */

/**
 * One row of the source table: column name to literal cell text.
 *
 * Values are never coerced, so identifiers and phone numbers keep their
 * formatting (e.g. "123.456.789-00", "(11) 98765-4321"). Every record shares
 * the header-defined column set.
 */
export type RegistryRecord = Readonly<Record<string, string>>;

/**
 * PII Entity Types
 * Entity names shared by the built-in recognizers and the token format
 */

/**
 * Built-in entity types
 *
 * Pattern recognizers cover the structured types; PERSON, LOCATION,
 * DATE_TIME and NRP come from a host-supplied entity model.
 */
export enum PIIType {
  PERSON = "PERSON",
  LOCATION = "LOCATION",
  DATE_TIME = "DATE_TIME",
  NRP = "NRP",
  PHONE_NUMBER = "PHONE_NUMBER",
  EMAIL_ADDRESS = "EMAIL_ADDRESS",
  CREDIT_CARD = "CREDIT_CARD",
  IBAN = "IBAN",
  US_SSN = "US_SSN",
  IP_ADDRESS = "IP_ADDRESS",
  URL = "URL",
  /** Assigned to deny-list matches */
  GENERIC_PII = "GENERIC_PII",
}

/**
 * Normalizes a caller-supplied entity name ("phone_number " -> "PHONE_NUMBER")
 */
export function normalizeEntityType(name: string): string {
  return name.trim().toUpperCase();
}

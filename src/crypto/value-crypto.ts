/**
 * Value Crypto
 * AES-CBC encryption and SHA-256 digests for single detected values
 * Uses the Web Crypto API exposed by node:crypto
 */

import { webcrypto } from "node:crypto";
import { InvalidOperatorParamsError, MissingKeyError } from "../errors.js";

// ============================================================================
// Base64 Utility Functions
// ============================================================================

/**
 * Converts a Uint8Array to a Base64 string
 */
export function uint8ArrayToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/**
 * Converts a Base64 string to a Uint8Array
 */
export function base64ToUint8Array(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, "base64"));
}

// ============================================================================
// Encryption Configuration
// ============================================================================

/** Accepted AES key lengths in bytes */
export const AES_KEY_LENGTHS: readonly number[] = [16, 24, 32];

/** AES-CBC block and IV size in bytes */
export const AES_BLOCK_SIZE = 16;

/** Hex characters kept from a digest */
export const HASH_LENGTH = 8;

// ============================================================================
// Core Crypto Functions
// ============================================================================

/**
 * Turns a caller-supplied key into raw key bytes
 * Strings are taken as UTF-8
 */
export function parseEncryptionKey(key: string | Uint8Array | undefined): Uint8Array {
  if (key === undefined || key.length === 0) {
    throw new MissingKeyError();
  }

  const bytes = typeof key === "string" ? new TextEncoder().encode(key) : key;
  if (!AES_KEY_LENGTHS.includes(bytes.length)) {
    throw new InvalidOperatorParamsError(
      `Encryption key must be 16, 24 or 32 bytes, got ${bytes.length}`
    );
  }
  return bytes;
}

/**
 * Encrypts a value with AES-CBC under a fresh random IV
 * @returns Base64 of IV followed by ciphertext
 */
export async function encryptValue(value: string, key: Uint8Array): Promise<string> {
  const iv = new Uint8Array(AES_BLOCK_SIZE);
  webcrypto.getRandomValues(iv);

  const cryptoKey = await webcrypto.subtle.importKey(
    "raw",
    key,
    { name: "AES-CBC" },
    false,
    ["encrypt"]
  );

  const ciphertext = await webcrypto.subtle.encrypt(
    { name: "AES-CBC", iv },
    cryptoKey,
    new TextEncoder().encode(value)
  );

  const combined = new Uint8Array(iv.length + ciphertext.byteLength);
  combined.set(iv, 0);
  combined.set(new Uint8Array(ciphertext), iv.length);
  return uint8ArrayToBase64(combined);
}

/**
 * First 8 hex characters of the SHA-256 digest of a value
 */
export async function hashValue(value: string): Promise<string> {
  const digest = await webcrypto.subtle.digest(
    "SHA-256",
    new TextEncoder().encode(value)
  );
  return Array.from(new Uint8Array(digest), (b) => b.toString(16).padStart(2, "0"))
    .join("")
    .slice(0, HASH_LENGTH);
}

/**
 * Recognizers Module
 * Built-in pattern recognizers and the registry that holds them
 */

import { creditCardRecognizer } from "./credit-card.js";
import { emailRecognizer } from "./email.js";
import { ibanRecognizer } from "./iban.js";
import { ipAddressRecognizer } from "./ip-address.js";
import { phoneRecognizer } from "./phone.js";
import { RecognizerRegistry } from "./registry.js";
import { urlRecognizer } from "./url.js";
import { usSsnRecognizer } from "./us-ssn.js";
import type { Recognizer } from "./base.js";

export * from "./base.js";
export * from "./context.js";
export * from "./registry.js";
export * from "./phone.js";
export * from "./email.js";
export * from "./credit-card.js";
export * from "./iban.js";
export * from "./us-ssn.js";
export * from "./ip-address.js";
export * from "./url.js";
export * from "./deny-list.js";
export * from "./model.js";

/**
 * Built-in pattern recognizers
 */
export const BUILT_IN_RECOGNIZERS: readonly Recognizer[] = [
  phoneRecognizer,
  emailRecognizer,
  creditCardRecognizer,
  ibanRecognizer,
  usSsnRecognizer,
  ipAddressRecognizer,
  urlRecognizer,
];

export interface DefaultRegistryOptions {
  /** Additional recognizers, e.g. a ModelRecognizer for PERSON and LOCATION */
  extraRecognizers?: readonly Recognizer[];
}

/**
 * Creates a frozen registry holding the built-in recognizers
 */
export function createDefaultRegistry(
  options: DefaultRegistryOptions = {}
): RecognizerRegistry {
  const registry = new RecognizerRegistry();
  registry.registerAll(BUILT_IN_RECOGNIZERS);
  registry.registerAll(options.extraRecognizers ?? []);
  return registry.freeze();
}

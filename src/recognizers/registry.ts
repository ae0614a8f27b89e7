/**
 * Recognizer Registry
 * Maps entity types to the recognizers that report them
 *
 * Built once at startup, then frozen and shared read-only between requests.
 */

import { RegistryFrozenError } from "../errors.js";
import type { Recognizer } from "./base.js";

/**
 * A recognizer together with the requested entity types it should report
 */
export interface ResolvedRecognizer {
  recognizer: Recognizer;
  entities: string[];
}

export class RecognizerRegistry {
  private readonly recognizers = new Map<string, Recognizer[]>();
  private frozen = false;

  /**
   * Registers a recognizer for each entity type it supports
   */
  register(recognizer: Recognizer): void {
    this.assertMutable();
    for (const entityType of recognizer.supportedEntities) {
      const existing = this.recognizers.get(entityType) ?? [];
      if (!existing.includes(recognizer)) {
        existing.push(recognizer);
      }
      this.recognizers.set(entityType, existing);
    }
  }

  registerAll(recognizers: readonly Recognizer[]): void {
    for (const recognizer of recognizers) {
      this.register(recognizer);
    }
  }

  /**
   * Removes every recognizer registered for an entity type
   */
  unregister(entityType: string): void {
    this.assertMutable();
    this.recognizers.delete(entityType);
  }

  clear(): void {
    this.assertMutable();
    this.recognizers.clear();
  }

  getRecognizers(entityType: string): Recognizer[] {
    return [...(this.recognizers.get(entityType) ?? [])];
  }

  /**
   * All registered recognizers, each listed once
   */
  getAllRecognizers(): Recognizer[] {
    const unique = new Set<Recognizer>();
    for (const recognizers of this.recognizers.values()) {
      for (const recognizer of recognizers) {
        unique.add(recognizer);
      }
    }
    return Array.from(unique);
  }

  /**
   * Entity types with at least one recognizer, sorted
   */
  getSupportedEntities(): string[] {
    return Array.from(this.recognizers.keys()).sort();
  }

  hasRecognizer(entityType: string): boolean {
    return (this.recognizers.get(entityType)?.length ?? 0) > 0;
  }

  /**
   * Groups the recognizers needed for a set of entity types
   * @param entities - Requested types, or null for every registered type
   */
  resolve(entities: ReadonlySet<string> | null): ResolvedRecognizer[] {
    const wanted = entities ?? new Set(this.recognizers.keys());
    const resolved = new Map<Recognizer, string[]>();

    for (const entityType of wanted) {
      for (const recognizer of this.recognizers.get(entityType) ?? []) {
        const list = resolved.get(recognizer) ?? [];
        list.push(entityType);
        resolved.set(recognizer, list);
      }
    }

    return Array.from(resolved, ([recognizer, list]) => ({
      recognizer,
      entities: list,
    }));
  }

  /**
   * Makes the registry read-only
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError();
    }
  }
}

/**
 * Creates a new empty registry
 */
export function createRegistry(): RecognizerRegistry {
  return new RecognizerRegistry();
}

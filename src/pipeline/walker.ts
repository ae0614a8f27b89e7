/**
 * Structure Walker
 * Anonymizes every string leaf of a JSON value while keeping its shape
 *
 * Leaves are visited depth-first in key and array order, one at a time, so
 * counter tokens follow document order. All leaves of one call share a
 * single TokenCache.
 */

import { DepthExceededError, UnsupportedTypeError } from "../errors.js";
import type {
  JsonValue,
  StructureFinding,
  StructureStrategy,
} from "../types/index.js";
import type { DetectFn } from "./analyzer.js";
import { applyOperator } from "./operators.js";
import { TokenCache } from "./token-cache.js";

export const DEFAULT_MAX_DEPTH = 100;

export interface WalkOptions {
  detect: DetectFn;
  /** Token strategy (default: replace) */
  strategy?: StructureStrategy;
  /** Deepest allowed nesting; the root is depth 0 (default: 100) */
  maxDepth?: number;
}

export interface WalkResult {
  value: JsonValue;
  findings: StructureFinding[];
  /** Counter tokens issued per entity type */
  tokens: Record<string, number>;
}

export interface StructureStats {
  totalStrings: number;
  totalObjects: number;
  totalArrays: number;
  /** Numbers, booleans and nulls */
  totalPrimitives: number;
  maxDepth: number;
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Appends an object key to a JSON path ($.name or $["odd key"])
 */
export function childPath(path: string, key: string | number): string {
  if (typeof key === "number") {
    return `${path}[${key}]`;
  }
  return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}

class StructureWalker {
  private readonly cache = new TokenCache();
  readonly findings: StructureFinding[] = [];

  constructor(
    private readonly detect: DetectFn,
    private readonly strategy: StructureStrategy,
    private readonly maxDepth: number
  ) {}

  get tokens(): Record<string, number> {
    return this.cache.summary();
  }

  async visit(value: unknown, path: string, depth: number): Promise<JsonValue> {
    if (depth > this.maxDepth) {
      throw new DepthExceededError(this.maxDepth, path);
    }

    if (value === null || typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new UnsupportedTypeError(describeType(value), path);
      }
      return value;
    }
    if (typeof value === "string") {
      return this.visitString(value, path);
    }

    if (Array.isArray(value)) {
      const items: JsonValue[] = [];
      for (const [index, item] of value.entries()) {
        items.push(await this.visit(item, childPath(path, index), depth + 1));
      }
      return items;
    }

    if (typeof value === "object" && value !== null && isPlainObject(value)) {
      const entries: Array<[string, JsonValue]> = [];
      for (const [key, item] of Object.entries(value)) {
        entries.push([key, await this.visit(item, childPath(path, key), depth + 1)]);
      }
      return Object.fromEntries(entries);
    }

    throw new UnsupportedTypeError(describeType(value), path);
  }

  private async visitString(value: string, path: string): Promise<string> {
    const findings = await this.detect(value);
    if (findings.length === 0) {
      return value;
    }

    for (const finding of findings) {
      this.findings.push({ ...finding, path });
    }
    return applyOperator(value, findings, { kind: this.strategy }, this.cache);
  }
}

/**
 * Replaces PII in every string of a JSON value
 *
 * Object keys and non-string values are returned unchanged; the result has
 * the same nesting, keys and array lengths as the input.
 * @throws UnsupportedTypeError for values without a JSON representation
 * @throws DepthExceededError when nesting goes past maxDepth
 */
export async function anonymizeStructure(
  value: unknown,
  options: WalkOptions
): Promise<WalkResult> {
  const walker = new StructureWalker(
    options.detect,
    options.strategy ?? "replace",
    options.maxDepth ?? DEFAULT_MAX_DEPTH
  );
  const result = await walker.visit(value, "$", 0);
  return { value: result, findings: walker.findings, tokens: walker.tokens };
}

/**
 * Counts the nodes of a JSON value
 */
export function describeStructure(value: JsonValue): StructureStats {
  const stats: StructureStats = {
    totalStrings: 0,
    totalObjects: 0,
    totalArrays: 0,
    totalPrimitives: 0,
    maxDepth: 0,
  };

  const walk = (node: JsonValue, depth: number): void => {
    stats.maxDepth = Math.max(stats.maxDepth, depth);
    if (typeof node === "string") {
      stats.totalStrings++;
    } else if (Array.isArray(node)) {
      stats.totalArrays++;
      for (const item of node) walk(item, depth + 1);
    } else if (node !== null && typeof node === "object") {
      stats.totalObjects++;
      for (const item of Object.values(node)) walk(item, depth + 1);
    } else {
      stats.totalPrimitives++;
    }
  };

  walk(value, 0);
  return stats;
}

/**
 * Core Anonymizer Module
 * Ties detection, the operator engine and the structure walker together
 */

import {
  PIIType,
  createDefaultConfig,
  mergeConfig,
  normalizeEntityType,
  summarizeFindings,
  type AnalysisResult,
  type AnnotationResult,
  type Finding,
  type OperatorSpec,
  type RecognizerConfig,
  type RecognizerConfigInput,
  type StructureAnonymizationResult,
  type StructureStrategy,
  type TextAnonymizationResult,
} from "../types/index.js";
import { ConfigurationError } from "../errors.js";
import { formatIssues, recognizerConfigSchema } from "../config/schemas.js";
import type { Settings } from "../config/settings.js";
import {
  ModelRecognizer,
  createDefaultRegistry,
  type EntityModel,
  type RecognizerRegistry,
} from "../recognizers/index.js";
import { Analyzer } from "../pipeline/analyzer.js";
import { annotateText, applyOperator, parseOperatorSpec } from "../pipeline/operators.js";
import { TokenCache } from "../pipeline/token-cache.js";
import { DEFAULT_MAX_DEPTH, anonymizeStructure } from "../pipeline/walker.js";
import { createLogger, type Logger } from "../utils/logger.js";

/**
 * Anonymizer configuration
 */
export interface AnonymizerConfig {
  /**
   * Recognizers to run. Frozen on construction.
   * Default: the built-in pattern recognizers, plus entityModel when given
   */
  registry?: RecognizerRegistry;

  /**
   * External entity model (e.g. NER) for PERSON, LOCATION and similar types.
   * Ignored when a registry is supplied.
   */
  entityModel?: EntityModel;

  /**
   * Process-level settings, usually from loadSettings()
   */
  settings?: Settings;

  /**
   * Detection defaults every call's config is merged over
   */
  defaultConfig?: RecognizerConfigInput;

  /**
   * Deepest allowed nesting for structures (default: settings or 100)
   */
  maxDepth?: number;

  logger?: Logger;
}

/**
 * Options for structure anonymization
 */
export interface StructureOptions {
  /** Token strategy (default: replace) */
  strategy?: StructureStrategy;
}

/**
 * Anonymizer
 *
 * Holds only read-only state (registry, defaults, logger). Token caches and
 * findings are created per call, so one instance can serve concurrent
 * requests.
 */
export class Anonymizer {
  private readonly registry: RecognizerRegistry;
  private readonly analyzer: Analyzer;
  private readonly defaultConfig: RecognizerConfig;
  private readonly maxDepth: number;
  private readonly logger: Logger;

  constructor(config: AnonymizerConfig = {}) {
    const settings = config.settings;
    this.logger = config.logger ?? createLogger("Anonymizer", settings?.logLevel ?? "info");

    this.registry =
      config.registry ??
      createDefaultRegistry({
        extraRecognizers:
          config.entityModel !== undefined ? [new ModelRecognizer(config.entityModel)] : [],
      });
    this.registry.freeze();

    this.analyzer = new Analyzer(this.registry, this.logger);
    this.maxDepth = config.maxDepth ?? settings?.maxDepth ?? DEFAULT_MAX_DEPTH;

    let base = createDefaultConfig();
    if (settings !== undefined) {
      base = mergeConfig(base, {
        entities: this.supportedDefaultEntities(settings.defaultEntities),
        scoreThreshold: settings.scoreThreshold,
      });
    }
    this.defaultConfig = mergeConfig(base, this.validateConfig(config.defaultConfig));
  }

  /**
   * Detects PII without changing the text
   */
  async analyze(text: string, config?: RecognizerConfigInput): Promise<AnalysisResult> {
    const findings = await this.detect(text, config);
    return { text, findings, summary: summarizeFindings(findings) };
  }

  /**
   * Detects PII in text and applies an operator to every finding
   * @param operator - Default: replace with counter tokens
   */
  async anonymizeText(
    text: string,
    config?: RecognizerConfigInput,
    operator: OperatorSpec = { kind: "replace" }
  ): Promise<TextAnonymizationResult> {
    const resolved = parseOperatorSpec(operator);
    const findings = await this.detect(text, config);
    const anonymizedText = await applyOperator(text, findings, resolved, new TokenCache());

    this.logger.debug("Anonymized text", {
      operator: resolved.kind,
      findings: findings.length,
    });

    return {
      anonymizedText,
      operator: resolved.kind,
      findings,
      summary: summarizeFindings(findings),
    };
  }

  /**
   * Replaces PII in every string of a JSON value with tokens
   * Repeated values share a token within the call
   */
  async anonymizeStructure(
    value: unknown,
    config?: RecognizerConfigInput,
    options: StructureOptions = {}
  ): Promise<StructureAnonymizationResult> {
    const effective = this.resolveConfig(config);
    const result = await anonymizeStructure(value, {
      detect: (text) => this.analyzer.detect(text, effective),
      strategy: options.strategy ?? "replace",
      maxDepth: this.maxDepth,
    });

    this.logger.debug("Anonymized structure", {
      strategy: options.strategy ?? "replace",
      findings: result.findings.length,
      tokens: result.tokens,
    });

    return {
      anonymizedValue: result.value,
      findings: result.findings,
      summary: summarizeFindings(result.findings),
    };
  }

  /**
   * Splits text into plain and PII segments for highlighting
   */
  async annotate(text: string, config?: RecognizerConfigInput): Promise<AnnotationResult> {
    const findings = await this.detect(text, config);
    return {
      text,
      annotations: annotateText(text, findings),
      summary: summarizeFindings(findings),
    };
  }

  /**
   * Entity types a caller may request, sorted
   */
  listSupportedEntities(): string[] {
    const entities = new Set(this.registry.getSupportedEntities());
    entities.add(PIIType.GENERIC_PII);
    return Array.from(entities).sort();
  }

  /**
   * Gets the recognizer registry
   */
  getRegistry(): RecognizerRegistry {
    return this.registry;
  }

  private detect(text: string, config?: RecognizerConfigInput): Promise<Finding[]> {
    return this.analyzer.detect(text, this.resolveConfig(config));
  }

  private resolveConfig(config?: RecognizerConfigInput): RecognizerConfig {
    if (config === undefined) {
      return this.defaultConfig;
    }
    return mergeConfig(this.defaultConfig, this.validateConfig(config));
  }

  /**
   * Checks a caller config's shape and entity names
   * @throws ConfigurationError
   */
  private validateConfig(config: RecognizerConfigInput = {}): RecognizerConfigInput {
    const parsed = recognizerConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid detection config: ${formatIssues(parsed.error)}`);
    }

    const entities = parsed.data.entities;
    if (entities !== undefined && entities !== null) {
      const supported = new Set(this.listSupportedEntities());
      const unknown = entities
        .map(normalizeEntityType)
        .filter((entity) => !supported.has(entity));
      if (unknown.length > 0) {
        throw new ConfigurationError(
          `Unsupported entities: ${unknown.join(", ")}. Supported: ${Array.from(supported).join(", ")}`
        );
      }
    }

    return parsed.data;
  }

  /**
   * Narrows configured default entities to the registered ones
   * Falls back to every registered type when none of them is registered
   */
  private supportedDefaultEntities(entities: string[] | null): string[] | null {
    if (entities === null) {
      return null;
    }
    const supported = new Set(this.listSupportedEntities());
    const dropped = entities.filter((entity) => !supported.has(entity));
    if (dropped.length > 0) {
      this.logger.warn("Default entities without a recognizer are ignored", { dropped });
    }

    const kept = entities.filter((entity) => supported.has(entity));
    if (kept.length === 0) {
      this.logger.warn("No default entity has a recognizer, detecting all registered types");
      return null;
    }
    return kept;
  }
}

/**
 * Creates an anonymizer with the specified configuration
 *
 * @example
 * ```typescript
 * // Pattern recognizers only
 * const anonymizer = createAnonymizer();
 *
 * // With an NER engine for names and places
 * const anonymizer = createAnonymizer({ entityModel: myNerModel });
 *
 * const { anonymizedValue } = await anonymizer.anonymizeStructure(payload);
 * ```
 */
export function createAnonymizer(config?: AnonymizerConfig): Anonymizer {
  return new Anonymizer(config);
}

/**
 * Model Recognizer
 * Adapts a host-supplied entity model (e.g. an NER engine) to the Recognizer contract
 */

import { DetectionEngineError } from "../errors.js";
import type { RecognizerResult } from "../types/index.js";
import type { Recognizer } from "./base.js";

/**
 * A single prediction from an entity model
 */
export interface EntityPrediction {
  entityType: string;
  start: number;
  end: number;
  score: number;
  /** Extra fields carried into the finding's explanation */
  explanation?: Readonly<Record<string, unknown>>;
}

/**
 * Interface of an external entity detection engine
 */
export interface EntityModel {
  readonly name: string;
  readonly supportedEntities: readonly string[];
  predict(
    text: string,
    entities: readonly string[]
  ): EntityPrediction[] | Promise<EntityPrediction[]>;
}

export class ModelRecognizer implements Recognizer {
  readonly name: string;
  readonly supportedEntities: readonly string[];

  constructor(private readonly model: EntityModel) {
    this.name = model.name;
    this.supportedEntities = [...model.supportedEntities];
  }

  async analyze(text: string, entities: readonly string[]): Promise<RecognizerResult[]> {
    const predictions = await this.model.predict(text, entities);

    return predictions
      .filter((prediction) => entities.includes(prediction.entityType))
      .map((prediction) => {
        const { entityType, start, end, score } = prediction;
        if (
          !Number.isInteger(start) ||
          !Number.isInteger(end) ||
          start < 0 ||
          end > text.length ||
          start >= end
        ) {
          throw new DetectionEngineError(
            `Model ${this.name} returned an invalid span [${start}, ${end}) for ${entityType}`
          );
        }

        return {
          entityType,
          start,
          end,
          score: Math.min(1, Math.max(0, score)),
          explanation: {
            ...prediction.explanation,
            recognizer: this.name,
            originalScore: score,
          },
        };
      });
  }
}

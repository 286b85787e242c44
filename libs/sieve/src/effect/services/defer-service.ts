import { Context, Effect, Layer } from "effect";

import type {
  DeferIndexesOptions,
  DeferralResult,
  Section,
  SectionSnapshot,
} from "../contracts/index.js";
import { decodeSectionSnapshotEffect } from "../contracts/validators.js";
import { deferIndexes, splitIndexes } from "../defer/split-indexes.js";
import type { ContractValidationError, TableNameNotFoundError } from "../errors.js";
import { ConfigServiceTag } from "./config-service.js";
import { LoggerServiceTag, type LoggerService } from "./logger-service.js";

export interface DeferService {
  readonly splitIndexes: (
    section: Section,
    options?: DeferIndexesOptions,
  ) => Effect.Effect<string, TableNameNotFoundError>;
  readonly deferIndexes: (
    snapshot: SectionSnapshot,
    options?: DeferIndexesOptions,
  ) => Effect.Effect<DeferralResult, TableNameNotFoundError>;
  readonly decodeSection: (input: unknown) => Effect.Effect<SectionSnapshot, ContractValidationError>;
}

export const DeferServiceTag = Context.GenericTag<DeferService>("@dumpsieve/effect/DeferService");

export interface DeferServiceOptions {
  readonly deferConstraints: boolean;
  readonly logger: LoggerService;
}

export const makeDeferService = ({ deferConstraints, logger }: DeferServiceOptions): DeferService => {
  const withDefaults = (options: DeferIndexesOptions = {}): DeferIndexesOptions => ({
    deferConstraints: options.deferConstraints ?? deferConstraints,
  });

  return {
    splitIndexes: (section, options) =>
      splitIndexes(section, withDefaults(options)).pipe(
        Effect.provideService(LoggerServiceTag, logger),
      ),
    deferIndexes: (snapshot, options) =>
      deferIndexes(snapshot, withDefaults(options)).pipe(
        Effect.provideService(LoggerServiceTag, logger),
      ),
    decodeSection: decodeSectionSnapshotEffect,
  };
};

export const makeDeferLayer = Layer.effect(
  DeferServiceTag,
  Effect.gen(function* () {
    const config = yield* ConfigServiceTag;
    const logger = yield* LoggerServiceTag;

    return makeDeferService({ deferConstraints: config.get("deferConstraints"), logger });
  }),
);

import { Effect, ParseResult, Schema } from "effect";

import { SectionSnapshotSchema } from "./section.js";
import { ContractValidationError } from "../errors.js";

type SchemaWithoutContext<A, I = A> = Schema.Schema<A, I, never>;

const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

export const decodeUnknownEffect = <A, I>(schema: SchemaWithoutContext<A, I>, contract: string) => {
  const decode = Schema.decodeUnknown(schema);

  return (input: unknown): Effect.Effect<A, ContractValidationError> =>
    decode(input).pipe(
      Effect.mapError(
        (error) =>
          new ContractValidationError({
            contract,
            message: `Contract validation failed for ${contract}`,
            details: formatParseError(error),
          }),
      ),
    );
};

export const decodeSectionSnapshotEffect = decodeUnknownEffect(
  SectionSnapshotSchema,
  "SectionSnapshot",
);

import { Schema } from "effect";

export class ContractValidationError extends Schema.TaggedError<ContractValidationError>()(
  "ContractValidationError",
  {
    contract: Schema.String,
    message: Schema.String,
    details: Schema.String,
  },
) {}

export class TableNameNotFoundError extends Schema.TaggedError<TableNameNotFoundError>()(
  "TableNameNotFoundError",
  {
    database: Schema.String,
    table: Schema.String,
    ddl: Schema.String,
    message: Schema.String,
  },
) {}

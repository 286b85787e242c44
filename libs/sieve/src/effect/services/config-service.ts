import { Context, Layer, ParseResult, Schema } from "effect";

export const RuntimeLogLevelSchema = Schema.Literal("debug", "info", "warn", "error");
export type RuntimeLogLevel = Schema.Schema.Type<typeof RuntimeLogLevelSchema>;

// Environment flags arrive as text; only the two literal spellings decode.
export const BooleanFlagSchema = Schema.transform(Schema.Literal("true", "false"), Schema.Boolean, {
  strict: true,
  decode: (flag) => flag === "true",
  encode: (value) => (value ? "true" : "false"),
});

export const RuntimeConfigSchema = Schema.Struct({
  serviceName: Schema.NonEmptyTrimmedString,
  logLevel: RuntimeLogLevelSchema,
  deferConstraints: BooleanFlagSchema,
});

export type RuntimeConfig = Schema.Schema.Type<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = Schema.Schema.Encoded<typeof RuntimeConfigSchema>;

export const runtimeConfigInputDefaults: RuntimeConfigInput = {
  serviceName: "dumpsieve",
  logLevel: "info",
  deferConstraints: "false",
};

export const decodeRuntimeConfigSync = Schema.decodeUnknownSync(RuntimeConfigSchema);
export const decodeRuntimeConfigEither = Schema.decodeUnknownEither(RuntimeConfigSchema);

export const formatRuntimeConfigParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

export const runtimeConfigDefaults: RuntimeConfig = decodeRuntimeConfigSync(runtimeConfigInputDefaults);

export interface RuntimeConfigEnvRecord {
  readonly [key: string]: string | undefined;
}

export type RuntimeConfigEnvKeys = { readonly [K in keyof RuntimeConfigInput]: string };

export const defaultRuntimeConfigEnvKeys: RuntimeConfigEnvKeys = {
  serviceName: "DUMPSIEVE_SERVICE_NAME",
  logLevel: "DUMPSIEVE_LOG_LEVEL",
  deferConstraints: "DUMPSIEVE_DEFER_CONSTRAINTS",
};

export interface RuntimeConfigFromEnvOptions {
  readonly defaults?: Partial<RuntimeConfigInput>;
  readonly keys?: Partial<RuntimeConfigEnvKeys>;
}

/** Blank values count as unset. Level and flag are matched case-insensitively. */
const readEnvValue = (env: RuntimeConfigEnvRecord, key: string): string | undefined => {
  const trimmed = env[key]?.trim();
  return trimmed === undefined || trimmed.length === 0 ? undefined : trimmed;
};

export const runtimeConfigInputFromEnv = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
): Record<keyof RuntimeConfigInput, string> => {
  const keys = { ...defaultRuntimeConfigEnvKeys, ...options.keys };
  const base = { ...runtimeConfigInputDefaults, ...options.defaults };

  return {
    serviceName: readEnvValue(env, keys.serviceName) ?? base.serviceName,
    logLevel: readEnvValue(env, keys.logLevel)?.toLowerCase() ?? base.logLevel,
    deferConstraints:
      readEnvValue(env, keys.deferConstraints)?.toLowerCase() ?? base.deferConstraints,
  };
};

export const decodeRuntimeConfigFromEnvSync = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
): RuntimeConfig => decodeRuntimeConfigSync(runtimeConfigInputFromEnv(env, options));

export const decodeRuntimeConfigFromEnvEither = (
  env: RuntimeConfigEnvRecord,
  options: RuntimeConfigFromEnvOptions = {},
) => decodeRuntimeConfigEither(runtimeConfigInputFromEnv(env, options));

export interface ConfigService {
  readonly get: <K extends keyof RuntimeConfig>(key: K) => RuntimeConfig[K];
  readonly getAll: () => RuntimeConfig;
}

export const ConfigServiceTag = Context.GenericTag<ConfigService>("@dumpsieve/effect/ConfigService");

export const makeConfigService = (config: RuntimeConfig): ConfigService => ({
  get: (key) => config[key],
  getAll: () => config,
});

export const makeConfigLayer = (config: RuntimeConfig): Layer.Layer<ConfigService> =>
  Layer.succeed(ConfigServiceTag, makeConfigService(config));

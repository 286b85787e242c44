import { Layer } from "effect";

import {
  decodeRuntimeConfigFromEnvSync,
  makeConfigLayer,
  type RuntimeConfigEnvRecord,
  type RuntimeConfigFromEnvOptions,
  type RuntimeConfig,
} from "./services/config-service.js";
import { makeDeferLayer } from "./services/defer-service.js";
import {
  deterministicTestLoggerLayer,
  makeLoggerLayer,
  type LoggerService,
} from "./services/logger-service.js";

export const deterministicTestConfig: RuntimeConfig = {
  serviceName: "dumpsieve-test",
  logLevel: "debug",
  deferConstraints: false,
};

const withDeferService = (config: RuntimeConfig, loggerLayer: Layer.Layer<LoggerService>) =>
  makeDeferLayer.pipe(Layer.provideMerge(Layer.mergeAll(makeConfigLayer(config), loggerLayer)));

export const runtimeLayerFromConfig = (config: RuntimeConfig) =>
  withDeferService(config, makeLoggerLayer(config.logLevel));

export const runtimeLayerFromEnv = (
  env: RuntimeConfigEnvRecord = process.env,
  options: RuntimeConfigFromEnvOptions = {},
) => runtimeLayerFromConfig(decodeRuntimeConfigFromEnvSync(env, options));

export interface DeterministicRuntimeLayerOptions {
  readonly config?: RuntimeConfig;
  readonly loggerLayer?: Layer.Layer<LoggerService>;
}

export const deterministicRuntimeLayer = (options: DeterministicRuntimeLayerOptions = {}) =>
  withDeferService(
    options.config ?? deterministicTestConfig,
    options.loggerLayer ?? deterministicTestLoggerLayer,
  );

import { Config, Context, Effect, Layer, Option, type ConfigError } from 'effect'

export interface DeriveConfigShape {
  /** Module specifier generated code imports Key, Value, StringValue and KeyValue from. */
  readonly modelModule: string
  /** Suffix that replaces `.ts` in the companion module's file name. */
  readonly outSuffix: string
}

export interface DeriveConfigSnapshot extends DeriveConfigShape {
  readonly source: 'service' | 'config'
}

export class DeriveConfigTag extends Context.Tag('@otel-derive/engine/DeriveConfig')<DeriveConfigTag, DeriveConfigShape>() {}

export const DEFAULT_DERIVE_CONFIG: DeriveConfigShape = {
  modelModule: '@otel-derive/model',
  outSuffix: '.otel.ts',
}

const DeriveConfigFromEnv = {
  modelModule: Config.string('OTEL_DERIVE_MODEL_MODULE').pipe(Config.withDefault(DEFAULT_DERIVE_CONFIG.modelModule)),
  outSuffix: Config.string('OTEL_DERIVE_OUT_SUFFIX').pipe(Config.withDefault(DEFAULT_DERIVE_CONFIG.outSuffix)),
}

/** The service when one is provided, otherwise `OTEL_DERIVE_*` from the ConfigProvider with defaults. */
const resolveDeriveConfig: Effect.Effect<DeriveConfigSnapshot, ConfigError.ConfigError> = Effect.gen(function* () {
  const current = yield* Effect.serviceOption(DeriveConfigTag)
  if (Option.isSome(current)) {
    return { ...current.value, source: 'service' } satisfies DeriveConfigSnapshot
  }
  const fromEnv = yield* Config.all(DeriveConfigFromEnv)
  return { ...fromEnv, source: 'config' } satisfies DeriveConfigSnapshot
})

export const DeriveConfig = {
  tag: DeriveConfigTag,

  /**
   * Layers `config` over whatever is already provided, or over the values read
   * from the active ConfigProvider when nothing is.
   */
  replace(config: Partial<DeriveConfigShape>): Layer.Layer<DeriveConfigTag, ConfigError.ConfigError> {
    return Layer.effect(
      DeriveConfigTag,
      Effect.gen(function* () {
        const current = yield* Effect.serviceOption(DeriveConfigTag)
        const base = Option.isSome(current) ? current.value : yield* Config.all(DeriveConfigFromEnv)
        return { ...base, ...config }
      }),
    )
  },

  resolve: (): Effect.Effect<DeriveConfigSnapshot, ConfigError.ConfigError> => resolveDeriveConfig,
}

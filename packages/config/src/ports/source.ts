/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in `loadConfig`, and
 * later sources override earlier ones. A key mapped to `undefined` counts as
 * not provided.
 */
export interface ConfigSource {
  /** Shown by `IConfig.explain()`, e.g. `"env"` or `"object:overrides"`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}

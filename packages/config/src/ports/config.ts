/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     BACKEND: z.enum(["memory", "redis"]).default("memory"),
 *     REDIS_URL: z.string().optional(),
 *   }),
 *   sources: [new EnvSource({ prefix: "CACHE_" })],
 * })
 *
 * config.get("BACKEND")      // "redis"
 * config.explain("BACKEND")  // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or `"default"`
   * when the schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value, without duplicates. */
  sourcesUsed(): string[]

  /** Keys that sources provided but the schema does not define (typos, stale settings). */
  extras(): string[]
}

import { z } from "zod"

export const backendKinds = ["memory", "bounded-memory", "redis", "sqlite"] as const
export const serializerKinds = ["json", "string", "passthrough"] as const

const common = {
  namespace: z.string().default(""),
  /** Absent or `0`: entries do not expire unless a call passes a TTL. */
  ttlSeconds: z.number().nonnegative().optional(),
  timeoutMs: z.number().int().nonnegative().default(5000),
  serializer: z.enum(serializerKinds).default("json"),
}

export const memoryConfigSchema = z.object({
  backend: z.literal("memory"),
  ...common,
})

export const boundedMemoryConfigSchema = z.object({
  backend: z.literal("bounded-memory"),
  ...common,
  maxSizeMb: z.number().positive().default(64),
  raiseOnOversize: z.boolean().default(false),
  evictionPolicy: z.enum(["lru", "fifo"]).default("lru"),
})

export const redisConfigSchema = z.object({
  backend: z.literal("redis"),
  ...common,
  url: z.string().default("redis://localhost:6379"),
  batchSize: z.number().int().positive().default(1000),
})

export const sqliteConfigSchema = z.object({
  backend: z.literal("sqlite"),
  ...common,
  filename: z.string().default(":memory:"),
})

export const cacheConfigSchema = z.discriminatedUnion("backend", [
  memoryConfigSchema,
  boundedMemoryConfigSchema,
  redisConfigSchema,
  sqliteConfigSchema,
])

/** Layers fastest first. Unset top-level fields come from the first layer. */
export const layeredCacheConfigSchema = z.object({
  layers: z.array(cacheConfigSchema).min(1),
  namespace: z.string().optional(),
  ttlSeconds: z.number().nonnegative().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
})

export type BackendKind = (typeof backendKinds)[number]
export type SerializerKind = (typeof serializerKinds)[number]

export type CacheConfig = z.output<typeof cacheConfigSchema>
export type CacheConfigInput = z.input<typeof cacheConfigSchema>
export type LayeredCacheConfig = z.output<typeof layeredCacheConfigSchema>
export type LayeredCacheConfigInput = z.input<typeof layeredCacheConfigSchema>

export type BackendConfig<K extends BackendKind> = Extract<CacheConfig, { backend: K }>

import { createClient, RESP_TYPES } from "redis"

export type RedisArgument = string | Buffer

export type RedisSetOptions = {
  PX?: number
  NX?: true
}

/**
 * The slice of the node-redis client the backend uses, with bulk strings
 * mapped to `Buffer` so binary values survive untouched. Works the same
 * against Valkey.
 */
export type RedisCacheClient = {
  isOpen: boolean
  connect(): Promise<unknown>
  close(): Promise<void>

  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  set(key: string, value: RedisArgument, opts?: RedisSetOptions): Promise<string | null>
  exists(keys: string | string[]): Promise<number>
  incrBy(key: string, increment: number): Promise<number>
  pExpire(key: string, ms: number): Promise<number>
  persist(key: string): Promise<number>
  del(keys: string | string[]): Promise<number>
  unlink(keys: string | string[]): Promise<number>
  flushDb(): Promise<string>
  scanIterator(opts: { MATCH: string; COUNT?: number }): AsyncIterable<RedisArgument[]>
  eval(script: string, opts: { keys: string[]; arguments: RedisArgument[] }): Promise<unknown>
  sendCommand(args: RedisArgument[]): Promise<unknown>

  multi(): {
    set(key: string, value: RedisArgument, opts?: RedisSetOptions): unknown
    exec(): Promise<unknown>
  }
}

export function createRedisCacheClient(url: string): RedisCacheClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisCacheClient
}

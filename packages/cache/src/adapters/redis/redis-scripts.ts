/**
 * KEYS[1] key, ARGV[1] expected value, ARGV[2] new value, ARGV[3] ttl in ms
 * (`0` for none). Returns 1 if written.
 */
export const CAS_SET_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  if tonumber(ARGV[3]) > 0 then
    redis.call("SET", KEYS[1], ARGV[2], "PX", ARGV[3])
  else
    redis.call("SET", KEYS[1], ARGV[2])
  end
  return 1
end
return 0
`

/** KEYS[1] key, ARGV[1] expected value. Returns 1 if deleted. */
export const COMPARE_AND_DELETE_SCRIPT = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`

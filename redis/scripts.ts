// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Atomic lease grant. Expiry is Redis-side (PX), so an expired lease frees
 * the name without any cleanup pass.
 *
 * @returns 1 on grant, 0 while another unexpired lease holds the name
 *
 * KEYS: [lockKey, leaseIdKey, statsKey]
 * ARGV: [leaseId, ttlMs, countContention] - "1" on the first attempt of a request
 */
export const ACQUIRE_SCRIPT = `
local lockKey = KEYS[1]
local leaseIdKey = KEYS[2]
local statsKey = KEYS[3]
local leaseId = ARGV[1]
local ttlMs = tonumber(ARGV[2])
local countContention = ARGV[3] == '1'

if not redis.call('SET', lockKey, leaseId, 'NX', 'PX', ttlMs) then
  if countContention then
    redis.call('HINCRBY', statsKey, 'contended', 1)
  end
  return 0
end
-- Reverse index shares the lock's TTL
redis.call('SET', leaseIdKey, lockKey, 'PX', ttlMs)
redis.call('HINCRBY', statsKey, 'acquired', 1)
return 1
`;

/**
 * Atomic validity extension with ownership verification.
 * Flow: reverse lookup → verify lease id → reset TTL on both keys
 *
 * @returns 1 on success, 0 when the lease is unknown or expired
 *
 * KEYS: [leaseIdKey, statsKey]
 * ARGV: [leaseId, ttlMs]
 */
export const UPDATE_SCRIPT = `
local leaseIdKey = KEYS[1]
local statsKey = KEYS[2]
local leaseId = ARGV[1]
local ttlMs = tonumber(ARGV[2])

local lockKey = redis.call('GET', leaseIdKey)
if not lockKey or redis.call('GET', lockKey) ~= leaseId then
  redis.call('HINCRBY', statsKey, 'missed', 1)
  return 0
end
redis.call('PEXPIRE', lockKey, ttlMs)
redis.call('PEXPIRE', leaseIdKey, ttlMs)
redis.call('HINCRBY', statsKey, 'updated', 1)
return 1
`;

/**
 * Atomic release with ownership verification.
 * Flow: reverse lookup → verify lease id → delete both keys
 *
 * @returns 1 on success, 0 when the lease is unknown or expired
 *
 * KEYS: [leaseIdKey, statsKey]
 * ARGV: [leaseId]
 */
export const RELEASE_SCRIPT = `
local leaseIdKey = KEYS[1]
local statsKey = KEYS[2]
local leaseId = ARGV[1]

local lockKey = redis.call('GET', leaseIdKey)
if not lockKey or redis.call('GET', lockKey) ~= leaseId then
  redis.call('HINCRBY', statsKey, 'missed', 1)
  return 0
end
redis.call('DEL', lockKey, leaseIdKey)
redis.call('HINCRBY', statsKey, 'released', 1)
return 1
`;

export {
  type Memoized,
  type MemoizingCacheDeps,
  type MemoizingCacheOptions,
  MemoryMemoizingCache,
  memoize,
} from "./adapters/memory/memory-memoizing-cache"
export { MemoError, type MemoErrorCode } from "./core/memo-error"
export { memoizeSync } from "./core/memoize-sync"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { ComputeFn, MemoizingCache, MemoStats } from "./ports/memoizing-cache"

export type CachedRecord<T> = {
  kind: "record"
  value: T
}

/** The source of truth was checked earlier and had nothing for this key. */
export type NegativeResult = {
  kind: "negative"
}

export type AbsentResult = {
  kind: "absent"
}

export type CacheResult<T> = CachedRecord<T> | NegativeResult | AbsentResult

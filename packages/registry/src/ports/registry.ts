export type Factory<T> = () => T

/** Any class or function that metadata can be attached to. */
export type MetadataTarget =
  | (abstract new (...args: never[]) => unknown)
  | ((...args: never[]) => unknown)

export type TaggedTarget<M> = {
  /** The target's `name` */
  name: string
  metadata: M
}

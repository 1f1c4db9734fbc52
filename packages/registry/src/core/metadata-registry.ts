import type { MetadataTarget, TaggedTarget } from "../ports/registry"

/**
 * Static metadata attached to classes or functions by explicit registration.
 * Targets are held weakly.
 *
 * @example
 * ```ts
 * const important = new MetadataRegistry<{ value: string }>()
 * important.tag(AnnotatedClass, { value: "This is important" })
 *
 * important.scan(AnnotatedClass, PlainClass)
 * // [{ name: "AnnotatedClass", metadata: { value: "This is important" } }]
 * ```
 */
export class MetadataRegistry<M> {
  private readonly tags = new WeakMap<MetadataTarget, { metadata: M }>()

  /** Attach `metadata` to `target`, replacing any earlier tag. */
  tag(target: MetadataTarget, metadata: M): this {
    this.tags.set(target, { metadata })
    return this
  }

  get(target: MetadataTarget): M | undefined {
    return this.tags.get(target)?.metadata
  }

  isTagged(target: MetadataTarget): boolean {
    return this.tags.has(target)
  }

  /** Tagged targets among `targets`, in the order given. */
  scan(...targets: MetadataTarget[]): TaggedTarget<M>[] {
    const found: TaggedTarget<M>[] = []

    for (const target of targets) {
      const entry = this.tags.get(target)
      if (entry) found.push({ name: target.name, metadata: entry.metadata })
    }

    return found
  }
}

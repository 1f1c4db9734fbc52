import { createNullLogger, type Logger } from "@strata/logger"
import type { Factory } from "../ports/registry"
import { RegistryError } from "./registry-error"

export type FactoryRegistryDeps = {
  logger?: Logger
}

type FactoryTable<TMap> = { [Id in keyof TMap]?: Factory<TMap[Id]> }

/**
 * Explicit table from a type id to a zero-argument factory.
 *
 * @example
 * ```ts
 * const registry = new FactoryRegistry<{ person: Person }>()
 *   .register("person", () => new Person("Alice"))
 *
 * registry.create("person").greet()
 * ```
 */
export class FactoryRegistry<TMap extends Record<string, unknown>> {
  private readonly factories: FactoryTable<TMap> = {}
  private readonly registered = new Set<string>()
  private readonly logger: Logger

  constructor(deps: FactoryRegistryDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "registry" })
  }

  /** @throws RegistryError `factory_already_registered` */
  register<Id extends keyof TMap & string>(id: Id, factory: Factory<TMap[Id]>): this {
    if (this.has(id)) throw RegistryError.alreadyRegistered(id)

    this.factories[id] = factory
    this.registered.add(id)

    return this
  }

  /**
   * Build a new instance.
   *
   * @throws RegistryError `factory_not_registered`, or `factory_failed` with
   * the factory's error as `cause`
   */
  create<Id extends keyof TMap & string>(id: Id): TMap[Id] {
    const factory = this.has(id) ? this.factories[id] : undefined
    if (!factory) throw RegistryError.notRegistered(id)

    try {
      return factory()
    } catch (err) {
      throw RegistryError.factoryFailed(id, err)
    }
  }

  /** Like `create()`, but logs the failure and returns undefined. */
  tryCreate<Id extends keyof TMap & string>(id: Id): TMap[Id] | undefined {
    try {
      return this.create(id)
    } catch (err) {
      this.logger.warn("Could not create instance", { id, err })
      return undefined
    }
  }

  has(id: string): boolean {
    return this.registered.has(id)
  }

  /** Registered ids, in registration order */
  ids(): readonly string[] {
    return [...this.registered]
  }
}

import { FactoryRegistry } from "@strata/registry"
import { Person } from "../model/person"
import type { DemoSection } from "../section"

export const registrySection: DemoSection = {
  name: "registry",
  run: ({ services }) => {
    const registry = new FactoryRegistry<{ person: Person }>({ logger: services.logger }).register(
      "person",
      () => new Person(),
    )

    const person = registry.tryCreate("person")

    return [`Registry create Person: present? ${person !== undefined}`]
  },
}

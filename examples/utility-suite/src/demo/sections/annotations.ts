import { bigFib } from "../model/fibonacci"
import { important } from "../model/important"
import { Person } from "../model/person"
import type { DemoSection } from "../section"

export const annotationsSection: DemoSection = {
  name: "annotations",
  run: () =>
    important
      .scan(Person, bigFib)
      .map(({ name, metadata }) => `[Important] ${name} - ${metadata.value}`),
}

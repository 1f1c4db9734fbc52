import { MetadataRegistry } from "@strata/registry"

export type Important = {
  value: string
}

/** Classes and functions flagged as important, with a short note. */
export const important = new MetadataRegistry<Important>()

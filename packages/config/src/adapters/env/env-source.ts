import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only keys with this prefix are read, with the prefix stripped. */
  prefix?: string

  /** Default: `process.env` */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const { prefix } = this
    if (!prefix) return { ...this.env }

    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(prefix)) {
        filtered[key.slice(prefix.length)] = value
      }
    }

    return filtered
  }
}

import type { AppContext } from "../app/create-context"

/** One part of the demo; returns the report lines it produced. */
export type DemoSection = {
  name: string
  run: (ctx: AppContext) => string[] | Promise<string[]>
}

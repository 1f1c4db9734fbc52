export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export type { FlightResult, FlightSource, Singleflight } from "./ports/single-flight"

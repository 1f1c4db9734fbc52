export { type EditDistanceOptions, editDistance } from "./core/edit-distance"
export { levenshtein } from "./core/levenshtein"
export { titleCase } from "./core/title-case"

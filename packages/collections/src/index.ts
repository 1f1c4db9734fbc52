export { partition, partitionCount } from "./core/partition"

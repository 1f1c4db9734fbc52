import { BaseError } from "@strata/errors"

export type RegistryErrorCode =
  | "factory_already_registered"
  | "factory_not_registered"
  | "factory_failed"

export class RegistryError extends BaseError<RegistryErrorCode> {
  static alreadyRegistered(id: string): RegistryError {
    return new RegistryError("A factory is already registered for this id", {
      code: "factory_already_registered",
      context: { id },
    })
  }

  static notRegistered(id: string): RegistryError {
    return new RegistryError("No factory registered for this id", {
      code: "factory_not_registered",
      context: { id },
    })
  }

  static factoryFailed(id: string, cause: unknown): RegistryError {
    return new RegistryError("Factory threw while creating an instance", {
      code: "factory_failed",
      context: { id },
      cause,
    })
  }
}

import { important } from "./important"

export class Person {
  constructor(
    readonly name: string = "Ada",
    readonly age: number = 36,
  ) {}
}

important.tag(Person, { value: "Data Model" })

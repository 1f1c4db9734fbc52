export type Circle = {
  readonly kind: "circle"
  readonly radius: number
}

export type Rectangle = {
  readonly kind: "rectangle"
  readonly width: number
  readonly height: number
}

/** Closed set of shapes; switch on `kind`. */
export type Shape = Circle | Rectangle

export type ShapeKind = Shape["kind"]

/** n-th Fibonacci number, exact for any n. */
export function bigFib(n: number): bigint {
  let a = 0n
  let b = 1n

  for (let i = 0; i < n; i++) {
    ;[a, b] = [b, a + b]
  }

  return a
}

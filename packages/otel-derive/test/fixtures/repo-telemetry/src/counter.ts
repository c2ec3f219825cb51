/**
 * @derive Value
 * @otel(variant = i64)
 */
export class Counter {
  constructor(readonly count: number) {}
}

export const counterIntoI64 = (value: Readonly<Counter>): number => value.count

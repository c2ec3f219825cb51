/**
 * Textual attribute payload. `Value.from(StringValue)` always yields the
 * `String` variant.
 */
export class StringValue {
  private constructor(private readonly text: string) {}

  static from(text: string | StringValue): StringValue {
    return text instanceof StringValue ? text : new StringValue(text)
  }

  asString(): string {
    return this.text
  }

  equals(that: StringValue): boolean {
    return this.text === that.text
  }

  toString(): string {
    return this.text
  }

  toJSON(): string {
    return this.text
  }
}

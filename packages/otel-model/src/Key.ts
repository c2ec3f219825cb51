/**
 * The name of a telemetry attribute.
 *
 * Keys are plain strings underneath; the class only exists so that generated
 * conversions have a distinct target to convert into.
 */
export class Key {
  private constructor(private readonly name: string) {}

  static from(name: string | Key): Key {
    return name instanceof Key ? name : new Key(name)
  }

  asString(): string {
    return this.name
  }

  equals(that: Key): boolean {
    return this.name === that.name
  }

  toString(): string {
    return this.name
  }

  toJSON(): string {
    return this.name
  }
}

/**
 * Named lookup for pluggable implementations (datasets, image backends).
 */
import { Effect } from "effect";
import { InvalidArgumentError } from "./errors.js";

export class Registry<T> {
  private readonly _map = new Map<string, T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, value: T): void {
    this._map.set(name, value);
  }

  get(name: string): Effect.Effect<T, InvalidArgumentError> {
    const value = this._map.get(name);
    if (value === undefined) {
      return Effect.fail(
        new InvalidArgumentError({
          message: `[${this.subsystem}] Unknown ${this.subsystem} "${name}". Available: ${this.list().join(", ")}`,
        }),
      );
    }
    return Effect.succeed(value);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}

/**
 * Check `value` against a fixed set of choices. Fails before any I/O so
 * callers can put it at the head of an Effect pipeline.
 */
export function oneOf<const C extends readonly string[]>(
  what: string,
  value: string,
  choices: C,
): Effect.Effect<C[number], InvalidArgumentError> {
  const found = choices.find((c): c is C[number] => c === value);
  return found === undefined
    ? Effect.fail(
        new InvalidArgumentError({
          message: `Unsupported ${what}: "${value}". Expected one of: ${choices.join(", ")}`,
        }),
      )
    : Effect.succeed(found);
}

/**
 * Gets the compiler to ensure that a value being switched on (or tested using
 * if statements) has had all possible values eliminated.  So if you add a new
 * solver algorithm or log level, your call to this function will stop
 * compiling until the new value is handled.
 * @param value The value being exhaustively switched on.
 */
export function ensureExhaustiveSwitch(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

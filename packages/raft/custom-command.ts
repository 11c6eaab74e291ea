export type InterchangeValue =
  | string
  | number
  | boolean
  | null
  | InterchangeValue[]
  | InterchangeObject;

export interface InterchangeObject {
  [key: string]: InterchangeValue;
}

/**
 * Capability an application command must provide to travel through the log
 * inside a `Custom` command.
 *
 * `commandType()` is the wire tag and the registry key, so it must be constant
 * for a given command kind and must not be one of the built-in tags.
 */
export interface CustomCommand<Self = unknown> {
  commandType(): string;
  toInterchange(): InterchangeValue;
  equals(other: Self): boolean;
  toString(): string;
}

/** Builds a command from the `"command"` body of an encoded entry. */
export type CommandDecoder<T> = (body: unknown) => T;

export interface CommandResolver<T> {
  resolve(commandType: string): CommandDecoder<T> | undefined;
}

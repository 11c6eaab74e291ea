import type { CommandResolver, CustomCommand, InterchangeValue } from "./custom-command";
import { LogEntry } from "./Log";
import { consoleLogger, type Logger } from "./logger";

const sortKeys = (value: InterchangeValue): InterchangeValue => {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  return Object.fromEntries(
    Object.keys(value).sort().map((key): [string, InterchangeValue] => [key, sortKeys(value[key])])
  );
}

/** JSON text with every object's keys sorted, custom command bodies included. */
export const stringifyLogEntry = <T extends CustomCommand<T>>(entry: LogEntry<T>): string => {
  return JSON.stringify(sortKeys(entry.toInterchange()));
}

export const parseLogEntry = <T extends CustomCommand<T> = never>(
  text: string,
  resolver: CommandResolver<T>,
  logger: Logger = consoleLogger
): LogEntry<T> => {
  const value: unknown = JSON.parse(text);
  return LogEntry.decode(value, resolver, logger);
}

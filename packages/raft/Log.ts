import { z } from "zod";
import { commandEquals, commandType, decodeCommand, encodeCommand } from "./command";
import type { Command } from "./command";
import type { CommandResolver, CustomCommand, InterchangeObject } from "./custom-command";
import { MissingTypeError } from "./errors";
import { consoleLogger, type Logger } from "./logger";

export type Term = number;

const termSchema = z
  .number()
  .int()
  .nonnegative()
  .max(Number.MAX_SAFE_INTEGER);

const encodedEntrySchema = z
  .object({
    term: termSchema.catch(0),
  })
  .catch({ term: 0 });

/**
 * One slot of the replicated log. An entry without a command is a no-op slot
 * (the leader's first entry of a term, heartbeats).
 */
export class LogEntry<T extends CustomCommand<T> = never> {
  public readonly term: Term;
  public readonly command?: Command<T>;
  constructor(
    term: Term,
    command?: Command<T>
  ){
    if (!termSchema.safeParse(term).success) {
      throw new RangeError(`Invalid term: ${term}`);
    }
    this.term = term;
    this.command = command;
  }

  toInterchange(): InterchangeObject {
    if (!this.command) {
      return { term: this.term };
    }
    return {
      command: encodeCommand(this.command),
      term: this.term,
      type: commandType(this.command),
    }
  }

  equals(other: LogEntry<T>): boolean {
    if (this.term !== other.term) {
      return false;
    }
    if (!this.command || !other.command) {
      return this.command === other.command;
    }
    return commandEquals(this.command, other.command);
  }

  toString(){
    return this.command
      ? `LogEntry(${this.term}, ${this.command.toString()})`
      : `LogEntry(${this.term})`;
  }

  /**
   * Never throws: the term falls back to 0 and a command that cannot be
   * decoded is left out. Entries with no `"type"` at all are plain no-op
   * slots and are not reported.
   */
  static decode<T extends CustomCommand<T> = never>(
    value: unknown,
    resolver: CommandResolver<T>,
    logger: Logger = consoleLogger
  ): LogEntry<T> {
    const { term } = encodedEntrySchema.parse(value);
    let command: Command<T> | undefined;
    try {
      command = decodeCommand(value, resolver);
    } catch (error) {
      if (!(error instanceof MissingTypeError)) {
        logger.warn(`[LogEntry]: dropping command of entry at term ${term}`, error);
      }
    }
    return new LogEntry(term, command);
  }
}

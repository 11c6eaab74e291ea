import { isReservedCommandType } from "./command";
import type { CommandDecoder, CommandResolver, CustomCommand } from "./custom-command";
import { DuplicateCommandTypeError, ReservedCommandTypeError } from "./errors";

/**
 * Maps custom command tags to their decoders. Populate it before the first
 * decode that may meet one of the tags; decoding only reads it.
 */
export class CommandRegistry<T extends CustomCommand<T>> implements CommandResolver<T> {
  private decoders: Map<string, CommandDecoder<T>> = new Map();

  register(commandType: string, decoder: CommandDecoder<T>): this {
    if (isReservedCommandType(commandType)) {
      throw new ReservedCommandTypeError(commandType);
    }
    if (this.decoders.has(commandType)) {
      throw new DuplicateCommandTypeError(commandType);
    }
    this.decoders.set(commandType, decoder);
    return this;
  }

  resolve(commandType: string): CommandDecoder<T> | undefined {
    return this.decoders.get(commandType);
  }

  has(commandType: string): boolean {
    return this.decoders.has(commandType);
  }

  commandTypes(): string[] {
    return Array.from(this.decoders.keys());
  }
}

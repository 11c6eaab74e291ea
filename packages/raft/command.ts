import { z } from "zod";
import {
  configurationEquals,
  decodeConfiguration,
  encodeConfiguration,
  formatConfiguration,
  toConfiguration,
} from "./configuration";
import type { Configuration, InstanceId } from "./configuration";
import type { CommandResolver, CustomCommand, InterchangeValue } from "./custom-command";
import { MissingCommandError, MissingTypeError, ReservedCommandTypeError, UnknownCommandTypeError } from "./errors";

export enum CommandKind {
  SINGLE_CONFIGURATION,
  JOINT_CONFIGURATION,
  CUSTOM,
}

export const SINGLE_CONFIGURATION = "SingleConfiguration";
export const JOINT_CONFIGURATION = "JointConfiguration";

export const isReservedCommandType = (commandType: string): boolean => {
  return commandType === SINGLE_CONFIGURATION || commandType === JOINT_CONFIGURATION;
}

/** One-step membership change from `oldConfiguration` to `configuration`. */
export class SingleConfiguration {
  public readonly kind: CommandKind.SINGLE_CONFIGURATION = CommandKind.SINGLE_CONFIGURATION;
  public readonly oldConfiguration: Configuration;
  public readonly configuration: Configuration;
  constructor(
    oldConfiguration: Iterable<InstanceId>,
    configuration: Iterable<InstanceId>
  ){
    this.oldConfiguration = toConfiguration(oldConfiguration);
    this.configuration = toConfiguration(configuration);
  }
  toString(){
    return `${SINGLE_CONFIGURATION}(${formatConfiguration(this.oldConfiguration)} -> ${formatConfiguration(this.configuration)})`;
  }
}

/**
 * Intermediate phase of a reconfiguration: agreement needs a majority of
 * `oldConfiguration` and a majority of `newConfiguration`.
 */
export class JointConfiguration {
  public readonly kind: CommandKind.JOINT_CONFIGURATION = CommandKind.JOINT_CONFIGURATION;
  public readonly oldConfiguration: Configuration;
  public readonly newConfiguration: Configuration;
  constructor(
    oldConfiguration: Iterable<InstanceId>,
    newConfiguration: Iterable<InstanceId>
  ){
    this.oldConfiguration = toConfiguration(oldConfiguration);
    this.newConfiguration = toConfiguration(newConfiguration);
  }
  toString(){
    return `${JOINT_CONFIGURATION}(${formatConfiguration(this.oldConfiguration)} -> ${formatConfiguration(this.newConfiguration)})`;
  }
}

export class Custom<T extends CustomCommand<T>> {
  public readonly kind: CommandKind.CUSTOM = CommandKind.CUSTOM;
  public readonly value: T;
  constructor(value: T){
    const type = value.commandType();
    if (isReservedCommandType(type)) {
      throw new ReservedCommandTypeError(type);
    }
    this.value = value;
  }
  toString(){
    return this.value.toString();
  }
}

export type Command<T extends CustomCommand<T>> =
  | SingleConfiguration
  | JointConfiguration
  | Custom<T>;

export const commandType = <T extends CustomCommand<T> = never>(command: Command<T>): string => {
  switch (command.kind) {
    case CommandKind.SINGLE_CONFIGURATION:
      return SINGLE_CONFIGURATION;
    case CommandKind.JOINT_CONFIGURATION:
      return JOINT_CONFIGURATION;
    case CommandKind.CUSTOM:
      return command.value.commandType();
  }
}

export const encodeCommand = <T extends CustomCommand<T> = never>(command: Command<T>): InterchangeValue => {
  switch (command.kind) {
    case CommandKind.SINGLE_CONFIGURATION:
      return {
        configuration: encodeConfiguration(command.configuration),
        oldConfiguration: encodeConfiguration(command.oldConfiguration),
      }
    case CommandKind.JOINT_CONFIGURATION:
      return {
        newConfiguration: encodeConfiguration(command.newConfiguration),
        oldConfiguration: encodeConfiguration(command.oldConfiguration),
      }
    case CommandKind.CUSTOM:
      return command.value.toInterchange();
  }
}

export const commandEquals = <T extends CustomCommand<T> = never>(a: Command<T>, b: Command<T>): boolean => {
  switch (a.kind) {
    case CommandKind.SINGLE_CONFIGURATION:
      return b.kind === CommandKind.SINGLE_CONFIGURATION
        && configurationEquals(a.oldConfiguration, b.oldConfiguration)
        && configurationEquals(a.configuration, b.configuration);
    case CommandKind.JOINT_CONFIGURATION:
      return b.kind === CommandKind.JOINT_CONFIGURATION
        && configurationEquals(a.oldConfiguration, b.oldConfiguration)
        && configurationEquals(a.newConfiguration, b.newConfiguration);
    case CommandKind.CUSTOM:
      return b.kind === CommandKind.CUSTOM && a.value.equals(b.value);
  }
}

const envelopeSchema = z.object({
  type: z.string(),
  command: z.unknown(),
});

const singleConfigurationSchema = z
  .object({
    configuration: z.unknown(),
    oldConfiguration: z.unknown(),
  })
  .catch({});

const jointConfigurationSchema = z
  .object({
    newConfiguration: z.unknown(),
    oldConfiguration: z.unknown(),
  })
  .catch({});

/**
 * Decodes the `"type"`/`"command"` pair of an encoded entry.
 *
 * Built-in tags are handled here and never reach the resolver. Missing
 * configuration sub-objects decode to empty sets, while a missing `"type"`, a
 * built-in tag without `"command"` or a tag the resolver does not know is an
 * error. Custom decoders get the body as found, `undefined` included, and
 * their errors are rethrown untouched.
 */
export const decodeCommand = <T extends CustomCommand<T> = never>(
  value: unknown,
  resolver: CommandResolver<T>
): Command<T> => {
  const envelope = envelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new MissingTypeError();
  }
  const { type, command: body } = envelope.data;
  switch (type) {
    case SINGLE_CONFIGURATION: {
      if (body === undefined) {
        throw new MissingCommandError(type);
      }
      const { oldConfiguration, configuration } = singleConfigurationSchema.parse(body);
      return new SingleConfiguration(
        decodeConfiguration(oldConfiguration),
        decodeConfiguration(configuration)
      )
    }
    case JOINT_CONFIGURATION: {
      if (body === undefined) {
        throw new MissingCommandError(type);
      }
      const { oldConfiguration, newConfiguration } = jointConfigurationSchema.parse(body);
      return new JointConfiguration(
        decodeConfiguration(oldConfiguration),
        decodeConfiguration(newConfiguration)
      )
    }
    default: {
      const decode = resolver.resolve(type);
      if (!decode) {
        throw new UnknownCommandTypeError(type);
      }
      return new Custom(decode(body));
    }
  }
}

export * from "./command";
export * from "./configuration";
export * from "./errors";
export * from "./Log";
export * from "./registry";
export * from "./canonical";
export * from "./rpc/AppendEntries";
export { consoleLogger } from "./logger";
export type { Logger } from "./logger";
export type {
  CommandDecoder,
  CommandResolver,
  CustomCommand,
  InterchangeObject,
  InterchangeValue,
} from "./custom-command";

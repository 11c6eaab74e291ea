export enum DecodeErrorCode {
  MISSING_TYPE = "MissingType",
  MISSING_COMMAND = "MissingCommand",
  UNKNOWN_COMMAND_TYPE = "UnknownCommandType",
  MALFORMED_MESSAGE = "MalformedMessage",
}

export class DecodeError extends Error {
  public code: DecodeErrorCode;
  constructor(
    code: DecodeErrorCode,
    message: string
  ){
    super(message);
    this.name = "DecodeError";
    this.code = code;
  }
}

export class MissingTypeError extends DecodeError {
  constructor(){
    super(
      DecodeErrorCode.MISSING_TYPE,
      'Encoded command has no "type" field'
    );
    this.name = "MissingTypeError";
  }
}

export class MissingCommandError extends DecodeError {
  public commandType: string;
  constructor(commandType: string){
    super(
      DecodeErrorCode.MISSING_COMMAND,
      `Encoded ${commandType} command has no "command" field`
    );
    this.name = "MissingCommandError";
    this.commandType = commandType;
  }
}

export class UnknownCommandTypeError extends DecodeError {
  public commandType: string;
  constructor(commandType: string){
    super(
      DecodeErrorCode.UNKNOWN_COMMAND_TYPE,
      `No decoder registered for command type: ${commandType}`
    );
    this.name = "UnknownCommandTypeError";
    this.commandType = commandType;
  }
}

export class MalformedMessageError extends DecodeError {
  public issues: string;
  constructor(message: string, issues: string){
    super(
      DecodeErrorCode.MALFORMED_MESSAGE,
      `Malformed ${message}: ${issues}`
    );
    this.name = "MalformedMessageError";
    this.issues = issues;
  }
}

export class RegistryError extends Error {
  public commandType: string;
  constructor(commandType: string, message: string){
    super(message);
    this.name = "RegistryError";
    this.commandType = commandType;
  }
}

export class ReservedCommandTypeError extends RegistryError {
  constructor(commandType: string){
    super(commandType, `Command type is reserved for built-in commands: ${commandType}`);
    this.name = "ReservedCommandTypeError";
  }
}

export class DuplicateCommandTypeError extends RegistryError {
  constructor(commandType: string){
    super(commandType, `Command type already registered: ${commandType}`);
    this.name = "DuplicateCommandTypeError";
  }
}

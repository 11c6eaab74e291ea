import { z } from "zod";
import { instanceIdSchema, type InstanceId } from "../configuration";
import type { CommandResolver, CustomCommand, InterchangeObject } from "../custom-command";
import { MalformedMessageError } from "../errors";
import { LogEntry, type Term } from "../Log";
import { consoleLogger, type Logger } from "../logger";

const unsignedSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

const appendEntryRequestSchema = z.object({
  term: unsignedSchema,
  leaderId: instanceIdSchema,
  prevLogIndex: z.number().int().min(-1).max(Number.MAX_SAFE_INTEGER),
  prevLogTerm: unsignedSchema,
  entries: z.array(z.unknown()),
  leaderCommit: unsignedSchema,
});

const appendEntryResponseSchema = z.object({
  term: unsignedSchema,
  success: z.boolean(),
});

const formatIssues = (error: z.ZodError) => {
  return error.issues
    .map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export class AppendEntryRequest<T extends CustomCommand<T> = never> {
  public term: Term;
  public leaderId: InstanceId;
  public prevLogIndex: number;
  public prevLogTerm: Term;
  public entries: LogEntry<T>[];
  public leaderCommit: number;
  constructor(
    term: Term,
    leaderId: InstanceId,
    prevLogIndex: number,
    prevLogTerm: Term,
    entries: LogEntry<T>[],
    leaderCommit: number
  ){
    this.term = term
    this.leaderId = leaderId
    this.prevLogIndex = prevLogIndex
    this.prevLogTerm = prevLogTerm
    this.entries = entries
    this.leaderCommit = leaderCommit
  }

  toInterchange(): InterchangeObject {
    return {
      entries: this.entries.map(entry => entry.toInterchange()),
      leaderCommit: this.leaderCommit,
      leaderId: this.leaderId,
      prevLogIndex: this.prevLogIndex,
      prevLogTerm: this.prevLogTerm,
      term: this.term,
    }
  }

  /**
   * The envelope is strict, the entries inside it are decoded with
   * `LogEntry.decode` and so never fail on their own.
   */
  static decode<T extends CustomCommand<T> = never>(
    value: unknown,
    resolver: CommandResolver<T>,
    logger: Logger = consoleLogger
  ): AppendEntryRequest<T> {
    const parsed = appendEntryRequestSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedMessageError("AppendEntries request", formatIssues(parsed.error));
    }
    const { term, leaderId, prevLogIndex, prevLogTerm, entries, leaderCommit } = parsed.data;
    return new AppendEntryRequest(
      term,
      leaderId,
      prevLogIndex,
      prevLogTerm,
      entries.map(entry => LogEntry.decode(entry, resolver, logger)),
      leaderCommit
    )
  }
}

export class AppendEntryResponse {
  public term: Term;
  public success:boolean
  constructor(
    term: Term,
    success:boolean
  ){
    this.term = term
    this.success = success
  }

  toInterchange(): InterchangeObject {
    return {
      success: this.success,
      term: this.term,
    }
  }

  static decode(value: unknown): AppendEntryResponse {
    const parsed = appendEntryResponseSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedMessageError("AppendEntries response", formatIssues(parsed.error));
    }
    return new AppendEntryResponse(parsed.data.term, parsed.data.success);
  }
}

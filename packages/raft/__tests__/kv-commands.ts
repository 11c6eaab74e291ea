import { z } from "zod";
import type { CustomCommand, InterchangeValue } from "../custom-command";
import { CommandRegistry } from "../registry";
import type { Logger } from "../logger";

export type KvCommand = Increment | Rename | HSet;

export class Increment implements CustomCommand<KvCommand> {
  static TYPE = "Increment";
  public readonly amount: number;
  constructor(amount: number){
    this.amount = amount;
  }
  commandType(){
    return Increment.TYPE;
  }
  toInterchange(): InterchangeValue {
    return { amount: this.amount };
  }
  equals(other: KvCommand){
    return other instanceof Increment && other.amount === this.amount;
  }
  toString(){
    return `Increment(${this.amount})`;
  }
  static decode(body: unknown){
    const { amount } = z
      .object({ amount: z.number().int().nonnegative().catch(0) })
      .catch({ amount: 0 })
      .parse(body);
    return new Increment(amount);
  }
}

export class Rename implements CustomCommand<KvCommand> {
  static TYPE = "Rename";
  public readonly from: string;
  public readonly to: string;
  constructor(from: string, to: string){
    this.from = from;
    this.to = to;
  }
  commandType(){
    return Rename.TYPE;
  }
  toInterchange(): InterchangeValue {
    // emitted unsorted
    return { to: this.to, from: this.from };
  }
  equals(other: KvCommand){
    return other instanceof Rename && other.from === this.from && other.to === this.to;
  }
  toString(){
    return `Rename(${this.from} -> ${this.to})`;
  }
  static decode(body: unknown){
    const parsed = z.object({ from: z.string(), to: z.string() }).safeParse(body);
    if (!parsed.success) {
      throw new Error("rename needs from and to");
    }
    return new Rename(parsed.data.from, parsed.data.to);
  }
}

export class HSet implements CustomCommand<KvCommand> {
  static TYPE = "HSet";
  public readonly fields: Record<string, string>;
  constructor(fields: Record<string, string>){
    this.fields = fields;
  }
  commandType(){
    return HSet.TYPE;
  }
  toInterchange(): InterchangeValue {
    return { fields: this.fields };
  }
  equals(other: KvCommand){
    if (!(other instanceof HSet)) {
      return false;
    }
    const entries = Object.entries(this.fields);
    return entries.length === Object.keys(other.fields).length
      && entries.every(([key, value]) => Object.hasOwn(other.fields, key) && other.fields[key] === value);
  }
  toString(){
    return `HSet(${Object.keys(this.fields).join(", ")})`;
  }
  // field names are user data, so "__proto__" has to survive as an own key
  static decode(body: unknown){
    const fields = typeof body === "object" && body !== null && "fields" in body ? body.fields : undefined;
    if (typeof fields !== "object" || fields === null) {
      return new HSet({});
    }
    return new HSet(Object.fromEntries(
      Object.entries(fields).filter((pair): pair is [string, string] => typeof pair[1] === "string")
    ));
  }
}

export const silentLogger = (): Logger => ({
  warn: () => {},
});

export const createRegistry = () => {
  return new CommandRegistry<KvCommand>()
    .register(Increment.TYPE, Increment.decode)
    .register(Rename.TYPE, Rename.decode)
    .register(HSet.TYPE, HSet.decode);
}

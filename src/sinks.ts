import type { ContextChain } from './context';
import type { Drain } from './drain';
import type { Level } from './level';
import type { CallSite, LogRecord } from './record';
import { OK, type Result } from './result';
import { serializeKeyValue, type Serializer } from './ser';

/** Value as captured by `CollectingSerializer`. */
export type CollectedValue = boolean | number | bigint | string | null | undefined;

export type CollectedPair = readonly [key: string, value: CollectedValue];

/**
 * Serializer that records every emitted key/value in call order
 */
export class CollectingSerializer implements Serializer<never> {
  public pairs: CollectedPair[] = [];

  emitBool(key: string, value: boolean): Result<never> { return this.push(key, value); }
  emitI64(key: string, value: number | bigint): Result<never> { return this.push(key, value); }
  emitU64(key: string, value: bigint): Result<never> { return this.push(key, value); }
  emitF64(key: string, value: number): Result<never> { return this.push(key, value); }
  emitStr(key: string, value: string): Result<never> { return this.push(key, value); }
  emitNone(key: string): Result<never> { return this.push(key, null); }
  emitUnit(key: string): Result<never> { return this.push(key, undefined); }

  private push(key: string, value: CollectedValue): Result<never> {
    this.pairs.push([key, value]);
    return OK;
  }
}

/**
 * A record as kept by `MemoryDrain`
 */
export interface CapturedRecord {
  level: Level;
  msg: string;
  site: CallSite;
  /** Call-site key/values, in call order. */
  values: CollectedPair[];
  /** Context key/values, most specific group first. */
  context: CollectedPair[];
}

/**
 * Memory drain for testing or inspecting logs.
 * Records cannot be kept past dispatch, so everything (lazy values included) is serialized on arrival.
 */
export class MemoryDrain implements Drain<never> {
  public entries: CapturedRecord[] = [];

  log(record: LogRecord, context: ContextChain): Result<never> {
    const values = new CollectingSerializer();
    for (const pair of record.values()) serializeKeyValue(pair, record, values);

    const inherited = new CollectingSerializer();
    for (const pair of context) serializeKeyValue(pair, record, inherited);

    this.entries.push({
      level: record.level,
      msg: record.msg(),
      site: record.site,
      values: values.pairs,
      context: inherited.pairs,
    });
    return OK;
  }

  clear(): void {
    this.entries = [];
  }

  getEntries(): CapturedRecord[] {
    return [...this.entries];
  }
}

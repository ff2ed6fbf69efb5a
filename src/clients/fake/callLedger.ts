import type { MethodName, ResourceMethodKey, ResourceName } from "./resources.js";
import {
  freezeCallerParams,
  freezeWireParams,
  type CallerParams,
  type WireParams,
} from "./wireParams.js";

export interface CallRecord {
  readonly sequence: number;
  readonly resourceMethod: ResourceMethodKey;
  readonly resource: ResourceName;
  readonly method: MethodName;
  /** Parameters as the caller passed them. */
  readonly params: CallerParams;
  /** The same parameters under wire field names. */
  readonly data: WireParams;
  readonly timestamp: Date;
}

export type CallEntry = Omit<CallRecord, "sequence" | "timestamp">;

export interface CallLedger {
  append: (entry: CallEntry) => CallRecord;
  all: () => readonly CallRecord[];
  byResourceMethod: (resourceMethod: ResourceMethodKey) => readonly CallRecord[];
  last: (resourceMethod?: ResourceMethodKey) => CallRecord | undefined;
  size: () => number;
  clear: () => void;
}

export function createCallLedger(): CallLedger {
  let records: CallRecord[] = [];
  let nextSequence = 1;

  const append = (entry: CallEntry): CallRecord => {
    const record: CallRecord = Object.freeze({
      ...entry,
      params: freezeCallerParams(entry.params),
      data: freezeWireParams(entry.data),
      sequence: nextSequence,
      timestamp: new Date(),
    });

    nextSequence += 1;
    records.push(record);
    return record;
  };

  const byResourceMethod = (resourceMethod: ResourceMethodKey) =>
    records.filter((record) => record.resourceMethod === resourceMethod);

  return {
    append,
    all: () => [...records],
    byResourceMethod,
    last: (resourceMethod) => {
      const candidates = resourceMethod
        ? byResourceMethod(resourceMethod)
        : records;
      return candidates[candidates.length - 1];
    },
    size: () => records.length,
    clear: () => {
      records = [];
      nextSequence = 1;
    },
  };
}

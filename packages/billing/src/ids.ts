/**
 * @subledger/billing — Identifier allocation.
 */

import { randomUUID } from "node:crypto";
import type { EntityId } from "@subledger/types";

export interface IdAllocator {
  next(): EntityId;
}

/** Monotonic decimal ids: "1", "2", "3", ... */
export class CounterIdAllocator implements IdAllocator {
  private _last: number;

  constructor(start = 0) {
    this._last = start;
  }

  next(): EntityId {
    this._last += 1;
    return String(this._last);
  }
}

export class UuidIdAllocator implements IdAllocator {
  next(): EntityId {
    return randomUUID();
  }
}

/**
 * Test sandbox: a fresh :memory: database per call, with a clock the test drives.
 */
import { defaultSettings } from "./config.js";
import { openDb, type Db } from "./db.js";
import { EvoMemory, type EvoMemorySettings } from "./evomemory.js";
import type { NeuronStore } from "./neuron-store.js";

export const T0 = new Date("2026-03-01T12:00:00.000Z");

export interface Clock {
  now: () => Date;
  /** Move the clock forward by ms (default one second). */
  tick: (ms?: number) => Date;
  set: (date: Date) => void;
}

export function testClock(start: Date = T0): Clock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    tick: (ms = 1000) => {
      current += ms;
      return new Date(current);
    },
    set: (date) => {
      current = date.getTime();
    },
  };
}

export function sandbox(overrides: Partial<EvoMemorySettings> = {}): {
  db: Db;
  clock: Clock;
  memory: EvoMemory;
  store: NeuronStore;
  close: () => Db;
} {
  const db = openDb(":memory:");
  const clock = testClock();
  const memory = new EvoMemory(db, {
    settings: { ...defaultSettings(), ...overrides },
    now: clock.now,
  });
  return { db, clock, memory, store: memory.store, close: () => db.close() };
}

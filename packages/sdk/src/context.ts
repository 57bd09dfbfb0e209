/**
 * Injectable time and identifier sources.
 *
 * Everything on the write path that needs "now" or "a new id" takes a
 * DealContext, so swapping the one object switches the store and the
 * normalizer between live and replayable behaviour.
 */

import { randomUUID } from "node:crypto";
import { addDays, format } from "date-fns";
import { toIsoDate, type IsoDate } from "./dates.js";

export interface Clock {
  now(): Date;
  today(): IsoDate;
}

export interface IdGenerator {
  next(): string;
}

export interface DealContext {
  readonly clock: Clock;
  readonly ids: IdGenerator;
}

/**
 * Wall-clock time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  today(): IsoDate {
    return toIsoDate(this.now());
  }
}

/**
 * Clock frozen at a given instant; moves only when told to
 */
export class FixedClock implements Clock {
  #current: Date;

  constructor(instant: Date) {
    this.#current = new Date(instant.getTime());
  }

  /**
   * Local time, month 1-based
   */
  static at(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): FixedClock {
    return new FixedClock(new Date(year, month - 1, day, hour, minute, second));
  }

  now(): Date {
    return new Date(this.#current.getTime());
  }

  today(): IsoDate {
    return toIsoDate(this.#current);
  }

  advance(ms: number): void {
    this.#current = new Date(this.#current.getTime() + ms);
  }

  set(instant: Date): void {
    this.#current = new Date(instant.getTime());
  }
}

const DEFAULT_BASE_DATE = new Date(2025, 0, 1);

function idFor(date: Date, suffix: string): string {
  return `D-${format(date, "yyyyMMdd")}-${suffix}`;
}

/**
 * `D-{yyyyMMdd}-{8 hex}`: clock date plus a random suffix. Unique, not reproducible.
 */
export class RandomIdGenerator implements IdGenerator {
  readonly #clock: Clock;

  constructor(clock: Clock = new SystemClock()) {
    this.#clock = clock;
  }

  next(): string {
    const suffix = randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase();
    return idFor(this.#clock.now(), suffix);
  }
}

/**
 * Mulberry32: small, fast 32-bit PRNG with a full 2^32 period
 */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

const HEX = "0123456789ABCDEF";

/**
 * Reproducible ids for synthetic datasets: the same seed yields the same
 * sequence in every process. Dates spread over the year after `baseDate`.
 */
export class SeededIdGenerator implements IdGenerator {
  readonly #random: () => number;
  readonly #baseDate: Date;

  constructor(seed: number, baseDate: Date = DEFAULT_BASE_DATE) {
    this.#random = mulberry32(seed);
    this.#baseDate = new Date(baseDate.getTime());
  }

  next(): string {
    let suffix = "";
    for (let i = 0; i < 8; i++) {
      suffix += HEX.charAt(Math.floor(this.#random() * HEX.length));
    }
    const dayOffset = Math.floor(this.#random() * 365);
    return idFor(addDays(this.#baseDate, dayOffset), suffix);
  }
}

/**
 * `D-{baseDate}-{counter:8}` starting at 00000001
 */
export class SequentialIdGenerator implements IdGenerator {
  readonly #baseDate: Date;
  #counter = 0;

  constructor(baseDate: Date = DEFAULT_BASE_DATE) {
    this.#baseDate = new Date(baseDate.getTime());
  }

  next(): string {
    this.#counter++;
    return idFor(this.#baseDate, String(this.#counter).padStart(8, "0"));
  }

  reset(): void {
    this.#counter = 0;
  }
}

/**
 * Live wiring: wall clock and random ids
 */
export function createContext(): DealContext {
  const clock = new SystemClock();
  return { clock, ids: new RandomIdGenerator(clock) };
}

/**
 * Fixed clock and sequential ids, both anchored at `date`
 */
export function forTesting(date: Date): { clock: FixedClock; ids: SequentialIdGenerator } {
  return { clock: new FixedClock(date), ids: new SequentialIdGenerator(date) };
}

/**
 * Fixed clock and seeded ids for reproducible generated datasets
 */
export function forSyntheticData(
  date: Date,
  seed: number
): { clock: FixedClock; ids: SeededIdGenerator } {
  return { clock: new FixedClock(date), ids: new SeededIdGenerator(seed, date) };
}

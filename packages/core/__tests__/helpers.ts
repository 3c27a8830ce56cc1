/**
 * Test helpers for the core package.
 */

import type { CodeGenerator } from "@snaplink/shared";

export interface ScriptedGenerator extends CodeGenerator {
  reserved: string[];
}

/**
 * Generator that hands out `codes` in order.
 */
export function scriptedGenerator(codes: string[]): ScriptedGenerator {
  const queue = [...codes];
  const reserved: string[] = [];
  return {
    reserved,
    next: () => {
      const code = queue.shift();
      if (code === undefined) throw new Error("scripted generator exhausted");
      return code;
    },
    reserve: (code) => {
      reserved.push(code);
    },
  };
}

/**
 * Mutable clock for driving expiry in tests.
 */
export class TestClock {
  private current: Date;

  constructor(start: string = "2026-01-01T00:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current.getTime());

  nowMs = (): number => this.current.getTime();

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

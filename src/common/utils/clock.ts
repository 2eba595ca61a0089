import { Injectable } from "@nestjs/common";

/**
 * Source of engine time in milliseconds. Injected so rounds can be driven deterministically.
 */
export interface Clock {
  now(): number;
}

export const CLOCK = "CLOCK";

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

export function toUnixSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

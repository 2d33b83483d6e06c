import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Poll-cycle correlation using AsyncLocalStorage.
 * Every log line written while a cycle runs carries its cycleId.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { generateCycleId } from "../utils/id.js";

export interface CycleContext {
  cycleId: string;
  forced: boolean;
}

const cycleContext = new AsyncLocalStorage<CycleContext>();

export function withCycle<T>(ctx: CycleContext, fn: () => Promise<T>): Promise<T> {
  return cycleContext.run(ctx, fn);
}

export function getCurrentCycle(): CycleContext | undefined {
  return cycleContext.getStore();
}

export function createCycleContext(forced: boolean): CycleContext {
  return { cycleId: generateCycleId(), forced };
}

import { AsyncLocalStorage } from "node:async_hooks";

export interface RunContext {
  run_id: string;
  list_id: string;
  profile_id: string;
  mode: string;
  started_at_ms: number;
}

const storage = new AsyncLocalStorage<RunContext>();

export const runWithRunContext = <T>(context: RunContext, fn: () => T): T =>
  storage.run(context, fn);

export const getRunContext = (): RunContext | undefined => storage.getStore();

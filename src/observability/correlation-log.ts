import { getRunContext, type RunContext } from "./run-context";

type AnyFn = (...args: unknown[]) => unknown;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const withContext = (data: Record<string, unknown>, ctx: RunContext): Record<string, unknown> => ({
  ...data,
  run_id: ctx.run_id,
  list_id: ctx.list_id,
  profile_id: ctx.profile_id,
  mode: ctx.mode,
  elapsed_ms: Date.now() - ctx.started_at_ms,
});

const wrap = (methodName: string, fn: AnyFn, thisArg: unknown): AnyFn => {
  return (...args: unknown[]) => {
    const ctx = getRunContext();
    if (!ctx) return fn.apply(thisArg, args);

    // exception(error, message?, data?) carries its data one slot later.
    const dataIndex = methodName === "exception" ? 2 : 1;
    const current = args[dataIndex];
    if (isRecord(current)) {
      args[dataIndex] = withContext(current, ctx);
    } else if (current === undefined || current === null) {
      while (args.length < dataIndex) args.push(undefined);
      args[dataIndex] = withContext({}, ctx);
    }

    return fn.apply(thisArg, args);
  };
};

export const installCorrelationLogging = (log: object, enabled: boolean): void => {
  if (!enabled) return;
  const methods = ["debug", "info", "warning", "error", "exception"] as const;

  for (const method of methods) {
    const current: unknown = Reflect.get(log, method);
    if (typeof current !== "function") continue;
    const original: AnyFn = (...args) => Reflect.apply(current, log, args);
    Reflect.set(log, method, wrap(method, original, log));
  }
};

import { redact } from "./redaction";

type AnyFn = (...args: unknown[]) => unknown;

const wrap = (fn: AnyFn, thisArg: unknown): AnyFn => {
  return (...args: unknown[]) => {
    const redacted = args.map((arg, index) => {
      if (index === 0) return arg; // message or error
      if (arg && typeof arg === "object") return redact(arg);
      return arg;
    });
    return fn.apply(thisArg, redacted);
  };
};

/** Patches the log methods in place so existing imports use the redacted version. */
export const installLogRedaction = (log: object, enabled: boolean): void => {
  if (!enabled) return;
  const methods = ["debug", "info", "warning", "error", "exception"] as const;

  for (const method of methods) {
    const current: unknown = Reflect.get(log, method);
    if (typeof current !== "function") continue;
    Reflect.set(log, method, wrap((...args: unknown[]) => Reflect.apply(current, log, args), log));
  }
};

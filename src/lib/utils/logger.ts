import { debugMain } from './debug.js';

export type WarnSink = (message: string) => void;

let sink: WarnSink | undefined;

/** Route warnings to an additional sink (the CLI prints them). */
export function setLogger(fn: WarnSink | undefined): void {
  sink = fn;
}

export function logWarn(message: string, ...args: unknown[]): void {
  const warnMessage = `WARN: ${message}`;

  if (sink) {
    sink(warnMessage);
  }

  debugMain(warnMessage, ...args);
}

let _clock: (() => number) | null = null;

export function nowMs(): number {
  return _clock ? _clock() : Date.now();
}

/** Test hook: pin the clock used for checkpoint and event timestamps. */
export function setClock(fn: (() => number) | null): void {
  _clock = fn;
}

/**
 * Rate limiting for event sources
 *
 * Pure helpers with no engine coupling. Wrap a handler before registering it
 * with an `EventBridge` or a DOM listener when the source fires faster than
 * renders are useful.
 */

export interface DebounceOptions {
  leading?: boolean;
  trailing?: boolean;
}

export interface ThrottleOptions {
  leading?: boolean;
  trailing?: boolean;
}

export interface RateLimited<A extends unknown[]> {
  (...args: A): void;
  /** Drop any pending trailing call. */
  cancel(): void;
  /** Run the pending trailing call now, if there is one. */
  flush(): void;
  pending(): boolean;
}

type Timer = ReturnType<typeof setTimeout>;

/**
 * Debounce: coalesce a burst of calls into one, `ms` after the last call.
 *
 * @example
 * ```ts
 * const save = debounce((text: string) => store.set('draft', text), 500);
 * save('a');
 * save('ab'); // only 'ab' is written
 * ```
 */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => void,
  ms: number,
  options: DebounceOptions = {}
): RateLimited<A> {
  const { leading = false, trailing = true } = options;
  let timer: Timer | null = null;
  let lastArgs: A | null = null;

  const invokePending = () => {
    const args = lastArgs;
    lastArgs = null;
    if (args) fn(...args);
  };

  const call = (...args: A) => {
    const idle = timer === null;
    if (timer !== null) clearTimeout(timer);

    if (leading && idle) {
      fn(...args);
    } else if (trailing) {
      lastArgs = args;
    }

    timer = setTimeout(() => {
      timer = null;
      if (trailing) invokePending();
    }, ms);
  };

  return Object.assign(call, {
    cancel: () => {
      if (timer !== null) clearTimeout(timer);
      timer = null;
      lastArgs = null;
    },
    flush: () => {
      if (timer !== null) clearTimeout(timer);
      timer = null;
      invokePending();
    },
    pending: () => lastArgs !== null,
  });
}

/**
 * Throttle: at most one call per `ms`. With `trailing` the last call made
 * inside a window runs when the window closes.
 *
 * @example
 * ```ts
 * const onScroll = throttle(() => store.set('scrollY', window.scrollY), 100);
 * ```
 */
export function throttle<A extends unknown[]>(
  fn: (...args: A) => void,
  ms: number,
  options: ThrottleOptions = {}
): RateLimited<A> {
  const { leading = true, trailing = true } = options;
  let timer: Timer | null = null;
  let lastArgs: A | null = null;

  const closeWindow = () => {
    timer = null;
    if (trailing && lastArgs) {
      const args = lastArgs;
      lastArgs = null;
      fn(...args);
      // The trailing call opens a new window.
      timer = setTimeout(closeWindow, ms);
    }
  };

  const call = (...args: A) => {
    if (timer === null) {
      if (leading) fn(...args);
      else if (trailing) lastArgs = args;
      timer = setTimeout(closeWindow, ms);
      return;
    }
    if (trailing) lastArgs = args;
  };

  return Object.assign(call, {
    cancel: () => {
      if (timer !== null) clearTimeout(timer);
      timer = null;
      lastArgs = null;
    },
    flush: () => {
      if (timer !== null) clearTimeout(timer);
      timer = null;
      if (lastArgs) {
        const args = lastArgs;
        lastArgs = null;
        fn(...args);
      }
    },
    pending: () => lastArgs !== null,
  });
}

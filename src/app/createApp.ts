/**
 * App bootstrap and mount
 *
 * Wires a component to a store and a live renderer. Every store path the
 * component read during its last render is subscribed; any number of
 * notifications before the next scheduler flush collapse into one render
 * cycle (render -> diff -> apply).
 */

import { diff } from '../diff/diff';
import type { Patch } from '../diff/types';
import { isDebugEnabled } from '../dev/config';
import { logger } from '../dev/logger';
import { createDomHost } from '../renderer/dom-host';
import type { HostOps } from '../renderer/host';
import { createRenderer, type LiveHandle } from '../renderer/live';
import { ErrorReporter } from '../runtime/error-reporter';
import { globalScheduler, type Scheduler } from '../runtime/scheduler';
import { renderToString } from '../ssr/render';
import { Store } from '../store/store';
import { ancestorsOf } from '../store/path';
import type { SubscriptionHandle } from '../store/types';
import { createText, isVNode } from '../vdom/create';
import type { VNode } from '../vdom/types';

export interface ComponentObject {
  render(): VNode;
}

export type Component = ComponentObject | (() => VNode);

export type Fallback = VNode | ((error: unknown) => VNode);

export type RenderPhase = 'render' | 'diff' | 'apply';

export interface AppErrorInfo {
  phase: RenderPhase;
}

export interface MountOptions {
  component: Component;
  store?: Store;
  /** Tree shown after a failed cycle. */
  fallback?: Fallback;
  onError?: (error: unknown, info: AppErrorInfo) => void;
  scheduler?: Scheduler;
  reporter?: ErrorReporter;
}

export interface AppConfig extends MountOptions {
  /** Container element, or the id of one in `document`. */
  root: Element | string;
  /** DOM host override, e.g. bound to another document. */
  host?: HostOps<Node>;
}

export interface App<N extends object = Node> {
  readonly store: Store;
  readonly reporter: ErrorReporter;
  /** Current live handle; replaced when the tree is rebuilt. */
  readonly handle: LiveHandle<N>;
  /** Schedule a render cycle. */
  update(): void;
  /** Run any pending render cycle now. */
  flush(): void;
  unmount(): void;
  /** Tree currently shown (the component's, or the fallback). */
  tree(): VNode;
  readonly mounted: boolean;
}

// Apps by container so a second mount on the same root replaces the first.
const appsByRoot = new WeakMap<object, { unmount(): void }>();

function callRender(component: Component): VNode {
  const tree =
    typeof component === 'function' ? component() : component.render();
  if (!isVNode(tree)) {
    throw new TypeError('Component render() must return a VNode');
  }
  return tree;
}

function assertComponent(component: unknown): asserts component is Component {
  if (typeof component === 'function') return;
  if (
    typeof component === 'object' &&
    component !== null &&
    'render' in component &&
    typeof component.render === 'function'
  ) {
    return;
  }
  throw new TypeError(
    'component must be a function or an object with a render() method'
  );
}

/**
 * Mount `options.component` into `container` through an arbitrary host.
 */
export function mountApp<N extends object>(
  container: N,
  host: HostOps<N>,
  options: MountOptions
): App<N> {
  const { component, fallback, onError } = options;
  assertComponent(component);

  appsByRoot.get(container)?.unmount();

  const store = options.store ?? new Store();
  const scheduler = options.scheduler ?? globalScheduler;
  const reporter = options.reporter ?? new ErrorReporter();
  const renderer = createRenderer(host, { scheduler });

  const subscriptions = new Map<string, SubscriptionHandle>();
  let pending = false;
  let mounted = true;

  const requestRender = () => {
    if (!mounted) return;
    // A cycle dropped by the scheduler's loop guard leaves `pending` set.
    if (pending && scheduler.isQueued(cycle)) return;
    pending = true;
    scheduler.enqueue(cycle);
  };

  const resubscribe = (paths: readonly string[]) => {
    const wanted = new Set<string>();
    for (const path of paths) {
      wanted.add(path);
      // A write that replaces a parent branch must reach readers below it.
      for (const parent of ancestorsOf(path)) wanted.add(parent);
    }
    for (const [path, handle] of subscriptions) {
      if (!wanted.has(path)) {
        handle.unsubscribe();
        subscriptions.delete(path);
      }
    }
    for (const path of wanted) {
      if (!subscriptions.has(path)) {
        subscriptions.set(path, store.subscribe(path, requestRender));
      }
    }
  };

  const renderTracked = (): VNode => {
    const { result, paths } = store.track(() => callRender(component));
    resubscribe(paths);
    return result;
  };

  const resolveFallback = (error: unknown): VNode | null => {
    if (fallback === undefined) return null;
    if (isVNode(fallback)) return fallback;
    try {
      return fallback(error);
    } catch (err) {
      logger.error('[Trellis] fallback render failed:', err);
      return null;
    }
  };

  const report = (error: unknown, phase: RenderPhase) => {
    reporter.report(error, { phase });
    if (!onError) return;
    try {
      onError(error, { phase });
    } catch (err) {
      logger.error('[Trellis] onError callback threw:', err);
    }
  };

  // Initial mount
  let current: VNode;
  try {
    current = renderTracked();
  } catch (error) {
    report(error, 'render');
    current = resolveFallback(error) ?? createText('');
  }
  let handle = renderer.mount(container, current);

  const rebuild = (tree: VNode) => {
    try {
      renderer.unmount(handle);
    } catch (err) {
      logger.warn('[Trellis] could not detach the previous tree:', err);
    }
    handle = renderer.mount(container, tree);
    current = tree;
  };

  const show = (tree: VNode) => {
    try {
      renderer.applyPatches(handle, diff(current, tree));
      current = tree;
    } catch {
      rebuild(tree);
    }
  };

  const showFallback = (error: unknown) => {
    const tree = resolveFallback(error);
    if (tree) show(tree);
  };

  function cycle(): void {
    pending = false;
    if (!mounted) return;

    let next: VNode;
    try {
      next = renderTracked();
    } catch (error) {
      report(error, 'render');
      showFallback(error);
      return;
    }

    let patches: Patch[];
    try {
      patches = diff(current, next);
    } catch (error) {
      report(error, 'diff');
      showFallback(error);
      return;
    }

    try {
      renderer.applyPatches(handle, patches);
      current = next;
    } catch (error) {
      report(error, 'apply');
      try {
        rebuild(next);
      } catch (rebuildError) {
        report(rebuildError, 'apply');
        showFallback(rebuildError);
      }
      return;
    }

    if (isDebugEnabled()) {
      logger.debug(`[Trellis] render cycle applied ${patches.length} patch(es)`);
    }
  }

  const app: App<N> = {
    store,
    reporter,
    get handle() {
      return handle;
    },
    get mounted() {
      return mounted;
    },
    update: requestRender,
    flush() {
      if (!pending || scheduler.isExecuting()) return;
      if (scheduler.isQueued(cycle)) scheduler.flush();
      else cycle();
    },
    unmount() {
      if (!mounted) return;
      mounted = false;
      pending = false;
      for (const sub of subscriptions.values()) sub.unsubscribe();
      subscriptions.clear();
      renderer.unmount(handle);
      if (appsByRoot.get(container) === app) appsByRoot.delete(container);
    },
    tree: () => current,
  };

  appsByRoot.set(container, app);
  return app;
}

/**
 * Bootstrap and mount an app into the DOM.
 *
 * Mounting again on the same root unmounts the previous app first.
 *
 * @example
 * ```ts
 * const store = new Store();
 * createApp({
 *   root: 'app',
 *   store,
 *   component: () => h('p', null, `Count: ${String(store.get('count', 0))}`),
 * });
 * ```
 */
export function createApp(config: AppConfig): App<Node> {
  if (!config || typeof config !== 'object') {
    throw new Error('createApp requires a config object');
  }

  const rootElement =
    typeof config.root === 'string'
      ? document.getElementById(config.root)
      : config.root;

  if (!rootElement) {
    throw new Error(`Root element not found: ${String(config.root)}`);
  }

  return mountApp<Node>(rootElement, config.host ?? createDomHost(), config);
}

/**
 * Render a component once to HTML, e.g. for the initial server response.
 */
export function renderApp(component: Component): string {
  assertComponent(component);
  return renderToString(callRender(component));
}

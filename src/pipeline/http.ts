/**
 * HTTP helpers: fixed timeouts and browser-like page fetches
 */

export interface FetchPageOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
  /** Given the lower-cased content type; false skips reading the body */
  accepts?: (contentType: string) => boolean;
}

/**
 * Combine a fixed timeout with an optional caller signal.
 * Call dispose() once the request (including the body) is finished.
 */
export function timeoutSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new DOMException(`Timed out after ${timeoutMs}ms`, 'TimeoutError'));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with work, or reject with the signal's reason as soon as it aborts.
 * For clients that take no signal of their own; the work itself keeps running.
 */
export function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return work;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * GET a page with a browser User-Agent, reading the whole body before the
 * timeout is released. When `accepts` rejects the content type the body is
 * cancelled unread and comes back empty.
 */
export async function fetchPage(
  url: string,
  options: FetchPageOptions,
): Promise<{ status: number; ok: boolean; statusText: string; contentType: string; body: string }> {
  const { signal, dispose } = timeoutSignal(options.timeoutMs, options.signal);
  try {
    const res = await fetch(url, {
      headers: { 'User-Agent': options.userAgent },
      signal,
      redirect: 'follow',
    });
    const contentType = res.headers.get('content-type') ?? '';

    let body = '';
    if (options.accepts && !options.accepts(contentType.toLowerCase())) {
      await res.body?.cancel();
    } else {
      body = await res.text();
    }

    return {
      status: res.status,
      ok: res.ok,
      statusText: res.statusText,
      contentType,
      body,
    };
  } finally {
    dispose();
  }
}

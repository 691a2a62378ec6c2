import {
  InvalidResponseError,
  RemoteSignerRemoteError,
  RequestAbortedError,
  TimeoutError,
} from "./errors";

export interface RpcResponse {
  id: string;
  result?: string;
  error?: string;
}

interface PendingRequest {
  id: string;
  method: string;
  sentAt: number;
  timer: NodeJS.Timeout;
  resolve: (result: string) => void;
  reject: (error: Error) => void;
  detachAbort: () => void;
}

/**
 * In-flight RPC waiters keyed by request id. Response, timeout and abort
 * all settle a waiter through take(), which removes the entry before
 * anything else runs, so each waiter settles exactly once.
 */
export class PendingRequestTable {
  private readonly requests = new Map<string, PendingRequest>();

  /**
   * Register a waiter. The returned promise settles with the result,
   * a TimeoutError after `timeoutMs`, or a RequestAbortedError.
   */
  add(
    id: string,
    method: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<string> {
    if (this.requests.has(id)) {
      return Promise.reject(new Error(`Duplicate request id ${id}`));
    }
    if (signal?.aborted) {
      return Promise.reject(new RequestAbortedError(method));
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        this.take(id)?.reject(new RequestAbortedError(method));
      };
      const timer = setTimeout(() => {
        this.take(id)?.reject(new TimeoutError(method, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.requests.set(id, {
        id,
        method,
        sentAt: Date.now(),
        timer,
        resolve,
        reject,
        detachAbort: () => signal?.removeEventListener("abort", onAbort),
      });
    });
  }

  /**
   * Settle the waiter for a response.
   * @returns false when no waiter matched (late or unknown response)
   */
  resolve(response: RpcResponse): boolean {
    const request = this.take(response.id);
    if (!request) return false;

    if (response.error) {
      request.reject(new RemoteSignerRemoteError(request.method, response.error));
    } else if (response.result !== undefined) {
      request.resolve(response.result);
    } else {
      request.reject(
        new InvalidResponseError(`${request.method} response has neither result nor error`),
      );
    }
    return true;
  }

  /** Reject one waiter with a caller-supplied error. */
  reject(id: string, error: Error): boolean {
    const request = this.take(id);
    if (!request) return false;
    request.reject(error);
    return true;
  }

  /** Reject every waiter, e.g. on disconnect. */
  rejectAll(error: Error): number {
    const ids = [...this.requests.keys()];
    let rejected = 0;
    for (const id of ids) {
      if (this.reject(id, error)) rejected += 1;
    }
    return rejected;
  }

  has(id: string): boolean {
    return this.requests.has(id);
  }

  methodOf(id: string): string | undefined {
    return this.requests.get(id)?.method;
  }

  get size(): number {
    return this.requests.size;
  }

  private take(id: string): PendingRequest | undefined {
    const request = this.requests.get(id);
    if (!request) return undefined;
    this.requests.delete(id);
    clearTimeout(request.timer);
    request.detachAbort();
    return request;
  }
}

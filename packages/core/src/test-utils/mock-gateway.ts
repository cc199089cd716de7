/**
 * In-process stand-in for a content gateway.
 * Serves byte ranges of in-memory files through a `fetch`-compatible function
 * and records every request it receives.
 */

export const MOCK_GATEWAY_URL = "https://gateway.test/ipfs/";

export interface MockRequest {
  url: string;
  cid: string;
  range: string | null;
}

export interface MockGatewayOptions {
  /** Responses wait for this promise (or the request's abort signal). */
  hold?: Promise<void>;
  /** Delay before each response, in ms. */
  delayMs?: number;
  /** Answer every request with this status and an empty body. */
  status?: number;
}

export interface MockGateway {
  fetchFn: typeof fetch;
  requests: MockRequest[];
  /** Highest number of requests open (sent but body not fully read) at once. */
  readonly maxInFlight: number;
}

function waitFor(
  promise: Promise<void>,
  signal: AbortSignal | null | undefined,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    promise.then(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, reject);
  });
}

function parseRangeStart(range: string | null): number {
  const match = range === null ? null : /^bytes=(\d+)-$/.exec(range);
  return match ? Number(match[1]) : 0;
}

export function createMockGateway(
  files: Record<string, Uint8Array>,
  options?: MockGatewayOptions,
): MockGateway {
  const requests: MockRequest[] = [];
  let inFlight = 0;
  let maxInFlight = 0;

  async function fetchFn(
    input: string | URL | Request,
    init?: RequestInit,
  ): Promise<Response> {
    const url = input instanceof Request ? input.url : input.toString();
    const cid = new URL(url).pathname.split("/").pop() ?? "";
    const range = new Headers(init?.headers).get("range");
    requests.push({ url, cid, range });

    inFlight += 1;
    maxInFlight = Math.max(maxInFlight, inFlight);
    let open = true;
    const done = () => {
      if (open) {
        open = false;
        inFlight -= 1;
      }
    };

    const delayMs = options?.delayMs ?? 0;
    try {
      if (delayMs > 0) {
        await waitFor(
          new Promise<void>((resolve) => setTimeout(resolve, delayMs)),
          init?.signal,
        );
      }
      if (options?.hold) {
        await waitFor(options.hold, init?.signal);
      }
    } catch (err) {
      done();
      throw err;
    }

    const content = files[cid];
    if (options?.status !== undefined || content === undefined) {
      done();
      return new Response(null, { status: options?.status ?? 404 });
    }

    const body = content.subarray(parseRangeStart(range));
    let sent = false;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (!sent) {
          sent = true;
          controller.enqueue(body);
          return;
        }
        done();
        controller.close();
      },
      cancel() {
        done();
      },
    });

    return new Response(stream, {
      status: range === null ? 200 : 206,
      headers: { "content-length": String(body.length) },
    });
  }

  return {
    fetchFn,
    requests,
    get maxInFlight() {
      return maxInFlight;
    },
  };
}

import { HttpClient, RequestOptions } from '../../src/http-client';
import { httpStatusError } from '../../src/errors';

type Method = 'GET' | 'POST' | 'DELETE';

export interface RecordedCall {
  method: Method;
  path: string;
  body?: unknown;
  options: RequestOptions;
}

export type RouteHandler = (call: RecordedCall) => unknown;

/**
 * In-process stand-in for the backend. Routes are keyed `"METHOD path"`;
 * a handler may return a value, a promise, or throw. Unknown routes 404.
 */
export class FakeHttpClient implements HttpClient {
  readonly calls: RecordedCall[] = [];
  private routes = new Map<string, RouteHandler>();

  on(method: Method, path: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  reply(method: Method, path: string, body: unknown): this {
    return this.on(method, path, () => body);
  }

  fail(method: Method, path: string, status: number, detail?: string): this {
    return this.on(method, path, () => {
      throw httpStatusError(status, detail);
    });
  }

  callsTo(method: Method, path: string): RecordedCall[] {
    return this.calls.filter((c) => c.method === method && c.path === path);
  }

  get(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.dispatch({ method: 'GET', path, options });
  }

  post(path: string, body: unknown, options: RequestOptions = {}): Promise<unknown> {
    return this.dispatch({ method: 'POST', path, body, options });
  }

  delete(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.dispatch({ method: 'DELETE', path, options });
  }

  private async dispatch(call: RecordedCall): Promise<unknown> {
    this.calls.push(call);
    const handler = this.routes.get(`${call.method} ${call.path}`);
    if (!handler) throw httpStatusError(404, 'Not found.');
    return handler(call);
  }
}

/** A promise the test settles by hand, for ordering async responses. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let every already-settled promise callback run. */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

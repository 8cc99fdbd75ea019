import { Logger } from './logger.js';
import type { HttpMethod, Transport, TransportResponse } from './http.js';

const log = Logger.scope('batch');

export interface ApiRequest<T> {
  label: string;
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  parse(response: TransportResponse, url: string): T;
  onComplete?(value: T): void;
}

export interface BatchHandle<T> {
  readonly index: number;
  value(): T;
}

interface Completed {
  value: unknown;
  commit: () => void;
}

interface QueuedRequest {
  label: string;
  execute: () => Promise<Completed>;
}

type HandleState<T> = { done: false } | { done: true; value: T };

// One wave at a time: any failed request rejects the whole sync().
export class RequestBatch {
  private queue: QueuedRequest[] = [];
  private waves = 0;

  constructor(
    private readonly transport: Transport,
    private readonly defaultHeaders: Record<string, string> = {},
  ) {}

  get pending(): number {
    return this.queue.length;
  }

  submit<T>(request: ApiRequest<T>): BatchHandle<T> {
    const index = this.queue.length;
    let state: HandleState<T> = { done: false };

    this.queue.push({
      label: request.label,
      execute: async () => {
        const value = await this.run(request);
        return {
          value,
          commit: () => {
            state = { done: true, value };
            request.onComplete?.(value);
          },
        };
      },
    });

    return {
      index,
      value(): T {
        if (!state.done) {
          throw new Error(`Request "${request.label}" has not completed`);
        }
        return state.value;
      },
    };
  }

  async sync(): Promise<unknown[]> {
    const queued = this.queue;
    this.queue = [];
    this.waves += 1;

    if (queued.length === 0) {
      return [];
    }

    log.info(`wave ${this.waves}: sending ${queued.length} request(s)`);

    const outcomes = await Promise.allSettled(queued.map((entry) => entry.execute()));

    const completed: Completed[] = [];
    for (const [index, outcome] of outcomes.entries()) {
      if (outcome.status === 'rejected') {
        log.debug(`wave ${this.waves}: "${queued[index].label}" failed`);
        throw outcome.reason;
      }
      completed.push(outcome.value);
    }

    completed.forEach((entry) => entry.commit());
    log.info(`wave ${this.waves}: ${queued.length} request(s) completed`);
    return completed.map((entry) => entry.value);
  }

  private async run<T>(request: ApiRequest<T>): Promise<T> {
    log.debug(`${request.method ?? 'GET'} ${request.url}`);
    const response = await this.transport({
      url: request.url,
      method: request.method ?? 'GET',
      headers: { ...this.defaultHeaders, ...request.headers },
      body: request.body,
    });
    return request.parse(response, request.url);
  }
}

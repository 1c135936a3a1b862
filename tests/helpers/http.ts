import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { Readable } from 'node:stream';

export interface FakeResponse {
  status: number;
  body?: string;
}

export type FakeHandler = (config: InternalAxiosRequestConfig) => FakeResponse | Promise<FakeResponse>;

/** axios instance answering from `handler` in process; streams when the caller asks for a stream. */
export function fakeHttp(handler: FakeHandler): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const { status, body = '' } = await handler(config);
      return {
        data: config.responseType === 'stream' ? Readable.from([body]) : body,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
    },
  });
}

/** Never answers; rejects once the request is aborted. */
export function hang(config: InternalAxiosRequestConfig): Promise<never> {
  return new Promise((_resolve, reject) => {
    const signal = config.signal;
    if (!(signal instanceof AbortSignal)) {
      reject(new Error('request has no abort signal'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
  });
}

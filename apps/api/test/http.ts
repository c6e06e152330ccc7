import { HttpService } from '@nestjs/axios';
import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export interface RecordedRequest {
  method: string | undefined;
  url: string | undefined;
  params: unknown;
  data: unknown;
}

export type Reply = { status: number; data: unknown } | 'hang';

/**
 * An HttpService whose axios instance never opens a socket: `reply` answers
 * every request, and each request is recorded.
 */
export function fakeHttp(reply: (req: RecordedRequest) => Reply) {
  const requests: RecordedRequest[] = [];

  const adapter = (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const req = { method: config.method, url: config.url, params: config.params, data: config.data };
    requests.push(req);
    const answer = reply(req);

    if (answer === 'hang') {
      return new Promise((_, reject) => {
        config.signal?.addEventListener?.('abort', () => reject(new axios.CanceledError('canceled')));
      });
    }

    const response: AxiosResponse = {
      data: answer.data,
      status: answer.status,
      statusText: String(answer.status),
      headers: {},
      config,
    };
    if (answer.status >= 400) {
      return Promise.reject(
        new AxiosError(
          `Request failed with status code ${answer.status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response,
        ),
      );
    }
    return Promise.resolve(response);
  };

  return { http: new HttpService(axios.create({ adapter })), requests };
}

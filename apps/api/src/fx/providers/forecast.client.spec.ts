import { DependencyError } from '../../common/errors';
import { series } from '../../../test/fakes';
import { fakeHttp } from '../../../test/http';
import { HttpForecastClient } from './forecast.client';

const signal = new AbortController().signal;

describe('HttpForecastClient', () => {
  it('posts the history as a date-keyed object and returns the values', async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: [0.93, 0.94] }));
    const client = new HttpForecastClient(http, 'https://forecast.test/predict');

    const values = await client.forecast(series({ '2024-01-02': 0.92, '2024-01-01': 0.91 }), signal);

    expect(values).toEqual([0.93, 0.94]);
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('https://forecast.test/predict');
    expect(requests[0].data).toBe('{"2024-01-01":0.91,"2024-01-02":0.92}');
  });

  it('fails when the answer is not a list of numbers', async () => {
    const { http } = fakeHttp(() => ({ status: 200, data: { error: 'model not ready' } }));
    const client = new HttpForecastClient(http, 'https://forecast.test/predict');

    await expect(client.forecast(series({ '2024-01-01': 0.91 }), signal)).rejects.toBeInstanceOf(DependencyError);
  });
});

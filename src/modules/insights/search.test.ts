import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { SerperSearchProvider } from './search';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

function response<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('SerperSearchProvider', () => {
  const baseConfig = {
    apiKey: 'test-secret',
    apiUrl: 'https://search.example.test/search',
    resultLimit: 5,
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should report disabled without an API key', async () => {
    const post = jest.spyOn(axios, 'post');
    const provider = new SerperSearchProvider({ ...baseConfig, apiKey: undefined });

    const result = await provider.search('yoga');

    expect(result).toEqual({
      ok: false,
      error: { collaborator: 'search', kind: 'disabled', message: 'Serper API key is not configured' },
    });
    expect(post).not.toHaveBeenCalled();
  });

  it('should return trimmed organic result titles', async () => {
    const post = jest.spyOn(axios, 'post').mockResolvedValue(
      response({
        organic: [{ title: ' Acme Fitness ' }, { title: '' }, { snippet: 'no title' }, { title: 'Globex Gym' }],
      })
    );
    const provider = new SerperSearchProvider(baseConfig);

    const result = await provider.search('yoga');

    expect(result).toEqual({ ok: true, value: ['Acme Fitness', 'Globex Gym'] });
    expect(post).toHaveBeenCalledWith(
      'https://search.example.test/search',
      { q: 'yoga', num: 5 },
      expect.objectContaining({ headers: expect.objectContaining({ 'X-API-KEY': 'test-secret' }) })
    );
  });

  it('should cap results at the configured limit', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue(response({ organic: [{ title: 'One' }, { title: 'Two' }] }));
    const provider = new SerperSearchProvider({ ...baseConfig, resultLimit: 1 });

    await expect(provider.search('yoga')).resolves.toEqual({ ok: true, value: ['One'] });
  });

  it('should flag a response without organic results as malformed', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue(response({ answerBox: {} }));

    const result = await new SerperSearchProvider(baseConfig).search('yoga');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe('malformed');
  });

  it('should flag an empty result list', async () => {
    jest.spyOn(axios, 'post').mockResolvedValue(response({ organic: [] }));

    const result = await new SerperSearchProvider(baseConfig).search('yoga');

    expect(!result.ok && result.error.kind).toBe('empty');
  });

  it('should classify a timeout', async () => {
    jest.spyOn(axios, 'post').mockRejectedValue(new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED'));

    const result = await new SerperSearchProvider(baseConfig).search('yoga');

    expect(result).toEqual({
      ok: false,
      error: { collaborator: 'search', kind: 'timeout', message: 'timeout of 15000ms exceeded', status: undefined },
    });
  });
});

import { createOctokit } from './octokit_factory';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

describe('createOctokit', () => {
  it('should send every request to the configured base URL with a timeout signal', async () => {
    const fetchMock = jest.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ ref: 'refs/heads/main', object: { type: 'commit', sha: 'tip-sha-1' } }),
    );
    const octokit = createOctokit({
      token: 'test-secret',
      apiBaseUrl: 'https://api.example.test',
      requestTimeoutMs: 5000,
      fetch: fetchMock,
    });

    const { data } = await octokit.rest.git.getRef({ owner: 'test-org', repo: 'catalog', ref: 'heads/main' });

    expect(data.object.sha).toBe('tip-sha-1');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toMatch(/^https:\/\/api\.example\.test\/repos\/test-org\/catalog\/git\/ref\//);
    expect(init?.signal).toBeInstanceOf(AbortSignal);
    expect(init?.signal?.aborted).toBe(false);
  });
});

import { describe, it, expect, vi } from 'vitest';
import { formatThroughput, measureThroughput, type FetchLike } from '../../src/probes/throughput';
import { ProbeTimeoutError } from '../../src/errors';
import type { ThroughputConfig } from '../../src/utils/config';

const settings: ThroughputConfig = {
  download_url: 'https://speed.test/down',
  upload_url: 'https://speed.test/up',
  upload_bytes: 16,
  timeout_ms: 50,
};

function okResponse(bytes: number) {
  return { ok: true, status: 200, arrayBuffer: async () => new ArrayBuffer(bytes) };
}

describe('throughput', () => {
  it('should format bits per second as megabits', () => {
    expect(formatThroughput(82_440_000, 28_000_000)).toBe('download: 82.44 Mb/s, upload: 28.00 Mb/s');
  });

  it('should download then upload against the configured endpoints', async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: Parameters<FetchLike>[1]) => okResponse(1024));

    const result = await measureThroughput(settings, fetchImpl);

    expect(result).toMatch(/^download: \d+\.\d{2} Mb\/s, upload: \d+\.\d{2} Mb\/s$/);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://speed.test/down');
    expect(fetchImpl.mock.calls[1][0]).toBe('https://speed.test/up');
    expect(fetchImpl.mock.calls[1][1]?.method).toBe('POST');
    expect(fetchImpl.mock.calls[1][1]?.body?.byteLength).toBe(16);
  });

  it('should fail with a timeout when the test runs past its budget', async () => {
    const hanging: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    await expect(measureThroughput(settings, hanging)).rejects.toBeInstanceOf(ProbeTimeoutError);
  });

  it('should surface server errors as ordinary failures', async () => {
    const failing: FetchLike = async () => ({ ok: false, status: 503, arrayBuffer: async () => new ArrayBuffer(0) });

    const error = await measureThroughput(settings, failing).catch((err: unknown) => err);

    expect(error).not.toBeInstanceOf(ProbeTimeoutError);
    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error ? error.message : '').toBe('Download test failed (503)');
  });
});

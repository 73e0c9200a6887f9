import { ProbeTimeoutError } from '../errors';
import type { ThroughputConfig } from '../utils/config';

export interface TransferResponse {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (
  url: string,
  init?: { method?: string; body?: Uint8Array; signal?: AbortSignal },
) => Promise<TransferResponse>;

export function formatThroughput(downloadBitsPerSecond: number, uploadBitsPerSecond: number): string {
  const download = (downloadBitsPerSecond / 1_000_000).toFixed(2);
  const upload = (uploadBitsPerSecond / 1_000_000).toFixed(2);
  return `download: ${download} Mb/s, upload: ${upload} Mb/s`;
}

function bitsPerSecond(bytes: number, startedAt: number): number {
  const elapsedMs = Math.max(performance.now() - startedAt, 1);
  return (bytes * 8) / (elapsedMs / 1000);
}

/**
 * Download then upload a payload against the configured endpoints. The whole
 * test shares one time budget; running past it rejects with ProbeTimeoutError.
 */
export async function measureThroughput(settings: ThroughputConfig, fetchImpl: FetchLike = fetch): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), settings.timeout_ms);

  try {
    let startedAt = performance.now();
    const downloadResponse = await fetchImpl(settings.download_url, { signal: controller.signal });
    if (!downloadResponse.ok) {
      throw new Error(`Download test failed (${downloadResponse.status})`);
    }
    const downloaded = await downloadResponse.arrayBuffer();
    const download = bitsPerSecond(downloaded.byteLength, startedAt);

    startedAt = performance.now();
    const uploadResponse = await fetchImpl(settings.upload_url, {
      method: 'POST',
      body: new Uint8Array(settings.upload_bytes),
      signal: controller.signal,
    });
    if (!uploadResponse.ok) {
      throw new Error(`Upload test failed (${uploadResponse.status})`);
    }
    await uploadResponse.arrayBuffer();
    const upload = bitsPerSecond(settings.upload_bytes, startedAt);

    return formatThroughput(download, upload);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new ProbeTimeoutError('Throughput test', settings.timeout_ms);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

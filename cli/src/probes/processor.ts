import { UnsupportedPlatformError } from '../errors';

export interface ProcessorReaders {
  /** CPU brand as reported by the platform's CPU info. */
  readCpuBrand(): Promise<string>;
  /** Raw `lscpu` output. */
  readLscpu(): Promise<string>;
}

export function parseLscpuModelName(output: string): string {
  const line = output.split(/\r?\n/).find((candidate) => candidate.trim().startsWith('Model name'));
  if (!line) {
    return '';
  }
  // "Model name:   AMD Ryzen 7 5800X 8-Core Processor" -> drop the two label words
  return line.trim().split(/\s+/).slice(2).join(' ');
}

export async function resolveProcessorModel(operatingSystem: string, readers: ProcessorReaders): Promise<string> {
  switch (operatingSystem.trim()) {
    case 'Windows':
      return readers.readCpuBrand();
    case 'Linux':
      return parseLscpuModelName(await readers.readLscpu());
    default:
      throw new UnsupportedPlatformError(operatingSystem);
  }
}

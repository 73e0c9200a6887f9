import { vi } from 'vitest';
import type { DeviceProbes } from '../../src/probes/types';
import type { ProgressReporter } from '../../src/snapshot/assembler';
import type { DeviceRecord } from '../../src/types';

export function mockRecord(overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  return {
    computer_name: 'lab-pc-07',
    operating_system: 'Windows',
    processor_model: 'Intel(R) Core(TM) i7-14650HX',
    mac_address: '34-5A-60-22-18-B2',
    ip_address: '192.168.1.102',
    system_time: '19:01:19',
    active_ports: '7865, 6188, 139, 445',
    internet_speed: 'download: 82.44 Mb/s, upload: 28.00 Mb/s',
    ...overrides,
  };
}

export function fakeProbes(overrides: Partial<DeviceProbes> = {}): DeviceProbes {
  return {
    getOperatingSystemName: vi.fn(async () => 'Linux'),
    getProcessorModel: vi.fn(async (_os: string) => 'AMD Ryzen 7 5800X 8-Core Processor'),
    getHardwareAddress: vi.fn(async () => '34:5a:60:22:18:b2'),
    getHostname: vi.fn(async () => 'lab-pc-07'),
    getLocalIPAddress: vi.fn(async (_hostname: string) => '192.168.1.102'),
    getLocalTimeOfDay: vi.fn(async () => '09:15:00'),
    getListeningPorts: vi.fn(async () => '22, 443'),
    getThroughput: vi.fn(async () => 'download: 10.00 Mb/s, upload: 10.00 Mb/s'),
    ...overrides,
  };
}

export interface RecordingReporter extends ProgressReporter {
  steps: string[];
  failures: string[][];
  successes: string[];
}

export function recordingReporter(): RecordingReporter {
  const reporter: RecordingReporter = {
    steps: [],
    failures: [],
    successes: [],
    step: (message) => reporter.steps.push(message),
    fail: (lines) => reporter.failures.push(lines),
    succeed: (message) => reporter.successes.push(message),
  };
  return reporter;
}

import os from 'os';
import dns from 'dns/promises';
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as si from 'systeminformation';

import type { DeviceProbes } from './types';
import { selectHardwareAddress, selectListeningPorts } from './network';
import { resolveProcessorModel, type ProcessorReaders } from './processor';
import { measureThroughput, type FetchLike } from './throughput';
import type { ThroughputConfig } from '../utils/config';

const execFileAsync = promisify(execFile);

export function formatTimeOfDay(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

export function normalizeOperatingSystem(osType: string): string {
  return osType === 'Windows_NT' ? 'Windows' : osType;
}

const hostProcessorReaders: ProcessorReaders = {
  async readCpuBrand() {
    const cpu = await si.cpu();
    return [cpu.manufacturer, cpu.brand].filter(Boolean).join(' ');
  },
  async readLscpu() {
    const { stdout } = await execFileAsync('lscpu', [], { env: { ...process.env, LC_ALL: 'C' } });
    return stdout;
  },
};

export interface HostProbesOptions {
  throughput: ThroughputConfig;
  fetchImpl?: FetchLike;
}

/**
 * Probes backed by the machine the CLI runs on.
 */
export class HostProbes implements DeviceProbes {
  private readonly throughput: ThroughputConfig;
  private readonly fetchImpl?: FetchLike;

  constructor(options: HostProbesOptions) {
    this.throughput = options.throughput;
    this.fetchImpl = options.fetchImpl;
  }

  async getOperatingSystemName(): Promise<string> {
    return normalizeOperatingSystem(os.type());
  }

  async getProcessorModel(operatingSystem: string): Promise<string> {
    return resolveProcessorModel(operatingSystem, hostProcessorReaders);
  }

  async getHardwareAddress(): Promise<string> {
    return selectHardwareAddress(os.networkInterfaces());
  }

  async getHostname(): Promise<string> {
    return os.hostname();
  }

  async getLocalIPAddress(hostname: string): Promise<string> {
    const { address } = await dns.lookup(hostname, { family: 4 });
    return address;
  }

  async getLocalTimeOfDay(): Promise<string> {
    return formatTimeOfDay(new Date());
  }

  async getListeningPorts(): Promise<string> {
    const connections = await si.networkConnections();
    return selectListeningPorts(connections);
  }

  async getThroughput(): Promise<string> {
    return measureThroughput(this.throughput, this.fetchImpl);
  }
}

import chalk from 'chalk';

import type { DeviceProbes } from '../probes/types';
import type { DeviceRecord } from '../types';
import {
  ProbeTimeoutError,
  ProbeUnavailableError,
  UnsupportedPlatformError,
  toCatalogError,
  type CatalogError,
} from '../errors';

export type SnapshotResult = { ok: true; record: DeviceRecord } | { ok: false; error: CatalogError };

export interface ProgressReporter {
  step(message: string): void;
  fail(lines: string[]): void;
  succeed(message: string): void;
}

export const consoleReporter: ProgressReporter = {
  step: (message) => console.log(chalk.gray(message)),
  fail: (lines) => lines.forEach((line) => console.error(chalk.red(line))),
  succeed: (message) => console.log(chalk.green(message)),
};

export function describeSnapshotFailure(error: CatalogError): string[] {
  if (error instanceof UnsupportedPlatformError) {
    return ['This program only supports Linux and Windows.'];
  }
  if (error instanceof ProbeUnavailableError) {
    return [error.message, 'Data collection failed'];
  }
  if (error instanceof ProbeTimeoutError) {
    return ['Program took too long to finish.'];
  }
  return [error.message, 'Program failed due to unexpected error.'];
}

/**
 * Run every probe in order and assemble a device record. The first probe
 * that fails ends the snapshot; later probes are not called. Never throws.
 */
export async function collectSnapshot(
  probes: DeviceProbes,
  reporter: ProgressReporter = consoleReporter,
): Promise<SnapshotResult> {
  try {
    reporter.step('Device data collection starting');

    reporter.step('Getting operating system...');
    const operatingSystem = await probes.getOperatingSystemName();
    reporter.step('Getting processor model...');
    const processorModel = await probes.getProcessorModel(operatingSystem);

    reporter.step('Getting mac address...');
    const macAddress = await probes.getHardwareAddress();

    reporter.step('Getting computer name...');
    const computerName = await probes.getHostname();
    reporter.step('Getting ip address...');
    const ipAddress = await probes.getLocalIPAddress(computerName);

    reporter.step('Getting system time...');
    const systemTime = await probes.getLocalTimeOfDay();
    reporter.step('Getting all active ports...');
    const activePorts = await probes.getListeningPorts();

    reporter.step('Getting internet download and upload speed...');
    const internetSpeed = await probes.getThroughput();

    reporter.succeed('Data collection successful!');
    return {
      ok: true,
      record: {
        computer_name: computerName,
        operating_system: operatingSystem,
        processor_model: processorModel,
        mac_address: macAddress,
        ip_address: ipAddress,
        system_time: systemTime,
        active_ports: activePorts,
        internet_speed: internetSpeed,
      },
    };
  } catch (err) {
    const error = toCatalogError(err);
    reporter.fail(describeSnapshotFailure(error));
    return { ok: false, error };
  }
}

export async function collect(
  probes: DeviceProbes,
  reporter: ProgressReporter = consoleReporter,
): Promise<DeviceRecord | null> {
  const result = await collectSnapshot(probes, reporter);
  return result.ok ? result.record : null;
}

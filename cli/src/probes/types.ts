/**
 * Sources of the values that make up a device snapshot. Every method may
 * fail on its own; the snapshot assembler decides what a failure means.
 */
export interface DeviceProbes {
  getOperatingSystemName(): Promise<string>;
  /** Rejects with UnsupportedPlatformError for anything other than Windows or Linux. */
  getProcessorModel(operatingSystem: string): Promise<string>;
  /** Rejects with ProbeUnavailableError when no interface carries a hardware address. */
  getHardwareAddress(): Promise<string>;
  getHostname(): Promise<string>;
  getLocalIPAddress(hostname: string): Promise<string>;
  getLocalTimeOfDay(): Promise<string>;
  /** Distinct listening ports joined with ", ". */
  getListeningPorts(): Promise<string>;
  /** Rejects with ProbeTimeoutError when the test runs past its budget. */
  getThroughput(): Promise<string>;
}

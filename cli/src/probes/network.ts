import { ProbeUnavailableError } from '../errors';

export interface InterfaceAddress {
  family?: string | number;
  address?: string;
  mac?: string;
  internal?: boolean;
}

export type InterfaceAddressMap = Record<string, ReadonlyArray<InterfaceAddress> | undefined>;

export interface ConnectionInfo {
  state: string;
  localPort: string | number;
}

// Wired, wireless and loopback naming on Linux, macOS and Windows adapters.
export const INTERFACE_PREFIXES = ['eth', 'en', 'wlan', 'wl', 'l'];

const EMPTY_MAC = '00:00:00:00:00:00';

function isHardwareAddress(mac: string | undefined): mac is string {
  return typeof mac === 'string' && mac.length > 0 && mac !== EMPTY_MAC;
}

/**
 * Pick the hardware address of the first interface whose name looks like a
 * network adapter. Interfaces are visited in the order the map lists them.
 */
export function selectHardwareAddress(interfaces: InterfaceAddressMap): string {
  for (const [name, addresses] of Object.entries(interfaces)) {
    const lowered = name.toLowerCase();
    if (!INTERFACE_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
      continue;
    }

    let macAddress: string | undefined;
    for (const address of addresses ?? []) {
      if (isHardwareAddress(address.mac)) {
        macAddress = address.mac;
      }
    }
    if (macAddress) {
      return macAddress;
    }
  }

  throw new ProbeUnavailableError('No MAC address found.');
}

export function selectListeningPorts(connections: ReadonlyArray<ConnectionInfo>): string {
  const ports = new Set<string>();
  for (const connection of connections) {
    if (connection.state.toUpperCase() === 'LISTEN') {
      ports.add(String(connection.localPort));
    }
  }
  return Array.from(ports).join(', ');
}

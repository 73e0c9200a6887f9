/**
 * Column order of the inventory file. The first record written to a store
 * fixes its header, so this order also decides the file layout.
 */
export const DEVICE_FIELDS = [
  'computer_name',
  'operating_system',
  'processor_model',
  'mac_address',
  'ip_address',
  'system_time',
  'active_ports',
  'internet_speed',
] as const;

export type DeviceField = (typeof DEVICE_FIELDS)[number];

export type DeviceRecord = Record<DeviceField, string>;

export function recordValues(record: DeviceRecord): string[] {
  return DEVICE_FIELDS.map((field) => record[field]);
}

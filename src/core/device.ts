export type DeviceKind = "cpu" | "webgpu" | "mock";

/**
 * Placement of an operator, or of one of its inputs or outputs.
 * Opaque to schemas: only compared and copied.
 */
export type DeviceOption = {
  deviceType: DeviceKind;
  /** Ordinal among devices of the same kind */
  deviceId: number;
};

export function defaultDevice(): DeviceOption {
  return { deviceType: "cpu", deviceId: 0 };
}

export function copyDevice(device: DeviceOption): DeviceOption {
  return { deviceType: device.deviceType, deviceId: device.deviceId };
}

export function devicesEqual(a: DeviceOption, b: DeviceOption): boolean {
  return a.deviceType === b.deviceType && a.deviceId === b.deviceId;
}

export function formatDevice(device: DeviceOption): string {
  return `${device.deviceType}:${device.deviceId}`;
}

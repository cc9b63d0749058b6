export type ReadingKind = "numeric" | "boolean";

export interface DeviceClassRule {
  kind: ReadingKind;
  /** Twin model the registry creates for this class. */
  modelId?: string;
}

export type DeviceClassTable = Readonly<Record<string, Readonly<DeviceClassRule>>>;

export function defineDeviceClasses(rules: Record<string, DeviceClassRule>): DeviceClassTable {
  const table: Record<string, Readonly<DeviceClassRule>> = {};
  for (const [deviceClass, rule] of Object.entries(rules)) {
    table[deviceClass] = Object.freeze({ ...rule });
  }
  return Object.freeze(table);
}

// https://www.home-assistant.io/integrations/sensor and /integrations/binary_sensor
export const DEFAULT_DEVICE_CLASSES = defineDeviceClasses({
  illuminance: { kind: "numeric", modelId: "dtmi:homeassistant:IlluminanceSensor;1" },
  temperature: { kind: "numeric", modelId: "dtmi:homeassistant:TemperatureSensor;1" },
  motion: { kind: "boolean", modelId: "dtmi:homeassistant:MotionSensor;1" },
});

export function lookupDeviceClass(table: DeviceClassTable, deviceClass: string): Readonly<DeviceClassRule> | undefined {
  return Object.prototype.hasOwnProperty.call(table, deviceClass) ? table[deviceClass] : undefined;
}

import type { Device } from "@joulegate/shared";

/** A single device's instantaneous power. `null` means no usable readout. */
export interface PowerReader {
  readonly device: Device;
  read(): Promise<number | null>;
}
